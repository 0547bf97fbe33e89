import {
  buildCacheKey,
  buildDailyInsightKey,
  formatLocalDate,
  TtlCache,
  withTimeout,
} from '@dharma-relay/core';

import {
  DEFAULT_CATALOG,
  describeCategory,
  isPhilosophy,
  isReligion,
  type KnowledgeCatalog,
} from './catalog';
import type { GenerationService } from './generation';
import {
  buildComparisonPrompt,
  buildDailyInsightPrompt,
  buildInformationPrompt,
  buildInterfaithPrompt,
  buildMeditationPrompt,
  buildPerspectivePrompt,
  buildPracticePrompt,
} from './prompts';
import type {
  CacheLookupObserver,
  CatalogListing,
  DailyInsight,
  InterfaithDialogue,
  KnowledgeError,
  KnowledgeErrorCode,
  KnowledgeOperation,
  KnowledgeOutcome,
  KnowledgeSuccess,
  MeditationGuide,
  PhilosophicalPerspective,
  PracticeGuide,
  PracticeLevel,
  ReligionComparison,
  ReligionInformation,
} from './types';

export const DEFAULT_GENERATION_TIMEOUT_MS = 15_000;
export const MIN_MEDITATION_MINUTES = 1;
export const MAX_MEDITATION_MINUTES = 60;

const PRACTICE_LEVELS: readonly PracticeLevel[] = ['beginner', 'intermediate', 'advanced'];

export interface KnowledgeServiceOptions {
  generator: GenerationService;
  /** Shared cache of generated text; built from the TTL options when omitted. */
  cache?: TtlCache<string>;
  cacheTtlSeconds?: number;
  cacheMaxEntries?: number;
  generationTimeoutMs?: number;
  catalog?: KnowledgeCatalog;
  /** Clock in milliseconds, used for cache ages and the daily insight date. */
  now?: () => number;
  onCacheLookup?: CacheLookupObserver;
}

export interface InformationQuery {
  religion: string;
  category?: string;
  query?: string;
}

export interface PerspectiveQuery {
  philosophy: string;
  topic?: string;
}

export interface ComparisonQuery {
  religion1: string;
  religion2: string;
  aspect?: string;
}

export interface DailyInsightQuery {
  tradition?: string;
  theme?: string;
}

export interface MeditationQuery {
  tradition?: string;
  duration?: number;
  focus?: string;
}

export interface InterfaithQuery {
  topic: string;
  participants?: readonly string[];
}

export interface PracticeQuery {
  practice: string;
  tradition?: string;
  level?: string;
}

/**
 * Validates knowledge queries, memoizes the generated text per cache key and
 * shapes it into result payloads. Failures come back as
 * `{ status: 'error', code, message }`; nothing throws to the caller.
 */
export class KnowledgeService {
  private readonly generator: GenerationService;
  private readonly cache: TtlCache<string>;
  private readonly generationTimeoutMs: number;
  private readonly catalog: KnowledgeCatalog;
  private readonly now: () => number;
  private readonly onCacheLookup?: CacheLookupObserver;

  constructor(options: KnowledgeServiceOptions) {
    this.generator = options.generator;
    this.now = options.now ?? Date.now;
    this.cache =
      options.cache ??
      new TtlCache<string>({
        ttlSeconds: options.cacheTtlSeconds,
        maxEntries: options.cacheMaxEntries,
        now: this.now,
      });
    this.generationTimeoutMs = options.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS;
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    this.onCacheLookup = options.onCacheLookup;
  }

  listCatalog(): CatalogListing {
    return {
      religions: [...this.catalog.religions],
      philosophies: [...this.catalog.philosophies],
      categories: { ...this.catalog.categories },
    };
  }

  async getInformation(input: InformationQuery): Promise<KnowledgeOutcome<ReligionInformation>> {
    const religion = normalizeId(input.religion);
    const category = normalizeId(input.category) || 'general';
    const query = normalizeText(input.query);

    if (!isReligion(this.catalog, religion)) {
      return failure(
        'validation',
        `Unknown religion: ${religion}. Available options are: ${this.catalog.religions.join(', ')}`,
      );
    }

    const categoryDescription = describeCategory(this.catalog, category);
    if (!categoryDescription) {
      return failure(
        'validation',
        `Unknown category: ${category}. Available options are: ${Object.keys(this.catalog.categories).join(', ')}`,
      );
    }

    const prompt = buildInformationPrompt({
      religion,
      categoryDescription: category === 'general' ? undefined : categoryDescription,
      query,
    });

    return this.generateCached<ReligionInformation>(
      'religion',
      buildCacheKey('religion', religion, category, query),
      prompt,
      'Error retrieving information',
      (content) => ({
        religion,
        category,
        query,
        content,
        sources: [{ name: 'Generated by AI based on scholarly sources', reliability: 'high' }],
      }),
    );
  }

  async getPerspective(
    input: PerspectiveQuery,
  ): Promise<KnowledgeOutcome<PhilosophicalPerspective>> {
    const philosophy = normalizeId(input.philosophy);
    const topic = normalizeText(input.topic);

    if (!isPhilosophy(this.catalog, philosophy)) {
      return failure(
        'validation',
        `Unknown philosophy: ${philosophy}. Available options are: ${this.catalog.philosophies.join(', ')}`,
      );
    }

    return this.generateCached<PhilosophicalPerspective>(
      'philosophy',
      buildCacheKey('philosophy', philosophy, undefined, topic),
      buildPerspectivePrompt(philosophy, topic),
      'Error retrieving information',
      (content) => ({
        philosophy,
        topic,
        content,
        sources: [{ name: 'Generated by AI based on philosophical sources', reliability: 'high' }],
      }),
    );
  }

  async compare(input: ComparisonQuery): Promise<KnowledgeOutcome<ReligionComparison>> {
    const religion1 = normalizeId(input.religion1);
    const religion2 = normalizeId(input.religion2);
    const aspect = normalizeText(input.aspect) ?? 'general';

    for (const religion of [religion1, religion2]) {
      if (!isReligion(this.catalog, religion)) {
        return failure('validation', `Unknown religion: ${religion}`);
      }
    }

    return this.generateCached<ReligionComparison>(
      'comparison',
      buildCacheKey('comparison', [religion1, religion2], aspect),
      buildComparisonPrompt(religion1, religion2, aspect),
      'Error performing comparison',
      (content) => ({
        religion1,
        religion2,
        aspect,
        content,
        sources: [
          { name: 'Generated by AI based on comparative religious studies', reliability: 'high' },
        ],
      }),
    );
  }

  async dailyInsight(input: DailyInsightQuery = {}): Promise<KnowledgeOutcome<DailyInsight>> {
    const tradition = normalizeId(input.tradition) || undefined;
    const theme = normalizeText(input.theme);
    const today = new Date(this.now());

    return this.generateCached<DailyInsight>(
      'daily-insight',
      buildDailyInsightKey(today, tradition, theme),
      buildDailyInsightPrompt({ tradition, traditionKind: this.traditionKind(tradition), theme }),
      'Error generating daily insight',
      (insight) => ({
        date: formatLocalDate(today),
        tradition,
        theme,
        quote: extractQuote(insight),
        insight,
      }),
    );
  }

  async meditationGuide(input: MeditationQuery = {}): Promise<KnowledgeOutcome<MeditationGuide>> {
    const tradition = normalizeId(input.tradition) || undefined;
    const duration = input.duration ?? 10;
    const focus = normalizeText(input.focus) ?? 'mindfulness';

    if (
      !Number.isInteger(duration) ||
      duration < MIN_MEDITATION_MINUTES ||
      duration > MAX_MEDITATION_MINUTES
    ) {
      return failure(
        'validation',
        `Duration must be a whole number of minutes between ${MIN_MEDITATION_MINUTES} and ${MAX_MEDITATION_MINUTES}, received ${duration}`,
      );
    }

    return this.generateCached<MeditationGuide>(
      'meditation',
      buildCacheKey('meditation', `${focus}-${duration}`, tradition ?? 'general'),
      buildMeditationPrompt({
        tradition,
        traditionKind: this.traditionKind(tradition),
        duration,
        focus,
      }),
      'Error generating meditation guide',
      (guide) => ({ tradition, duration, focus, guide }),
    );
  }

  async interfaithDialogue(
    input: InterfaithQuery,
  ): Promise<KnowledgeOutcome<InterfaithDialogue>> {
    const topic = normalizeText(input.topic);
    if (!topic) {
      return failure('validation', 'A topic is required for interfaith dialogue');
    }

    const requested =
      input.participants && input.participants.length > 0
        ? input.participants
        : this.catalog.interfaithDefaults;
    const religions = [...new Set(requested.map(normalizeId))]
      .filter((religion) => isReligion(this.catalog, religion))
      .sort();

    if (religions.length < 2) {
      return failure('validation', 'At least two valid religions are required for interfaith dialogue');
    }

    return this.generateCached<InterfaithDialogue>(
      'interfaith',
      buildCacheKey('interfaith', religions, undefined, topic),
      buildInterfaithPrompt(topic, religions),
      'Error generating interfaith dialogue',
      (dialogue) => ({ topic, religions, dialogue }),
    );
  }

  async practiceGuide(input: PracticeQuery): Promise<KnowledgeOutcome<PracticeGuide>> {
    const practice = normalizeId(input.practice);
    const tradition = normalizeId(input.tradition) || undefined;
    const level = toPracticeLevel(input.level);

    if (!practice) {
      return failure('validation', 'A practice is required for a practice guide');
    }

    return this.generateCached<PracticeGuide>(
      'practice',
      buildCacheKey('practice', `${practice}-${level}`, tradition ?? 'general'),
      buildPracticePrompt(practice, level, tradition),
      'Error generating practice guide',
      (guide) => ({ practice, tradition, level, guide }),
    );
  }

  private traditionKind(tradition?: string): 'religion' | 'philosophy' | undefined {
    if (!tradition) {
      return undefined;
    }
    if (isReligion(this.catalog, tradition)) {
      return 'religion';
    }
    return isPhilosophy(this.catalog, tradition) ? 'philosophy' : undefined;
  }

  private async generateCached<T>(
    operation: KnowledgeOperation,
    key: string,
    prompt: string,
    errorPrefix: string,
    shape: (text: string) => T,
  ): Promise<KnowledgeOutcome<T>> {
    try {
      const lookup = await this.cache.getOrCompute(key, async () => {
        const result = await withTimeout(
          this.generator.generate(prompt),
          this.generationTimeoutMs,
          'Generation',
        );
        return result.text;
      });

      this.onCacheLookup?.(operation, lookup.hit);
      return success(shape(lookup.value));
    } catch (error) {
      this.onCacheLookup?.(operation, false);
      return failure('upstream', `${errorPrefix}: ${describeError(error)}`);
    }
  }
}

function success<T>(payload: T): KnowledgeSuccess<T> {
  return { ...payload, status: 'success' };
}

function failure(code: KnowledgeErrorCode, message: string): KnowledgeError {
  return { status: 'error', code, message };
}

function normalizeId(value?: string): string {
  return (value ?? '').trim().toLowerCase();
}

function normalizeText(value?: string): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function toPracticeLevel(value?: string): PracticeLevel {
  const normalized = normalizeId(value);
  return PRACTICE_LEVELS.find((level) => level === normalized) ?? 'beginner';
}

/** First line that opens with a straight or curly double quote. */
function extractQuote(text: string): string {
  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('"') || trimmed.startsWith('“')) {
      return trimmed;
    }
  }
  return '';
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
