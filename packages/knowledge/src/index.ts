export {
  KnowledgeService,
  DEFAULT_GENERATION_TIMEOUT_MS,
  MIN_MEDITATION_MINUTES,
  MAX_MEDITATION_MINUTES,
  type KnowledgeServiceOptions,
  type InformationQuery,
  type PerspectiveQuery,
  type ComparisonQuery,
  type DailyInsightQuery,
  type MeditationQuery,
  type InterfaithQuery,
  type PracticeQuery,
} from './service';
export {
  GeminiGenerationService,
  UnconfiguredGenerationService,
  GenerationUnavailableError,
  DEFAULT_GEMINI_MODEL,
  type ContentGenerator,
  type GenerationResult,
  type GenerationService,
  type GeminiGenerationConfig,
} from './generation';
export { DEFAULT_CATALOG, type KnowledgeCatalog } from './catalog';
export type * from './types';
