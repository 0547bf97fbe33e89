import { describe, expect, it } from 'vitest';

import { DEFAULT_CATALOG } from '../src/catalog';
import { UnconfiguredGenerationService, type GenerationService } from '../src/generation';
import { KnowledgeService, type KnowledgeServiceOptions } from '../src/service';
import type { KnowledgeOperation } from '../src/types';

function createGenerator(reply: (prompt: string, call: number) => string | Promise<string>) {
  const prompts: string[] = [];
  const generator: GenerationService = {
    async generate(prompt) {
      prompts.push(prompt);
      return { text: await reply(prompt, prompts.length) };
    },
  };
  return { generator, prompts };
}

function createClock(start: number) {
  let current = start;
  return {
    now: () => current,
    advanceSeconds(seconds: number) {
      current += seconds * 1000;
    },
  };
}

function createService(
  generator: GenerationService,
  options: Omit<KnowledgeServiceOptions, 'generator'> = {},
) {
  const lookups: Array<[KnowledgeOperation, boolean]> = [];
  const service = new KnowledgeService({
    generator,
    onCacheLookup: (operation, hit) => lookups.push([operation, hit]),
    ...options,
  });
  return { service, lookups };
}

describe('KnowledgeService', () => {
  describe('getInformation', () => {
    it('generates once and serves repeats from the cache', async () => {
      const { generator, prompts } = createGenerator(() => 'Buddhism overview');
      const { service, lookups } = createService(generator);

      const first = await service.getInformation({ religion: 'Buddhism' });
      const second = await service.getInformation({ religion: 'buddhism', category: 'general' });

      expect(first).toEqual({
        status: 'success',
        religion: 'buddhism',
        category: 'general',
        query: undefined,
        content: 'Buddhism overview',
        sources: [{ name: 'Generated by AI based on scholarly sources', reliability: 'high' }],
      });
      expect(second).toEqual(first);
      expect(prompts).toHaveLength(1);
      expect(lookups).toEqual([
        ['religion', false],
        ['religion', true],
      ]);
    });

    it('focuses the prompt on the requested category and question', async () => {
      const { generator, prompts } = createGenerator(() => 'Rituals');
      const { service } = createService(generator);

      await service.getInformation({
        religion: 'sikhism',
        category: 'rituals',
        query: 'What happens at a langar?',
      });

      expect(prompts[0]).toContain(
        'information about Sikhism focusing on Religious rituals and practices. Specifically address this question: What happens at a langar?',
      );
    });

    it('rejects religions outside the catalog', async () => {
      const { generator, prompts } = createGenerator(() => 'unused');
      const { service } = createService(generator);

      const result = await service.getInformation({ religion: 'Atlantis' });

      expect(result).toMatchObject({ status: 'error', code: 'validation' });
      expect(result.status === 'error' && result.message).toMatch(
        /^Unknown religion: atlantis\. Available options are: christianity, islam, /,
      );
      expect(prompts).toHaveLength(0);
    });

    it('rejects unknown categories', async () => {
      const { generator } = createGenerator(() => 'unused');
      const { service } = createService(generator);

      const result = await service.getInformation({ religion: 'islam', category: 'astrology' });

      expect(result).toMatchObject({ status: 'error', code: 'validation' });
      expect(result.status === 'error' && result.message).toMatch(/^Unknown category: astrology\./);
    });

    it('does not cache upstream failures', async () => {
      const { generator, prompts } = createGenerator((_, call) => {
        if (call === 1) {
          throw new Error('quota exceeded');
        }
        return 'Recovered';
      });
      const { service, lookups } = createService(generator);

      const failed = await service.getInformation({ religion: 'judaism' });
      const retried = await service.getInformation({ religion: 'judaism' });

      expect(failed).toEqual({
        status: 'error',
        code: 'upstream',
        message: 'Error retrieving information: quota exceeded',
      });
      expect(retried).toMatchObject({ status: 'success', content: 'Recovered' });
      expect(prompts).toHaveLength(2);
      expect(lookups).toEqual([
        ['religion', false],
        ['religion', false],
      ]);
    });

    it('regenerates once the ttl has elapsed', async () => {
      const clock = createClock(Date.UTC(2026, 4, 1, 12));
      const { generator, prompts } = createGenerator((_, call) => `version ${call}`);
      const { service } = createService(generator, { cacheTtlSeconds: 60, now: clock.now });

      await service.getInformation({ religion: 'taoism' });
      clock.advanceSeconds(59);
      const cached = await service.getInformation({ religion: 'taoism' });
      clock.advanceSeconds(1);
      const refreshed = await service.getInformation({ religion: 'taoism' });

      expect(cached).toMatchObject({ content: 'version 1' });
      expect(refreshed).toMatchObject({ content: 'version 2' });
      expect(prompts).toHaveLength(2);
    });

    it('shares one generation between concurrent identical queries', async () => {
      let release: (text: string) => void = () => undefined;
      const { generator, prompts } = createGenerator(
        () => new Promise<string>((resolve) => (release = resolve)),
      );
      const { service } = createService(generator);

      const pending = Promise.all([
        service.getInformation({ religion: 'hinduism' }),
        service.getInformation({ religion: 'hinduism' }),
      ]);
      await Promise.resolve();
      release('Shared');
      const [first, second] = await pending;

      expect(prompts).toHaveLength(1);
      expect(first).toMatchObject({ content: 'Shared' });
      expect(second).toMatchObject({ content: 'Shared' });
    });
  });

  describe('getPerspective', () => {
    it('validates the philosophy and keeps the topic', async () => {
      const { generator, prompts } = createGenerator(() => 'Stoic view');
      const { service } = createService(generator);

      const unknown = await service.getPerspective({ philosophy: 'cynicism' });
      const result = await service.getPerspective({ philosophy: 'Stoicism', topic: 'grief' });

      expect(unknown).toMatchObject({ status: 'error', code: 'validation' });
      expect(result).toEqual({
        status: 'success',
        philosophy: 'stoicism',
        topic: 'grief',
        content: 'Stoic view',
        sources: [{ name: 'Generated by AI based on philosophical sources', reliability: 'high' }],
      });
      expect(prompts[0]).toContain('explanation of stoicism philosophy specifically addressing: grief. ');
    });
  });

  describe('compare', () => {
    it('uses one cache slot whatever the order of the pair', async () => {
      const { generator, prompts } = createGenerator(() => 'Comparison');
      const { service, lookups } = createService(generator);

      const first = await service.compare({ religion1: 'islam', religion2: 'christianity' });
      const second = await service.compare({ religion1: 'Christianity', religion2: 'Islam' });

      expect(prompts).toHaveLength(1);
      expect(first).toMatchObject({ religion1: 'islam', religion2: 'christianity', aspect: 'general' });
      expect(second).toMatchObject({ religion1: 'christianity', religion2: 'islam', content: 'Comparison' });
      expect(lookups).toEqual([
        ['comparison', false],
        ['comparison', true],
      ]);
    });

    it('names the unknown religion', async () => {
      const { generator } = createGenerator(() => 'unused');
      const { service } = createService(generator);

      await expect(service.compare({ religion1: 'islam', religion2: 'atlantis' })).resolves.toEqual({
        status: 'error',
        code: 'validation',
        message: 'Unknown religion: atlantis',
      });
    });
  });

  describe('dailyInsight', () => {
    it('rolls over to a new entry on the next calendar day', async () => {
      const clock = createClock(new Date(2026, 0, 1, 12, 0, 0).getTime());
      const { generator, prompts } = createGenerator(
        (_, call) => `"Be still, and know."\nReflection ${call}`,
      );
      const { service } = createService(generator, { now: clock.now });

      const first = await service.dailyInsight({ tradition: 'Judaism', theme: 'patience' });
      const repeat = await service.dailyInsight({ tradition: 'judaism', theme: 'patience' });
      clock.advanceSeconds(24 * 60 * 60);
      const nextDay = await service.dailyInsight({ tradition: 'judaism', theme: 'patience' });

      expect(first).toEqual({
        status: 'success',
        date: '2026-01-01',
        tradition: 'judaism',
        theme: 'patience',
        quote: '"Be still, and know."',
        insight: '"Be still, and know."\nReflection 1',
      });
      expect(repeat).toEqual(first);
      expect(nextDay).toMatchObject({ date: '2026-01-02', insight: '"Be still, and know."\nReflection 2' });
      expect(prompts).toHaveLength(2);
      expect(prompts[0]).toContain('insight for today from the Judaism tradition focusing on the theme of patience. ');
    });

    it('returns an empty quote when no line is quoted', async () => {
      const { generator } = createGenerator(() => 'Breathe slowly.');
      const { service } = createService(generator);

      await expect(service.dailyInsight()).resolves.toMatchObject({ quote: '', insight: 'Breathe slowly.' });
    });
  });

  describe('meditationGuide', () => {
    it('accepts whole minutes between 1 and 60', async () => {
      const { generator, prompts } = createGenerator(() => 'Sit comfortably.');
      const { service } = createService(generator);

      const tooShort = await service.meditationGuide({ duration: 0 });
      const tooLong = await service.meditationGuide({ duration: 61 });
      const fractional = await service.meditationGuide({ duration: 2.5 });
      const ok = await service.meditationGuide({ duration: 30 });

      expect(tooShort).toMatchObject({ status: 'error', code: 'validation' });
      expect(tooLong).toMatchObject({ status: 'error', code: 'validation' });
      expect(fractional).toMatchObject({ status: 'error', code: 'validation' });
      expect(ok).toEqual({
        status: 'success',
        tradition: undefined,
        duration: 30,
        focus: 'mindfulness',
        guide: 'Sit comfortably.',
      });
      expect(prompts).toEqual([expect.stringMatching(/^Create a 30-minute guided meditation script focusing on mindfulness\. /)]);
    });

    it('frames the script by tradition kind', async () => {
      const { generator, prompts } = createGenerator(() => 'Guide');
      const { service } = createService(generator);

      await service.meditationGuide({ tradition: 'buddhism', duration: 10, focus: 'compassion' });
      await service.meditationGuide({ tradition: 'stoicism', duration: 10, focus: 'compassion' });

      expect(prompts[0]).toContain('script based on Buddhism practices focusing on compassion. ');
      expect(prompts[1]).toContain('script inspired by Stoicism philosophy focusing on compassion. ');
    });
  });

  describe('interfaithDialogue', () => {
    it('fails when fewer than two known religions remain', async () => {
      const { generator, prompts } = createGenerator(() => 'unused');
      const { service } = createService(generator);

      const result = await service.interfaithDialogue({ topic: 'ethics', participants: ['atlantis'] });

      expect(result).toEqual({
        status: 'error',
        code: 'validation',
        message: 'At least two valid religions are required for interfaith dialogue',
      });
      expect(prompts).toHaveLength(0);
    });

    it('uses the default participants when none are given', async () => {
      const { generator } = createGenerator(() => 'Dialogue');
      const { service } = createService(generator);

      const result = await service.interfaithDialogue({ topic: 'ethics', participants: [] });

      expect(result).toMatchObject({
        status: 'success',
        topic: 'ethics',
        religions: ['buddhism', 'christianity', 'hinduism', 'islam', 'judaism'],
      });
    });

    it('drops unknown participants and ignores their order', async () => {
      const { generator, prompts } = createGenerator(() => 'Dialogue');
      const { service } = createService(generator);

      const first = await service.interfaithDialogue({
        topic: 'forgiveness',
        participants: ['Islam', 'atlantis', 'christianity'],
      });
      await service.interfaithDialogue({ topic: 'forgiveness', participants: ['christianity', 'islam'] });

      expect(first).toMatchObject({ religions: ['christianity', 'islam'] });
      expect(prompts).toHaveLength(1);
      expect(prompts[0]).toContain(
        "dialogue on the topic of 'forgiveness' between representatives of Christianity and Islam. ",
      );
    });

    it('requires a topic', async () => {
      const { generator } = createGenerator(() => 'unused');
      const { service } = createService(generator);

      await expect(service.interfaithDialogue({ topic: '  ' })).resolves.toMatchObject({
        code: 'validation',
        message: 'A topic is required for interfaith dialogue',
      });
    });
  });

  describe('practiceGuide', () => {
    it('normalizes an unknown level to beginner', async () => {
      const { generator, prompts } = createGenerator(() => 'Steps');
      const { service } = createService(generator);

      const result = await service.practiceGuide({ practice: 'meditation', level: 'expert' });

      expect(result).toEqual({
        status: 'success',
        practice: 'meditation',
        tradition: undefined,
        level: 'beginner',
        guide: 'Steps',
      });
      expect(prompts[0]).toContain(
        'Create a beginner level guide for the spiritual practice of meditation that is accessible',
      );
    });

    it('reports generation timeouts as upstream errors', async () => {
      const { generator } = createGenerator(() => new Promise<string>(() => undefined));
      const { service } = createService(generator, { generationTimeoutMs: 5 });

      await expect(service.practiceGuide({ practice: 'prayer', level: 'advanced' })).resolves.toEqual({
        status: 'error',
        code: 'upstream',
        message: 'Error generating practice guide: Generation timed out after 5ms',
      });
    });
  });

  it('reports a missing generation backend as an upstream error', async () => {
    const { service } = createService(new UnconfiguredGenerationService('GOOGLE_API_KEY is not set'));

    await expect(service.getPerspective({ philosophy: 'nihilism' })).resolves.toEqual({
      status: 'error',
      code: 'upstream',
      message: 'Error retrieving information: GOOGLE_API_KEY is not set',
    });
  });

  it('lists the catalog', () => {
    const { generator } = createGenerator(() => 'unused');
    const { service } = createService(generator);

    const catalog = service.listCatalog();

    expect(catalog.religions).toHaveLength(15);
    expect(catalog.philosophies).toHaveLength(10);
    expect(catalog.categories.history).toBe('Historical and cultural context');
  });

  it('ships only the catalog sections the service reads', () => {
    expect(Object.keys(DEFAULT_CATALOG)).toEqual([
      'religions',
      'philosophies',
      'categories',
      'interfaithDefaults',
    ]);
  });
});
