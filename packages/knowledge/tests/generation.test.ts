import { describe, expect, it } from 'vitest';

import {
  GeminiGenerationService,
  GenerationUnavailableError,
  UnconfiguredGenerationService,
  type ContentGenerator,
} from '../src/generation';
import { buildInformationPrompt, joinNames, titleCase } from '../src/prompts';

describe('GeminiGenerationService', () => {
  it('returns the response text from the configured model', async () => {
    const requests: Array<{ model: string; contents: string }> = [];
    const generator: ContentGenerator = {
      async generateContent(params) {
        requests.push(params);
        return { text: 'Namaste' };
      },
    };

    const service = new GeminiGenerationService({ apiKey: 'test-key', generator });

    await expect(service.generate('Greet me')).resolves.toEqual({ text: 'Namaste' });
    expect(requests).toEqual([{ model: 'gemini-2.0-flash', contents: 'Greet me' }]);
  });

  it('stringifies responses that carry no text', async () => {
    const generator: ContentGenerator = {
      async generateContent() {
        const blocked = { text: undefined, promptFeedback: { blockReason: 'SAFETY' } };
        return blocked;
      },
    };

    const service = new GeminiGenerationService({ apiKey: 'test-key', model: 'gemini-test', generator });

    await expect(service.generate('Anything')).resolves.toEqual({
      text: '{"promptFeedback":{"blockReason":"SAFETY"}}',
    });
  });

  it('requires an api key', () => {
    expect(() => new GeminiGenerationService({ apiKey: '' })).toThrow(/apiKey/);
  });
});

describe('UnconfiguredGenerationService', () => {
  it('fails every call', async () => {
    const service = new UnconfiguredGenerationService('GOOGLE_API_KEY is not set');

    await expect(service.generate()).rejects.toBeInstanceOf(GenerationUnavailableError);
  });
});

describe('prompts', () => {
  it('builds the general religion overview', () => {
    expect(buildInformationPrompt({ religion: 'buddhism' })).toBe(
      'Provide accurate, respectful, and educational information about Buddhism covering its core beliefs, practices, and principles. ' +
        '\n\nPlease structure your response with these sections when applicable:\n' +
        '1. Core Beliefs\n2. Key Practices\n3. Sacred Texts\n4. Historical Context\n5. Modern Interpretation',
    );
  });

  it('joins participant names', () => {
    expect(joinNames(['Islam'])).toBe('Islam');
    expect(joinNames(['Islam', 'Judaism'])).toBe('Islam and Judaism');
    expect(joinNames(['Bahai', 'Islam', 'Judaism'])).toBe('Bahai, Islam, and Judaism');
  });

  it('title-cases identifiers', () => {
    expect(titleCase('zoroastrianism')).toBe('Zoroastrianism');
    expect(titleCase('inner peace')).toBe('Inner Peace');
  });
});
