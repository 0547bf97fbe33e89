import { GoogleGenAI } from '@google/genai';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

export interface GenerationResult {
  text: string;
}

/** Prompt in, text out. */
export interface GenerationService {
  generate(prompt: string): Promise<GenerationResult>;
}

/** The slice of the `@google/genai` models API this package calls. */
export interface ContentGenerator {
  generateContent(params: { model: string; contents: string }): Promise<{ text?: string }>;
}

export interface GeminiGenerationConfig {
  apiKey: string;
  model?: string;
  /** Override the SDK client, mainly for tests. */
  generator?: ContentGenerator;
}

export class GeminiGenerationService implements GenerationService {
  private readonly generator: ContentGenerator;
  readonly model: string;

  constructor(config: GeminiGenerationConfig) {
    if (!config.apiKey && !config.generator) {
      throw new Error('GeminiGenerationService requires an apiKey.');
    }

    this.model = config.model ?? DEFAULT_GEMINI_MODEL;
    this.generator = config.generator ?? new GoogleGenAI({ apiKey: config.apiKey }).models;
  }

  async generate(prompt: string): Promise<GenerationResult> {
    const response = await this.generator.generateContent({ model: this.model, contents: prompt });
    const text = response.text;

    return { text: typeof text === 'string' ? text : JSON.stringify(response) };
  }
}

export class GenerationUnavailableError extends Error {
  constructor(message = 'Generation service is not configured') {
    super(message);
    this.name = 'GenerationUnavailableError';
  }
}

/** Stand-in used when no model credentials are configured; every call fails. */
export class UnconfiguredGenerationService implements GenerationService {
  constructor(private readonly reason = 'Generation service is not configured') {}

  async generate(): Promise<GenerationResult> {
    throw new GenerationUnavailableError(this.reason);
  }
}
