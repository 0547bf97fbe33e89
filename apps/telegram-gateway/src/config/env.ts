import { TELEGRAM_MAX_TEXT_LENGTH, isValidSecretToken } from '@dharma-relay/telegram-sdk';
import { z } from 'zod';

import { ConfigurationError } from '../errors';

function positiveInteger(name: string, fallback: number, max = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (!value) {
        return fallback;
      }
      const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
      if (Number.isNaN(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid ${name} value: ${value}` });
        return z.NEVER;
      }
      if (parsed > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must not exceed ${max}` });
        return z.NEVER;
      }
      return parsed;
    });
}

/**
 * Environment contract for the gateway. The Telegram credentials are
 * required; everything else falls back to local-development defaults.
 */
const envSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default(process.env.NODE_ENV === 'production' ? 'production' : 'development'),
  PORT: positiveInteger('PORT', 8080),
  LOG_LEVEL: z.string().optional(),
  TELEGRAM_BOT_TOKEN: z
    .string({ required_error: 'TELEGRAM_BOT_TOKEN is required' })
    .min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_WEBHOOK_SECRET: z
    .string({ required_error: 'TELEGRAM_WEBHOOK_SECRET is required' })
    .min(1, 'TELEGRAM_WEBHOOK_SECRET is required')
    .refine(
      isValidSecretToken,
      'TELEGRAM_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and - (1-256 characters)',
    ),
  TELEGRAM_WEBHOOK_URL: z.string().url('TELEGRAM_WEBHOOK_URL must be a valid URL').optional(),
  TELEGRAM_API_BASE_URL: z.string().url('TELEGRAM_API_BASE_URL must be a valid URL').optional(),
  TELEGRAM_MAX_TEXT_LENGTH: positiveInteger(
    'TELEGRAM_MAX_TEXT_LENGTH',
    TELEGRAM_MAX_TEXT_LENGTH,
    TELEGRAM_MAX_TEXT_LENGTH,
  ),
  AGENT_API_BASE_URL: z
    .string()
    .url('AGENT_API_BASE_URL must be a valid URL')
    .default('http://127.0.0.1:9876'),
  AGENT_APP_NAME: z.string().min(1).default('masterversacharya'),
  AGENT_RUN_TIMEOUT_MS: positiveInteger('AGENT_RUN_TIMEOUT_MS', 15_000),
  AGENT_SESSION_TIMEOUT_MS: positiveInteger('AGENT_SESSION_TIMEOUT_MS', 10_000),
  AGENT_PROBE_TIMEOUT_MS: positiveInteger('AGENT_PROBE_TIMEOUT_MS', 5_000),
  GOOGLE_API_KEY: z.string().min(1).optional(),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  GENERATION_TIMEOUT_MS: positiveInteger('GENERATION_TIMEOUT_MS', 15_000),
  KNOWLEDGE_CACHE_TTL_SECONDS: positiveInteger('KNOWLEDGE_CACHE_TTL_SECONDS', 24 * 60 * 60),
  KNOWLEDGE_CACHE_MAX_ENTRIES: positiveInteger('KNOWLEDGE_CACHE_MAX_ENTRIES', 500),
  WEBHOOK_RATE_LIMIT_MAX: positiveInteger('WEBHOOK_RATE_LIMIT_MAX', 60),
  WEBHOOK_RATE_LIMIT_WINDOW: z
    .string()
    .optional()
    .transform((value) => value ?? '1 minute'),
});

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  telegram: {
    botToken: string;
    webhookSecret: string;
    /** Public URL registered with Telegram at startup when set. */
    webhookUrl?: string;
    apiBaseUrl?: string;
    maxTextLength: number;
  };
  agent: {
    baseUrl: string;
    appName: string;
    timeouts: {
      run: number;
      session: number;
      probe: number;
    };
  };
  knowledge: {
    googleApiKey?: string;
    model: string;
    generationTimeoutMs: number;
    cacheTtlSeconds: number;
    cacheMaxEntries: number;
  };
  rateLimit: {
    max: number;
    timeWindow: string;
  };
  logLevel?: string;
}

/**
 * Parse and validate configuration from the provided environment source.
 * The first problem found is raised as a {@link ConfigurationError}.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const firstError = result.error.issues[0];
    throw new ConfigurationError(firstError?.message ?? 'Invalid environment configuration');
  }

  const env = result.data;

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
      webhookUrl: env.TELEGRAM_WEBHOOK_URL,
      apiBaseUrl: env.TELEGRAM_API_BASE_URL,
      maxTextLength: env.TELEGRAM_MAX_TEXT_LENGTH,
    },
    agent: {
      baseUrl: env.AGENT_API_BASE_URL,
      appName: env.AGENT_APP_NAME,
      timeouts: {
        run: env.AGENT_RUN_TIMEOUT_MS,
        session: env.AGENT_SESSION_TIMEOUT_MS,
        probe: env.AGENT_PROBE_TIMEOUT_MS,
      },
    },
    knowledge: {
      googleApiKey: env.GOOGLE_API_KEY,
      model: env.GEMINI_MODEL,
      generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
      cacheTtlSeconds: env.KNOWLEDGE_CACHE_TTL_SECONDS,
      cacheMaxEntries: env.KNOWLEDGE_CACHE_MAX_ENTRIES,
    },
    rateLimit: {
      max: env.WEBHOOK_RATE_LIMIT_MAX,
      timeWindow: env.WEBHOOK_RATE_LIMIT_WINDOW,
    },
    logLevel: env.LOG_LEVEL,
  };
}
