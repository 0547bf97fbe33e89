import { AgentRunClient } from '@dharma-relay/agent-client';
import {
  GeminiGenerationService,
  KnowledgeService,
  UnconfiguredGenerationService,
  type GenerationService,
} from '@dharma-relay/knowledge';
import { TelegramBotClient } from '@dharma-relay/telegram-sdk';

import { loadConfig, type AppConfig } from './config';
import { AgentUnavailableError } from './errors';
import { createServer, type GatewayFastifyInstance } from './server';
import { TelegramChatService } from './services/chat/chat-service';
import { InMemorySessionStore, SessionLifecycleManager } from './services/session';
import { createLogger, type AppLogger } from './telemetry/logger';
import { createMetrics, type GatewayMetrics } from './telemetry/metrics';

export interface Application {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  server: GatewayFastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export interface ApplicationOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Compose the gateway: configuration, logging and metrics, the Telegram and
 * agent clients, session routing, the knowledge service and the HTTP server.
 */
export async function createApplication(options: ApplicationOptions = {}): Promise<Application> {
  const config = loadConfig(options.env);
  const logger = createLogger({ level: config.logLevel });
  const metrics = createMetrics();

  const bot = new TelegramBotClient({
    botToken: config.telegram.botToken,
    apiBaseUrl: config.telegram.apiBaseUrl,
  });

  const agent = new AgentRunClient({
    baseUrl: config.agent.baseUrl,
    appName: config.agent.appName,
    timeouts: config.agent.timeouts,
  });

  const sessions = new SessionLifecycleManager(
    new InMemorySessionStore({ prefix: 'telegram:' }),
    agent,
    logger,
  );

  const chatService = new TelegramChatService(bot, agent, sessions, metrics, logger, {
    maxTextLength: config.telegram.maxTextLength,
  });

  const knowledgeService = new KnowledgeService({
    generator: createGenerator(config, logger),
    cacheTtlSeconds: config.knowledge.cacheTtlSeconds,
    cacheMaxEntries: config.knowledge.cacheMaxEntries,
    generationTimeoutMs: config.knowledge.generationTimeoutMs,
    onCacheLookup: (operation, hit) => {
      metrics.knowledgeCacheLookups.inc({ operation, result: hit ? 'hit' : 'miss' });
    },
  });

  const server = await createServer({
    config,
    logger,
    metrics,
    chatService,
    knowledgeService,
    probe: () => agent.isAvailable(),
  });

  return {
    config,
    logger,
    metrics,
    server,
    start: () => startServer({ server, config, bot, agent, logger }),
    stop: () => server.close(),
  };
}

interface StartContext {
  server: GatewayFastifyInstance;
  config: AppConfig;
  bot: TelegramBotClient;
  agent: AgentRunClient;
  logger: AppLogger;
}

/**
 * Refuse to start while the agent backend is unreachable, then listen on all
 * interfaces and register the webhook with Telegram when a public URL is set.
 */
async function startServer({ server, config, bot, agent, logger }: StartContext): Promise<void> {
  await ensureAgentAvailable(agent, config.agent.baseUrl);

  await server.listen({ port: config.port, host: '0.0.0.0' });

  if (config.telegram.webhookUrl) {
    await bot.setWebhook(config.telegram.webhookUrl, config.telegram.webhookSecret);
    logger.info({ url: config.telegram.webhookUrl }, 'Registered Telegram webhook');
  }
}

export async function ensureAgentAvailable(
  agent: Pick<AgentRunClient, 'isAvailable'>,
  baseUrl: string,
): Promise<void> {
  if (!(await agent.isAvailable())) {
    throw new AgentUnavailableError(baseUrl);
  }
}

function createGenerator(config: AppConfig, logger: AppLogger): GenerationService {
  if (!config.knowledge.googleApiKey) {
    logger.warn('GOOGLE_API_KEY is not set; knowledge queries will report an upstream error');
    return new UnconfiguredGenerationService('GOOGLE_API_KEY is not configured');
  }

  return new GeminiGenerationService({
    apiKey: config.knowledge.googleApiKey,
    model: config.knowledge.model,
  });
}
