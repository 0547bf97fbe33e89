import helmet from '@fastify/helmet';
import fastifyRateLimit from '@fastify/rate-limit';
import Fastify, {
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import type { KnowledgeService } from '@dharma-relay/knowledge';

import type { AppConfig } from '../config';
import { registerHealthRoutes } from '../routes/health';
import { registerKnowledgeRoutes } from '../routes/knowledge';
import { registerWebhookRoutes } from '../routes/webhook';
import type { TelegramChatService } from '../services/chat/chat-service';
import type { AppLogger } from '../telemetry/logger';
import type { GatewayMetrics } from '../telemetry/metrics';

import type { GatewayFastifyInstance } from './types';

export interface ServerOptions {
  config: AppConfig;
  logger: AppLogger;
  metrics: GatewayMetrics;
  chatService: Pick<TelegramChatService, 'handleUpdate'>;
  knowledgeService: KnowledgeService;
  /** Agent backend reachability check backing `/readyz`. */
  probe?: () => Promise<boolean>;
}

/**
 * Build the Fastify server hosting the Telegram webhook, the knowledge API,
 * health checks and metrics, with helmet, per-route rate limiting and
 * request id propagation.
 */
export async function createServer(options: ServerOptions): Promise<GatewayFastifyInstance> {
  const { config } = options;
  const app = Fastify<
    RawServerDefault,
    RawRequestDefaultExpression<RawServerDefault>,
    RawReplyDefaultExpression<RawServerDefault>,
    AppLogger
  >({
    logger: options.logger,
    disableRequestLogging: config.env === 'production',
  });

  await app.register(helmet, {
    global: true,
  });

  await app.register(fastifyRateLimit, {
    global: false,
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.timeWindow,
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId =
      firstHeader(request.headers['x-request-id']) ??
      firstHeader(request.headers['x-correlation-id']) ??
      request.id;

    void reply.header('x-request-id', correlationId);
    request.headers['x-correlation-id'] = correlationId;
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        requestId: reply.getHeader('x-request-id'),
      },
      'Request completed',
    );
    done();
  });

  const rateLimit = {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.timeWindow,
  };

  await registerHealthRoutes(app, { probe: options.probe });
  await registerWebhookRoutes(app, {
    secretToken: config.telegram.webhookSecret,
    service: options.chatService,
    metrics: options.metrics,
    rateLimit,
  });
  await registerKnowledgeRoutes(app, {
    service: options.knowledgeService,
    metrics: options.metrics,
    rateLimit,
  });

  app.get('/metrics', async (_, reply) => {
    const payload = await options.metrics.registry.metrics();
    return reply.type(options.metrics.registry.contentType).send(payload);
  });

  return app;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  return header || undefined;
}
