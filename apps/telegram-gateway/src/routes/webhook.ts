import { SECRET_TOKEN_HEADER, verifySecretToken } from '@dharma-relay/telegram-sdk';

import { PayloadValidationError, WebhookSecretError } from '../errors';
import type { GatewayFastifyInstance, RouteRateLimit } from '../server/types';
import type { TelegramChatService } from '../services/chat/chat-service';
import type { GatewayMetrics } from '../telemetry/metrics';

import { inferStatusCode } from './status-code';
import { parseTelegramUpdate } from './webhook-payload-schema';

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';

export interface WebhookRouteContext {
  secretToken: string;
  service: Pick<TelegramChatService, 'handleUpdate'>;
  metrics: GatewayMetrics;
  rateLimit?: RouteRateLimit;
}

/**
 * Register the Telegram update intake. Deliveries must echo the secret token
 * set with `setWebhook`. Valid updates are acknowledged with 200 once handled,
 * including when handling failed, so Telegram never redelivers them.
 */
export async function registerWebhookRoutes(
  app: GatewayFastifyInstance,
  context: WebhookRouteContext,
): Promise<void> {
  app.post(
    TELEGRAM_WEBHOOK_PATH,
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const stopTimer = context.metrics.requestDuration.startTimer();
      let statusCode = 200;

      try {
        const provided = request.headers[SECRET_TOKEN_HEADER];
        if (!verifySecretToken({ expected: context.secretToken, provided })) {
          request.log.warn({ hasToken: Boolean(provided) }, 'Rejected Telegram webhook secret');
          throw new WebhookSecretError();
        }

        const parsed = parseTelegramUpdate(request.body);
        if (!parsed.success) {
          request.log.warn({ issues: parsed.issues }, 'Rejected malformed Telegram update');
          throw new PayloadValidationError('Invalid Telegram update payload', parsed.issues);
        }

        const result = await context.service.handleUpdate(parsed.update);

        context.metrics.requestCounter.inc({ method: request.method, status: '200' });
        return reply.code(200).send({ status: 'ok', handled: result.handled });
      } catch (error) {
        statusCode = inferStatusCode(error);
        context.metrics.requestCounter.inc({ method: request.method, status: String(statusCode) });
        throw error;
      } finally {
        stopTimer({ method: request.method, status: String(statusCode) });
      }
    },
  );
}
