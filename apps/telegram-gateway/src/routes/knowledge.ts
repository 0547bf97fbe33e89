import type { KnowledgeOutcome, KnowledgeService } from '@dharma-relay/knowledge';
import { z } from 'zod';

import { PayloadValidationError } from '../errors';
import type { GatewayFastifyInstance, RouteRateLimit } from '../server/types';
import type { GatewayMetrics } from '../telemetry/metrics';

export interface KnowledgeRouteContext {
  service: KnowledgeService;
  metrics: GatewayMetrics;
  rateLimit?: RouteRateLimit;
}

const informationBody = z.object({
  religion: z.string(),
  category: z.string().optional(),
  query: z.string().optional(),
});

const perspectiveBody = z.object({
  philosophy: z.string(),
  topic: z.string().optional(),
});

const comparisonBody = z.object({
  religion1: z.string(),
  religion2: z.string(),
  aspect: z.string().optional(),
});

const dailyInsightBody = z.object({
  tradition: z.string().optional(),
  theme: z.string().optional(),
});

const meditationBody = z.object({
  tradition: z.string().optional(),
  duration: z.number().optional(),
  focus: z.string().optional(),
});

const interfaithBody = z.object({
  topic: z.string(),
  participants: z.array(z.string()).optional(),
});

const practiceBody = z.object({
  practice: z.string(),
  tradition: z.string().optional(),
  level: z.string().optional(),
});

/** Status code for a knowledge outcome: domain validation is 422, generation failure 502. */
export function outcomeStatusCode(outcome: KnowledgeOutcome<object>): number {
  if (outcome.status === 'success') {
    return 200;
  }

  return outcome.code === 'validation' ? 422 : 502;
}

/**
 * Expose the knowledge operations over JSON. Bodies failing the schema are
 * rejected with 400 before reaching the service; the service's own outcome
 * is returned as the response body.
 */
export async function registerKnowledgeRoutes(
  app: GatewayFastifyInstance,
  context: KnowledgeRouteContext,
): Promise<void> {
  const { service } = context;

  app.get('/knowledge/catalog', async () => service.listCatalog());

  registerOperation(app, context, 'information', informationBody, (input) =>
    service.getInformation(input),
  );
  registerOperation(app, context, 'perspective', perspectiveBody, (input) =>
    service.getPerspective(input),
  );
  registerOperation(app, context, 'compare', comparisonBody, (input) => service.compare(input));
  registerOperation(app, context, 'daily-insight', dailyInsightBody, (input) =>
    service.dailyInsight(input),
  );
  registerOperation(app, context, 'meditation', meditationBody, (input) =>
    service.meditationGuide(input),
  );
  registerOperation(app, context, 'interfaith', interfaithBody, (input) =>
    service.interfaithDialogue(input),
  );
  registerOperation(app, context, 'practice', practiceBody, (input) =>
    service.practiceGuide(input),
  );
}

function registerOperation<I>(
  app: GatewayFastifyInstance,
  context: KnowledgeRouteContext,
  name: string,
  schema: z.ZodType<I, z.ZodTypeDef, unknown>,
  run: (input: I) => Promise<KnowledgeOutcome<object>>,
): void {
  app.post(
    `/knowledge/${name}`,
    {
      config: {
        rateLimit: context.rateLimit,
      },
    },
    async (request, reply) => {
      const parsed = schema.safeParse(request.body ?? {});
      if (!parsed.success) {
        context.metrics.knowledgeRequests.inc({ operation: name, status: 'invalid' });
        throw new PayloadValidationError(
          `Invalid ${name} request body`,
          parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        );
      }

      const outcome = await run(parsed.data);
      const status = outcome.status === 'success' ? 'success' : outcome.code;
      context.metrics.knowledgeRequests.inc({ operation: name, status });

      if (outcome.status === 'error') {
        request.log.warn({ operation: name, code: outcome.code }, outcome.message);
      }

      return reply.code(outcomeStatusCode(outcome)).send(outcome);
    },
  );
}
