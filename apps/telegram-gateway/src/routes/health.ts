import type { GatewayFastifyInstance } from '../server/types';

export interface HealthRouteContext {
  /** Reports whether the agent backend answers; backs `/readyz`. */
  probe?: () => Promise<boolean>;
}

/** Register `/healthz` (liveness) and `/readyz` (agent backend reachability). */
export async function registerHealthRoutes(
  app: GatewayFastifyInstance,
  context: HealthRouteContext = {},
): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (_, reply) => {
    if (!context.probe) {
      return { status: 'ready' };
    }

    const available = await context.probe();
    return reply.code(available ? 200 : 503).send({ status: available ? 'ready' : 'unavailable' });
  });
}
