import type { AppContext } from '../../context.js';
import type { ApiServer } from '../../core/http.js';
import type { HealthResponse } from '../../core/types.js';
import { updateExternalServiceHealth } from '../../lib/metrics.js';
import { isStoreReachable } from '../../store/index.js';
import { healthResponseSchema } from './schemas.js';

export async function checkHealth(ctx: Pick<AppContext, 'store'>): Promise<HealthResponse> {
  const store = await isStoreReachable(ctx.store);
  updateExternalServiceHealth('store', store);

  return {
    status: store ? 'healthy' : 'unhealthy',
    timestamp: Date.now(),
    services: { store },
  };
}

export function registerHealthRoutes(server: ApiServer, ctx: AppContext): void {
  server.get(
    '/health',
    { schema: { response: { 200: healthResponseSchema } } },
    async (_request, reply) => reply.code(200).send(await checkHealth(ctx))
  );
}
