import type { AppContext } from '../../context.js';
import { ApiException, type ApiServer } from '../../core/http.js';
import { requireUser } from '../auth/guard.js';
import { historyResponseSchema } from './schemas.js';
import { listHistory } from './usecase.js';

export function registerHistoryRoutes(server: ApiServer, ctx: AppContext): void {
  server.get(
    '/history',
    { schema: { response: { 200: historyResponseSchema } } },
    async (request, reply) => {
      const result = await listHistory(ctx.store.history, requireUser(request));
      if (result.isErr()) {
        throw new ApiException(result.error);
      }

      return reply.code(200).send(result.value);
    }
  );
}
