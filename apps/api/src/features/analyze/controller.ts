import type { AppContext } from '../../context.js';
import { ApiException, type ApiServer } from '../../core/http.js';
import { requireUser } from '../auth/guard.js';
import { analyzeRequestSchema, analyzeResponseSchema } from './schemas.js';
import { analyzeArticle } from './usecase.js';

export function registerAnalyzeRoutes(server: ApiServer, ctx: AppContext): void {
  server.post(
    '/analyze',
    {
      schema: {
        body: analyzeRequestSchema,
        response: { 200: analyzeResponseSchema },
      },
    },
    async (request, reply) => {
      const user = requireUser(request);
      const { url, analyzer_type, model } = request.body;
      const analyzerKind = analyzer_type ?? ctx.config.defaultAnalyzer;

      const result = await analyzeArticle(
        { extractor: ctx.extractor, analyzer: ctx.analyzer, history: ctx.store.history },
        user,
        { url, analyzerKind, model: model || undefined }
      );

      if (result.isErr()) {
        throw new ApiException(result.error);
      }

      request.log.info(
        { user, analyzerKind, left: result.value.results.left, right: result.value.results.right },
        'Analysis recorded'
      );
      return reply.code(200).send(result.value);
    }
  );
}
