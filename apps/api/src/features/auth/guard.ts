import type { FastifyRequest } from 'fastify';
import { type Username, createUsername } from '../../core/branded-types.js';
import { ErrorCode, createError } from '../../core/errors.js';
import { ApiException, type ApiServer } from '../../core/http.js';

declare module 'fastify' {
  interface Session {
    user?: string;
  }
}

export function requireUser(request: Pick<FastifyRequest, 'session'>): Username {
  const user = request.session.get('user');
  if (!user) {
    throw new ApiException(createError(ErrorCode.Unauthorized, 'Authentication required'));
  }

  return createUsername(user);
}

/**
 * Rejects unauthenticated requests in `scope` before body validation runs.
 */
export function registerSessionGuard(scope: ApiServer): void {
  scope.addHook('onRequest', async (request) => {
    requireUser(request);
  });
}
