import fastifyCookie from '@fastify/cookie';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import fastifySession from '@fastify/session';
import Fastify from 'fastify';
import {
  type ZodTypeProvider,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { AppContext } from './context.js';
import { type ApiError, ErrorCode, createError, toErrorBody } from './core/errors.js';
import { ApiException, type ApiServer } from './core/http.js';
import { registerAnalyzeRoutes } from './features/analyze/controller.js';
import { registerAuthRoutes, registerSessionRoutes } from './features/auth/controller.js';
import { registerSessionGuard } from './features/auth/guard.js';
import { registerHealthRoutes } from './features/health/controller.js';
import { registerHistoryRoutes } from './features/history/controller.js';
import { metricsPlugin } from './lib/metrics-plugin.js';

const SESSION_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

const statusCodeOf = (error: Error): number =>
  'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : 500;

/**
 * Maps anything that reaches Fastify's error handler onto the ApiError body.
 * Route handlers throw ApiException; schema validation and the rate limiter
 * raise their own errors.
 */
export function toApiError(error: Error): ApiError {
  if (error instanceof ApiException) {
    return error.apiError;
  }

  if ('validation' in error) {
    return createError(ErrorCode.ValidationError, error.message);
  }

  const statusCode = statusCodeOf(error);
  if (statusCode === 429) {
    return createError(ErrorCode.RateLimitExceeded, error.message);
  }
  if (statusCode >= 400 && statusCode < 500) {
    return createError(ErrorCode.ValidationError, error.message);
  }

  return createError(ErrorCode.InternalError, 'Internal server error');
}

export async function createServer(ctx: AppContext): Promise<ApiServer> {
  const { config } = ctx;

  const server = Fastify({
    loggerInstance: ctx.logger,
  }).withTypeProvider<ZodTypeProvider>();

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.setErrorHandler((error: Error, request, reply) => {
    const apiError = toApiError(error);
    if (apiError.statusCode >= 500) {
      request.log.error({ err: error, code: apiError.code }, 'Request failed');
    } else {
      request.log.info({ code: apiError.code, reason: apiError.message }, 'Request rejected');
    }

    return reply.code(apiError.statusCode).send(toErrorBody(apiError));
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
  });

  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitTimeWindow,
  });

  await server.register(fastifyCookie);
  await server.register(fastifySession, {
    secret: config.sessionSecret,
    cookieName: 'sessionId',
    saveUninitialized: false,
    cookie: {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: config.sessionCookieSecure,
      maxAge: SESSION_MAX_AGE_MS,
    },
  });

  await server.register(metricsPlugin);

  registerHealthRoutes(server, ctx);
  registerAuthRoutes(server, ctx);

  await server.register(async (authenticated) => {
    registerSessionGuard(authenticated);
    registerSessionRoutes(authenticated);
    registerAnalyzeRoutes(authenticated, ctx);
    registerHistoryRoutes(authenticated, ctx);
  });

  server.addHook('onClose', async () => {
    await ctx.store.close();
  });

  return server;
}
