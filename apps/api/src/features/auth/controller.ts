import { ApiException, type ApiServer, messageResponseSchema } from '../../core/http.js';
import type { AppContext } from '../../context.js';
import { requireUser } from './guard.js';
import { checkAuthResponseSchema, credentialsSchema } from './schemas.js';
import { authenticateUser, registerUser } from './usecase.js';

export function registerAuthRoutes(server: ApiServer, ctx: AppContext): void {
  server.post(
    '/register',
    {
      schema: {
        body: credentialsSchema,
        response: { 201: messageResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await registerUser(ctx.store, request.body);
      if (result.isErr()) {
        throw new ApiException(result.error);
      }

      request.log.info({ user: result.value }, 'User registered');
      return reply.code(201).send({ message: 'User registered successfully' });
    }
  );

  server.post(
    '/login',
    {
      schema: {
        body: credentialsSchema,
        response: { 200: messageResponseSchema },
      },
    },
    async (request, reply) => {
      const result = await authenticateUser(ctx.store, request.body);
      if (result.isErr()) {
        throw new ApiException(result.error);
      }

      await request.session.regenerate();
      request.session.set('user', result.value);
      return reply.code(200).send({ message: 'Login successful' });
    }
  );
}

/** Routes that only make sense with a session; mounted behind the session guard. */
export function registerSessionRoutes(server: ApiServer): void {
  server.get(
    '/logout',
    { schema: { response: { 200: messageResponseSchema } } },
    async (request, reply) => {
      const user = requireUser(request);
      await request.session.destroy();
      request.log.info({ user }, 'User logged out');
      return reply.code(200).send({ message: 'Logged out successfully' });
    }
  );

  server.get(
    '/check-auth',
    { schema: { response: { 200: checkAuthResponseSchema } } },
    async (request, reply) => {
      const user = requireUser(request);
      return reply.code(200).send({ authenticated: true, user });
    }
  );
}
