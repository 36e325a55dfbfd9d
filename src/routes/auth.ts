import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { authenticateUser } from '../auth/credentials.js';
import { createVerifyAuth } from '../auth/verifyAuth.js';
import { sendGatewayError } from './errors.js';

const loginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export async function authRoutes(fastify: FastifyInstance) {
  const userStore = fastify.userStore;
  const tokenService = fastify.tokenService;
  const tokenTtlSeconds = fastify.config.accessTokenExpireMinutes * 60;

  const verifyAuth = createVerifyAuth({ tokenService, userStore });

  // POST /auth/login (application/x-www-form-urlencoded)
  fastify.post('/login', async (request, reply) => {
    const validationResult = loginSchema.safeParse(request.body);
    if (!validationResult.success) {
      return reply.status(422).send({
        detail: 'Validation failed',
        errors: validationResult.error.errors,
      });
    }

    const { username, password } = validationResult.data;
    const result = await authenticateUser(userStore, username, password);
    if (!result.ok) {
      request.log.warn({ username }, '[auth/login] invalid credentials');
      return reply
        .status(401)
        .header('WWW-Authenticate', 'Bearer')
        .send({ detail: 'Incorrect username or password' });
    }

    const accessToken = tokenService.issueToken(result.value.username, tokenTtlSeconds);
    request.log.info({ username }, '[auth/login] token issued');

    return reply.send({
      access_token: accessToken,
      token_type: 'bearer',
    });
  });

  // GET /auth/me
  fastify.get('/me', { preHandler: verifyAuth }, async (request, reply) => {
    if (!request.user) {
      return sendGatewayError(reply, { kind: 'Unauthenticated', reason: 'missing_credentials' });
    }
    return reply.send(request.user);
  });
}
