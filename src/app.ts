import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import { v4 as uuidv4 } from 'uuid';
import { GatewayConfig } from './config/env.js';
import { SEED_USERS } from './config/users.js';
import { registerRoutes } from './routes/index.js';
import { TokenService } from './auth/jwt.js';
import { UserStore } from './store/user-store.js';
import { MemoryUserStore } from './store/memory-user-store.js';
import { MemoryResponseCache } from './store/response-cache.js';
import { FetchFunction, OrderServiceClient, SleepFunction } from './integrations/orders/client.js';
import { OrderCache, OrderService } from './integrations/orders/service.js';
import { OrderStatus } from './types/order.js';
import { GetOrderError } from './types/errors.js';

declare module 'fastify' {
  interface FastifyInstance {
    config: GatewayConfig;
    userStore: UserStore;
    tokenService: TokenService;
    orderService: OrderService;
  }
}

export interface BuildAppOptions {
  config: GatewayConfig;
  userStore?: UserStore;
  orderCache?: OrderCache;
  /** Stand-ins for the network and the clock, used by tests. */
  fetch?: FetchFunction;
  sleep?: SleepFunction;
  now?: () => number;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { config } = options;

  const fastify = Fastify({
    logger: config.logLevel === 'silent' ? false : { level: config.logLevel },
    trustProxy: true,
    genReqId: () => uuidv4(),
  });

  if (config.insecureSecret) {
    fastify.log.warn('JWT_SECRET is not set, signing tokens with the development fallback secret');
  }

  const userStore = options.userStore ?? new MemoryUserStore(SEED_USERS);
  const tokenService = new TokenService({ secret: config.jwtSecret, now: options.now });
  const orderClient = new OrderServiceClient({
    baseUrl: config.orderServiceUrl,
    logger: fastify.log,
    timeoutMs: config.upstream.timeoutMs,
    maxAttempts: config.upstream.maxAttempts,
    retryDelayMs: config.upstream.retryDelayMs,
    fetch: options.fetch,
    sleep: options.sleep,
  });
  const orderCache = options.orderCache ?? new MemoryResponseCache<OrderStatus, GetOrderError>();

  fastify.decorate('config', config);
  fastify.decorate('userStore', userStore);
  fastify.decorate('tokenService', tokenService);
  fastify.decorate('orderService', new OrderService(orderClient, orderCache));
  fastify.decorateRequest('user', null);

  fastify.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(statusCode).send({
      detail: statusCode >= 500 ? 'Internal Server Error' : error.message,
    });
  });

  await fastify.register(formbody);

  if (config.allowedOrigins.length > 0) {
    await fastify.register(cors, {
      origin: (origin, callback) => {
        // Requests without Origin (curl, other services) are not subject to CORS
        if (!origin || config.allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new Error('Not allowed by CORS'), false);
        }
      },
      allowedHeaders: ['Content-Type', 'Authorization'],
    });
  }

  await registerRoutes(fastify);

  return fastify;
}
