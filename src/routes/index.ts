import { FastifyInstance } from 'fastify';
import { healthRoutes } from './health.js';
import { authRoutes } from './auth.js';
import { ordersRoutes } from './orders.js';

export async function registerRoutes(fastify: FastifyInstance) {
  // Public
  await fastify.register(healthRoutes);

  // /auth/login is public, /auth/me is guarded inside
  await fastify.register(authRoutes, { prefix: '/auth' });

  await fastify.register(ordersRoutes, { prefix: '/orders' });
}
