import { FastifyInstance } from 'fastify';
import { createVerifyAuth } from '../auth/verifyAuth.js';
import { orderCreateSchema } from '../types/order.js';
import { sendGatewayError } from './errors.js';

export async function ordersRoutes(fastify: FastifyInstance) {
  const orderService = fastify.orderService;

  const verifyAuth = createVerifyAuth({
    tokenService: fastify.tokenService,
    userStore: fastify.userStore,
  });

  // POST /orders
  fastify.post('/', { preHandler: verifyAuth }, async (request, reply) => {
    const validationResult = orderCreateSchema.safeParse(request.body);
    if (!validationResult.success) {
      return reply.status(422).send({
        detail: 'Validation failed',
        errors: validationResult.error.errors,
      });
    }

    const result = await orderService.createOrder(validationResult.data, request.id);
    if (!result.ok) {
      request.log.warn({ error: result.error.kind }, '[orders] create failed');
      return sendGatewayError(reply, result.error);
    }

    request.log.info({ orderId: result.value.id }, '[orders] created');
    return reply.send(result.value);
  });

  // GET /orders/:orderId
  fastify.get<{ Params: { orderId: string } }>(
    '/:orderId',
    { preHandler: verifyAuth },
    async (request, reply) => {
      const { orderId } = request.params;

      const result = await orderService.getOrder(orderId, request.id);
      if (!result.ok) {
        if (result.error.kind !== 'NotFound') {
          request.log.warn({ orderId, error: result.error.kind }, '[orders] lookup failed');
        }
        return sendGatewayError(reply, result.error);
      }

      request.log.debug({ orderId, source: result.value.source }, '[orders] lookup');
      return reply.send(result.value.order);
    }
  );
}
