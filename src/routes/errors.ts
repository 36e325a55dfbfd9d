import { FastifyReply } from 'fastify';
import { GatewayError } from '../types/errors.js';

export const ORDER_NOT_FOUND_DETAIL = 'Order not found';

/**
 * The one place where component failures become HTTP responses.
 */
export function sendGatewayError(reply: FastifyReply, error: GatewayError): FastifyReply {
  switch (error.kind) {
    case 'Unauthenticated':
      return reply
        .status(401)
        .header('WWW-Authenticate', 'Bearer')
        .send({
          detail:
            error.reason === 'missing_credentials'
              ? 'Not authenticated'
              : 'Could not validate credentials',
        });
    case 'Forbidden':
      return reply.status(403).send({ detail: 'Inactive user' });
    case 'NotFound':
      return reply.status(404).send({ detail: ORDER_NOT_FOUND_DETAIL });
    case 'UpstreamUnavailable':
      return reply.status(503).send({ detail: `Service unavailable: ${error.reason}` });
    case 'InvalidUpstreamResponse':
      return reply.status(502).send({ detail: 'Invalid response from order service' });
    case 'UpstreamError':
      // Relay the body untouched; the caller reads upstream's own error format
      if (error.contentType) {
        reply.header('content-type', error.contentType);
      }
      return reply.status(error.status).send(error.body);
  }
}
