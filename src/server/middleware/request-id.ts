import fp from 'fastify-plugin';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { REQUEST_ID_HEADER, generateRequestId } from '../../http/client.js';
import type { AppContext } from '../../app-context.js';

declare module 'fastify' {
  interface FastifyRequest {
    correlationId: string;
  }
}

function inboundRequestId(request: FastifyRequest): string | null {
  const header = request.headers[REQUEST_ID_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed.length <= 128 ? trimmed : null;
}

export const requestIdPlugin = fp<{ ctx: AppContext }>(async (fastify, opts) => {
  const logger = opts.ctx.logger.child({ component: 'http' });
  fastify.decorateRequest('correlationId', '');

  fastify.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
    request.correlationId = inboundRequestId(request) ?? generateRequestId();
    reply.header(REQUEST_ID_HEADER, request.correlationId);
  });

  fastify.addHook('onResponse', async (request: FastifyRequest, reply: FastifyReply) => {
    logger.info(
      {
        requestId: request.correlationId,
        method: request.method,
        url: request.url,
        status: reply.statusCode,
        durationMs: Math.round(reply.elapsedTime)
      },
      'request completed'
    );
  });
});
