import type { FastifyInstance } from 'fastify';
import { decodeRpcRequest, parseErrorResponse } from '../../mcp/envelope.js';
import type { AppContext } from '../../app-context.js';

/**
 * POST /mcp: one JSON-RPC envelope per request. RPC-level failures travel in
 * a 200 body; only an undecodable body gets HTTP 400.
 */
export async function registerRpcRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const { dispatcher } = ctx.services;

  await app.register(async (scope) => {
    // Raw body: decoding belongs to the envelope layer, shared with stdio.
    scope.removeContentTypeParser('application/json');
    scope.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    scope.post('/mcp', async (request, reply) => {
      const raw = typeof request.body === 'string' ? request.body : '';
      const decoded = decodeRpcRequest(raw);
      if (!decoded.ok) {
        return reply.code(400).send(parseErrorResponse(decoded.message));
      }

      const response = await dispatcher.dispatch(decoded.request);
      return reply.code(200).send(response);
    });
  });
}
