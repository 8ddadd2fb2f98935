import type { FastifyInstance } from 'fastify';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { rpcFailure } from '../../mcp/envelope.js';
import { ErrorCode, describeError } from '../../mcp/errors.js';
import { createSdkServer } from '../../mcp/sdk-server.js';
import type { AppContext } from '../../app-context.js';

export const STREAM_PATH = '/mcp/stream';

/**
 * Streamable HTTP served by the protocol SDK in stateless mode: a fresh
 * server and transport per request, torn down when the response closes.
 */
export async function registerStreamRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const logger = ctx.logger.child({ component: 'mcp-stream' });

  app.post(STREAM_PATH, async (request, reply) => {
    const server = createSdkServer(ctx.services.registry);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    reply.raw.on('close', () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn({ err: describeError(error) }, 'failed to close stream transport');
      });
    });

    reply.hijack();
    try {
      await server.connect(transport);
      await transport.handleRequest(request.raw, reply.raw, request.body);
    } catch (error) {
      logger.error({ requestId: request.correlationId, err: describeError(error) }, 'stream request failed');
      if (!reply.raw.headersSent) {
        reply.raw.writeHead(500, { 'content-type': 'application/json' });
        reply.raw.end(JSON.stringify(rpcFailure(null, ErrorCode.InternalError, 'internal error')));
      }
    }
  });

  const methodNotAllowed = rpcFailure(null, ErrorCode.InvalidRequest, 'method not allowed: stateless stream endpoint accepts POST only');

  app.get(STREAM_PATH, async (_request, reply) => reply.code(405).send(methodNotAllowed));
  app.delete(STREAM_PATH, async (_request, reply) => reply.code(405).send(methodNotAllowed));
}
