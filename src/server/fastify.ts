import Fastify from 'fastify';
import { requestIdPlugin } from './middleware/request-id.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerRpcRoutes } from './routes/rpc.js';
import { registerStreamRoutes } from './routes/stream.js';
import type { AppContext } from '../app-context.js';

export async function buildServer(ctx: AppContext) {
  const app = Fastify({
    logger: false
  });

  await app.register(requestIdPlugin, { ctx });
  await registerHealthRoutes(app, ctx);
  await registerRpcRoutes(app, ctx);
  await registerStreamRoutes(app, ctx);

  return app;
}
