import type { FastifyInstance } from 'fastify';
import { SERVER_INFO } from '../../mcp/protocol-constants.js';
import type { AppContext } from '../../app-context.js';

export async function registerHealthRoutes(app: FastifyInstance, ctx: AppContext): Promise<void> {
  const handler = async () => {
    const report = await ctx.services.registry.checkHealth();
    const tools = Object.fromEntries(report.map((entry) => [entry.name, entry.healthy ? 'healthy' : 'unhealthy']));
    return {
      status: report.every((entry) => entry.healthy) ? 'healthy' : 'degraded',
      version: SERVER_INFO.version,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      tools
    };
  };

  app.get('/health', handler);
  app.get('/healthz', handler);
}
