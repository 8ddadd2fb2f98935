#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createAppContext, type AppContext } from './app-context.js';
import { runCli } from './cli.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './logging.js';
import { createSdkServer } from './mcp/sdk-server.js';
import { buildServer } from './server/fastify.js';
import { runLineLoop } from './transport/stdio.js';

async function serveHttp(ctx: AppContext): Promise<void> {
  const app = await buildServer(ctx);
  const address = await app.listen({ host: ctx.config.HOST, port: ctx.config.PORT });
  ctx.logger.info({ address }, 'gateway listening');

  const shutdown = async () => {
    ctx.logger.info('shutting down gateway');
    await app.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      ctx.logger.error({ err: error }, 'shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

async function serveSdkStdio(ctx: AppContext): Promise<void> {
  const server = createSdkServer(ctx.services.registry);
  server.onerror = (error) => {
    ctx.logger.error({ err: error }, 'mcp stdio transport error');
  };
  await server.connect(new StdioServerTransport());
}

async function main() {
  if (process.argv.length > 2) {
    const code = await runCli(process.argv.slice(2), {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
      env: process.env
    });
    process.exit(code);
  }

  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL);
  const ctx = createAppContext(config, logger);

  logger.info(
    {
      mode: config.MODE,
      port: config.PORT,
      tools: ctx.services.registry.names(),
      grammarUpstream: config.GRAMADOIR_BASE_URL ?? null,
      spellcheckUpstream: config.SPELLCHECK_BASE_URL ?? null
    },
    'booting gateway'
  );

  switch (config.MODE) {
    case 'server':
      await serveHttp(ctx);
      break;
    case 'stdio':
      await runLineLoop(ctx.services.dispatcher, process.stdin, process.stdout, logger.child({ component: 'stdio' }));
      break;
    case 'mcp-stdio':
      await serveSdkStdio(ctx);
      break;
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
