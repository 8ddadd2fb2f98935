import type { AppConfig } from './config/schema.js';
import type { FetchLike } from './http/client.js';
import type { Logger } from './logging.js';
import { RpcDispatcher } from './mcp/dispatcher.js';
import { buildRegistry, type ToolRegistry } from './tools/registry.js';

export interface Services {
  registry: ToolRegistry;
  dispatcher: RpcDispatcher;
}

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  services: Services;
}

export function createAppContext(config: AppConfig, logger: Logger, fetchImpl?: FetchLike): AppContext {
  const registry = buildRegistry(config, { logger, fetchImpl });
  const dispatcher = new RpcDispatcher(registry, { logger: logger.child({ component: 'dispatcher' }) });
  return { config, logger, services: { registry, dispatcher } };
}
