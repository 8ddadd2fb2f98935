import { GaelspellClient } from '../clients/gaelspell.js';
import { GramadoirClient } from '../clients/gramadoir.js';
import type { AppConfig } from '../config/schema.js';
import { HttpClient, type FetchLike } from '../http/client.js';
import { describeError } from '../mcp/errors.js';
import type { ToolDefinition } from '../mcp/protocol.js';
import type { Logger } from '../logging.js';
import { LocalGrammarTool, RemoteGrammarTool } from './grammar.js';
import { LocalSpellcheckTool, RemoteSpellcheckTool } from './spellcheck.js';
import { checkToolHealth, describeTool, failure, type Tool, type ToolOutcome } from './tool.js';

export interface ToolHealth {
  name: string;
  healthy: boolean;
}

/**
 * Name → tool table. Built once; never mutated afterwards, so concurrent
 * requests share it freely.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, Tool>;

  private constructor(tools: Map<string, Tool>) {
    this.tools = tools;
  }

  /** Later tools replace earlier ones with the same name. */
  static fromTools(tools: Iterable<Tool>): ToolRegistry {
    const map = new Map<string, Tool>();
    for (const tool of tools) {
      map.set(tool.name, tool);
    }
    return new ToolRegistry(map);
  }

  get size(): number {
    return this.tools.size;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  list(): ToolDefinition[] {
    return [...this.tools.values()].map(describeTool);
  }

  async call(name: string, args: unknown): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    if (!tool) return failure(`unknown tool: ${name}`);

    try {
      return await tool.call(args);
    } catch (error) {
      return failure(`${name} failed: ${describeError(error)}`);
    }
  }

  async checkHealth(): Promise<ToolHealth[]> {
    return Promise.all(
      [...this.tools.values()].map(async (tool) => {
        try {
          return { name: tool.name, healthy: await checkToolHealth(tool) };
        } catch {
          return { name: tool.name, healthy: false };
        }
      })
    );
  }
}

export interface RegistryDeps {
  logger: Logger;
  fetchImpl?: FetchLike;
}

/**
 * Local stubs first, then a remote tool for every configured upstream.
 */
export function buildRegistry(config: AppConfig, deps: RegistryDeps): ToolRegistry {
  const http = new HttpClient({ timeoutMs: config.UPSTREAM_TIMEOUT_MS, fetchImpl: deps.fetchImpl, logger: deps.logger });
  const upstream = { retries: config.UPSTREAM_RETRIES };
  const tools: Tool[] = [new LocalGrammarTool(), new LocalSpellcheckTool()];

  if (config.GRAMADOIR_BASE_URL) {
    const client = new GramadoirClient(config.GRAMADOIR_BASE_URL, http, upstream, deps.logger.child({ service: 'gramadoir' }));
    tools.push(new RemoteGrammarTool(client));
  }

  if (config.SPELLCHECK_BASE_URL) {
    const client = new GaelspellClient(config.SPELLCHECK_BASE_URL, http, upstream, deps.logger.child({ service: 'gaelspell' }));
    tools.push(new RemoteSpellcheckTool(client));
  }

  return ToolRegistry.fromTools(tools);
}
