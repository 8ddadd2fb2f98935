import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ToolOutcome } from '../tools/tool.js';
import { SERVER_INFO } from './protocol-constants.js';
import { isJsonObject } from './protocol.js';

export function toCallToolResult(outcome: ToolOutcome): CallToolResult {
  if (!outcome.ok) {
    return { isError: true, content: [{ type: 'text', text: outcome.error }] };
  }

  const result: CallToolResult = {
    content: [{ type: 'text', text: JSON.stringify(outcome.value) }]
  };
  if (isJsonObject(outcome.value)) {
    result.structuredContent = outcome.value;
  }
  return result;
}

/**
 * Builds an SDK server over the registry. The SDK owns sessions, protocol
 * negotiation and framing; this only answers tools/list and tools/call.
 * Called once per stdio process or once per stateless HTTP stream request.
 */
export function createSdkServer(registry: ToolRegistry, info: { name: string; version: string } = SERVER_INFO): Server {
  const server = new Server({ name: info.name, version: info.version }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.list()
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const outcome = await registry.call(request.params.name, request.params.arguments ?? {});
    return toCallToolResult(outcome);
  });

  return server;
}
