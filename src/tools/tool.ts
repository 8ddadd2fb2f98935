import type { JsonValue, ToolDefinition, ToolInputSchema } from '../mcp/protocol.js';

export type ToolOutcome = { ok: true; value: JsonValue } | { ok: false; error: string };

/**
 * A named capability. `call` reports failures through the outcome and
 * never rejects; `health` is only implemented by remote-backed tools.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  call(args: unknown): Promise<ToolOutcome>;
  health?(): Promise<boolean>;
}

export function success(value: JsonValue): ToolOutcome {
  return { ok: true, value };
}

export function failure(error: string): ToolOutcome {
  return { ok: false, error };
}

export function describeTool(tool: Tool): ToolDefinition {
  return { name: tool.name, description: tool.description, inputSchema: tool.inputSchema };
}

export async function checkToolHealth(tool: Tool): Promise<boolean> {
  return tool.health ? tool.health() : true;
}

export const TEXT_INPUT_SCHEMA: ToolInputSchema = {
  type: 'object',
  properties: {
    text: { type: 'string', description: 'Irish-language text to check' }
  },
  required: ['text']
};
