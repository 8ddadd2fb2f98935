import type { GramadoirClient } from '../clients/gramadoir.js';
import { describeError } from '../mcp/errors.js';
import { readTextArgument } from './arguments.js';
import { TEXT_INPUT_SCHEMA, failure, success, type Tool, type ToolOutcome } from './tool.js';

export const GRAMMAR_TOOL_NAME = 'grammar.check';

/** Placeholder used when no grammar upstream is configured. */
export class LocalGrammarTool implements Tool {
  readonly name = GRAMMAR_TOOL_NAME;
  readonly description = 'Irish grammar check (local stub, always returns no issues)';
  readonly inputSchema = TEXT_INPUT_SCHEMA;

  async call(args: unknown): Promise<ToolOutcome> {
    const input = readTextArgument(this.inputSchema, args);
    if (!input.ok) return failure(input.error);
    return success({ issues: [] });
  }
}

export class RemoteGrammarTool implements Tool {
  readonly name = GRAMMAR_TOOL_NAME;
  readonly description = 'Irish grammar check via Gramadóir; returns {"issues": [...]}';
  readonly inputSchema = TEXT_INPUT_SCHEMA;

  constructor(private readonly client: GramadoirClient) {}

  async call(args: unknown): Promise<ToolOutcome> {
    const input = readTextArgument(this.inputSchema, args);
    if (!input.ok) return failure(input.error);

    try {
      const issues = await this.client.check(input.text);
      return success({ issues });
    } catch (error) {
      return failure(`${this.name} failed: ${describeError(error)}`);
    }
  }

  health(): Promise<boolean> {
    return this.client.health();
  }
}
