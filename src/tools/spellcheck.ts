import type { GaelspellClient } from '../clients/gaelspell.js';
import { describeError } from '../mcp/errors.js';
import { readTextArgument } from './arguments.js';
import { TEXT_INPUT_SCHEMA, failure, success, type Tool, type ToolOutcome } from './tool.js';

export const SPELLCHECK_TOOL_NAME = 'spell.check';

export class LocalSpellcheckTool implements Tool {
  readonly name = SPELLCHECK_TOOL_NAME;
  readonly description = 'Irish spellcheck (local stub, always returns no corrections)';
  readonly inputSchema = TEXT_INPUT_SCHEMA;

  async call(args: unknown): Promise<ToolOutcome> {
    const input = readTextArgument(this.inputSchema, args);
    if (!input.ok) return failure(input.error);
    return success({ corrections: [] });
  }
}

export class RemoteSpellcheckTool implements Tool {
  readonly name = SPELLCHECK_TOOL_NAME;
  readonly description = 'Irish spellcheck via GaelSpell; returns {"corrections": [...]}';
  readonly inputSchema = TEXT_INPUT_SCHEMA;

  constructor(private readonly client: GaelspellClient) {}

  async call(args: unknown): Promise<ToolOutcome> {
    const input = readTextArgument(this.inputSchema, args);
    if (!input.ok) return failure(input.error);

    try {
      const corrections = await this.client.check(input.text);
      return success({ corrections });
    } catch (error) {
      return failure(`${this.name} failed: ${describeError(error)}`);
    }
  }

  health(): Promise<boolean> {
    return this.client.health();
  }
}
