import { isJsonObject, type ToolInputSchema } from '../mcp/protocol.js';

export type ArgumentCheck = { valid: true } | { valid: false; reason: string };

function matchesType(expected: string, value: unknown): boolean {
  switch (expected) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isJsonObject(value);
    default:
      return true;
  }
}

export function validateArguments(schema: ToolInputSchema, args: unknown): ArgumentCheck {
  const value = args ?? {};
  if (!isJsonObject(value)) {
    return { valid: false, reason: 'arguments must be an object' };
  }

  for (const key of schema.required) {
    if (!(key in value)) return { valid: false, reason: `missing required field: ${key}` };
  }

  for (const [key, propValue] of Object.entries(value)) {
    const property = schema.properties[key];
    if (!property) continue;
    if (!matchesType(property.type, propValue)) {
      return { valid: false, reason: `${key} must be ${property.type}` };
    }
  }

  return { valid: true };
}

export type TextArgument = { ok: true; text: string } | { ok: false; error: string };

export function readTextArgument(schema: ToolInputSchema, args: unknown): TextArgument {
  const check = validateArguments(schema, args);
  if (!check.valid) return { ok: false, error: `invalid arguments: ${check.reason}` };

  const text = isJsonObject(args) ? args.text : undefined;
  if (typeof text !== 'string') {
    return { ok: false, error: 'invalid arguments: missing required field: text' };
  }
  return { ok: true, text };
}
