import { z } from 'zod';
import { ErrorCode, describeError } from './errors.js';
import type { JsonRpcErrorResponse, JsonRpcId, JsonRpcRequest, JsonRpcResponse, JsonValue } from './protocol.js';

export const MAX_JSON_DEPTH = 256;

/**
 * Walks the value with an explicit stack so hostile nesting cannot overflow
 * the call stack. Containers deeper than `maxDepth` are rejected.
 */
export function isJsonValue(value: unknown, maxDepth = MAX_JSON_DEPTH): value is JsonValue {
  const pending: Array<{ value: unknown; depth: number }> = [{ value, depth: 0 }];

  for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
    const current = next.value;
    if (current === null || typeof current === 'string' || typeof current === 'boolean') continue;
    if (typeof current === 'number') {
      if (!Number.isFinite(current)) return false;
      continue;
    }
    if (typeof current !== 'object' || next.depth >= maxDepth) return false;

    const children: unknown[] = Array.isArray(current) ? current : Object.values(current);
    for (const child of children) {
      pending.push({ value: child, depth: next.depth + 1 });
    }
  }
  return true;
}

const jsonValueSchema = z.custom<JsonValue>((value) => isJsonValue(value), {
  message: `expected JSON nested at most ${MAX_JSON_DEPTH} levels`
});

const requestIdSchema = jsonValueSchema.refine(
  (id) => typeof id !== 'number' || !Number.isInteger(id) || Number.isSafeInteger(id),
  { message: 'integer id outside the exactly representable range' }
);

const jsonRpcSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: requestIdSchema.optional(),
  method: z.string(),
  params: jsonValueSchema.optional()
});

export type DecodeResult = { ok: true; request: JsonRpcRequest } | { ok: false; message: string };

export function decodeRpcRequest(raw: string | Buffer): DecodeResult {
  let body: unknown;
  try {
    body = JSON.parse(raw.toString());
  } catch (error) {
    return { ok: false, message: `parse error: ${describeError(error)}` };
  }

  let parsed: ReturnType<typeof jsonRpcSchema.safeParse>;
  try {
    parsed = jsonRpcSchema.safeParse(body);
  } catch (error) {
    return { ok: false, message: `parse error: ${describeError(error)}` };
  }
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, message: `parse error: ${where}${issue?.message ?? 'invalid request'}` };
  }

  const { jsonrpc, id, method, params } = parsed.data;
  const request: JsonRpcRequest = { jsonrpc, method, params: params ?? {} };
  if (id !== undefined) request.id = id;
  return { ok: true, request };
}

export function rpcSuccess(id: JsonRpcId | undefined, result: JsonValue): JsonRpcResponse {
  return { jsonrpc: '2.0', id: id ?? null, result };
}

export function rpcFailure(id: JsonRpcId | undefined, code: number, message: string, data?: JsonValue): JsonRpcErrorResponse {
  const response: JsonRpcErrorResponse = { jsonrpc: '2.0', id: id ?? null, error: { code, message } };
  if (data !== undefined) response.error.data = data;
  return response;
}

export function parseErrorResponse(message: string): JsonRpcErrorResponse {
  return rpcFailure(null, ErrorCode.ParseError, message);
}
