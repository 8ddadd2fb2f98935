import { vi } from 'vitest';
import { configSchema, type AppConfig } from '../src/config/schema.js';
import type { FetchLike } from '../src/http/client.js';
import { isJsonObject, type JsonRpcResponse, type JsonValue } from '../src/mcp/protocol.js';

export function testConfig(overrides: Record<string, string | number> = {}): AppConfig {
  return configSchema.parse({ NODE_ENV: 'test', LOG_LEVEL: 'silent', ...overrides });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

/**
 * Fake fetch answering each call with the next queued reply; the last one repeats.
 */
export function fakeFetch(...replies: Array<() => Response | Promise<Response>>) {
  let index = 0;
  return vi.fn<FetchLike>(async () => {
    const reply = replies[Math.min(index, replies.length - 1)];
    index += 1;
    if (!reply) throw new Error('no reply queued');
    return reply();
  });
}

export function resultOf(response: JsonRpcResponse): JsonValue {
  if (!('result' in response)) {
    throw new Error(`expected a result, got error ${response.error.code}: ${response.error.message}`);
  }
  return response.result;
}

export function listedToolNames(response: JsonRpcResponse): string[] {
  const result = resultOf(response);
  if (!isJsonObject(result) || !Array.isArray(result.tools)) {
    throw new Error('tools.list result has no tools array');
  }
  return result.tools.map((tool) => (isJsonObject(tool) && typeof tool.name === 'string' ? tool.name : ''));
}

export const AGR_ISSUE_WIRE = {
  context: 'Tá an peann ar an mbord',
  contextoffset: '0',
  errorlength: '2',
  fromx: '0',
  fromy: '0',
  msg: 'Agreement',
  ruleId: 'AGR',
  tox: '2',
  toy: '0'
};

/** 200 response whose body starts but never finishes. */
export function stalledResponse(): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('['));
    }
  });
  return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } });
}

/** Response that records whether its body was cancelled. */
export function cancellableResponse(status: number) {
  const state = { cancelled: false };
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"error":"busy"}'));
    },
    cancel() {
      state.cancelled = true;
    }
  });
  return { response: new Response(body, { status }), state };
}

/** A valid tools.list line whose params nest `depth` arrays deep. */
export function deeplyNestedRequest(depth: number): string {
  return `{"jsonrpc":"2.0","id":1,"method":"tools.list","params":{"x":${'['.repeat(depth)}${']'.repeat(depth)}}}`;
}
