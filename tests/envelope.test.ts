import { describe, expect, it } from 'vitest';
import { MAX_JSON_DEPTH, decodeRpcRequest, isJsonValue, parseErrorResponse, rpcFailure, rpcSuccess } from '../src/mcp/envelope.js';
import { deeplyNestedRequest } from './helpers.js';

describe('decodeRpcRequest', () => {
  it('decodes a full request', () => {
    const decoded = decodeRpcRequest('{"jsonrpc":"2.0","id":"a-1","method":"tools.call","params":{"name":"x"}}');
    expect(decoded).toEqual({
      ok: true,
      request: { jsonrpc: '2.0', id: 'a-1', method: 'tools.call', params: { name: 'x' } }
    });
  });

  it('defaults params and leaves a missing id unset', () => {
    const decoded = decodeRpcRequest(Buffer.from('{"jsonrpc":"2.0","method":"tools.list"}'));
    expect(decoded).toEqual({ ok: true, request: { jsonrpc: '2.0', method: 'tools.list', params: {} } });
    expect(decoded.ok && 'id' in decoded.request).toBe(false);
  });

  it('keeps an explicit null id', () => {
    const decoded = decodeRpcRequest('{"jsonrpc":"2.0","id":null,"method":"shutdown"}');
    expect(decoded.ok && decoded.request.id).toBeNull();
  });

  it('rejects text that is not JSON', () => {
    const decoded = decodeRpcRequest('not json');
    expect(decoded.ok).toBe(false);
    expect(!decoded.ok && decoded.message).toMatch(/^parse error: /);
  });

  it('rejects the wrong protocol version', () => {
    const decoded = decodeRpcRequest('{"jsonrpc":"1.0","method":"tools.list"}');
    expect(!decoded.ok && decoded.message).toMatch(/^parse error: jsonrpc: /);
  });

  it('rejects a missing method', () => {
    const decoded = decodeRpcRequest('{"jsonrpc":"2.0","id":1}');
    expect(!decoded.ok && decoded.message).toMatch(/^parse error: method: /);
  });

  it('rejects nesting beyond the depth limit without throwing', () => {
    expect(decodeRpcRequest(deeplyNestedRequest(20000))).toEqual({
      ok: false,
      message: `parse error: params: expected JSON nested at most ${MAX_JSON_DEPTH} levels`
    });
  });

  it('accepts ordinary nesting', () => {
    expect(decodeRpcRequest(deeplyNestedRequest(10)).ok).toBe(true);
  });

  it('rejects integer ids that lost precision', () => {
    expect(decodeRpcRequest('{"jsonrpc":"2.0","id":9007199254740993,"method":"shutdown"}')).toEqual({
      ok: false,
      message: 'parse error: id: integer id outside the exactly representable range'
    });
    expect(decodeRpcRequest('{"jsonrpc":"2.0","id":9007199254740991,"method":"shutdown"}').ok).toBe(true);
    expect(decodeRpcRequest('{"jsonrpc":"2.0","id":1.5,"method":"shutdown"}').ok).toBe(true);
  });

  it('rejects a non-object envelope', () => {
    expect(decodeRpcRequest('[1,2,3]').ok).toBe(false);
  });
});

describe('response builders', () => {
  it('builds a success', () => {
    expect(rpcSuccess(5, { ok: true })).toEqual({ jsonrpc: '2.0', id: 5, result: { ok: true } });
    expect(rpcSuccess(undefined, null)).toEqual({ jsonrpc: '2.0', id: null, result: null });
  });

  it('builds a failure with optional data', () => {
    expect(rpcFailure('x', -32602, 'bad')).toEqual({ jsonrpc: '2.0', id: 'x', error: { code: -32602, message: 'bad' } });
    expect(rpcFailure('x', -32602, 'bad', { field: 'name' })).toEqual({
      jsonrpc: '2.0',
      id: 'x',
      error: { code: -32602, message: 'bad', data: { field: 'name' } }
    });
  });

  it('builds parse errors with a null id', () => {
    expect(parseErrorResponse('parse error: nope')).toEqual({
      jsonrpc: '2.0',
      id: null,
      error: { code: -32700, message: 'parse error: nope' }
    });
  });
});

describe('isJsonValue', () => {
  it('accepts JSON data', () => {
    expect(isJsonValue({ a: [1, 'two', null, true, { b: {} }] })).toBe(true);
  });

  it('rejects values JSON cannot carry', () => {
    expect(isJsonValue(undefined)).toBe(false);
    expect(isJsonValue({ a: Number.NaN })).toBe(false);
    expect(isJsonValue([() => 1])).toBe(false);
  });

  it('enforces the depth limit', () => {
    expect(isJsonValue([[[1]]], 3)).toBe(true);
    expect(isJsonValue([[[[1]]]], 3)).toBe(false);
  });
});
