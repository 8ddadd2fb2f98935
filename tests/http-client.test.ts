import { describe, expect, it, vi } from 'vitest';
import { HttpClient, generateRequestId, standardHeaders, type FetchLike } from '../src/http/client.js';
import { UpstreamError } from '../src/mcp/errors.js';
import { cancellableResponse, fakeFetch, jsonResponse, stalledResponse } from './helpers.js';

describe('correlation headers', () => {
  it('generates gw-prefixed request ids', () => {
    expect(generateRequestId()).toMatch(/^gw-\d+-[0-9a-f]{8}$/);
    expect(generateRequestId()).not.toBe(generateRequestId());
  });

  it('attaches the request id and client identifier', () => {
    expect(standardHeaders('gw-1-abcdef12')).toEqual({
      'x-request-id': 'gw-1-abcdef12',
      'user-agent': 'gael-tools-gateway/0.1.0'
    });
  });
});

describe('HttpClient', () => {
  it('posts JSON with the standard headers', async () => {
    const fetchImpl = fakeFetch(() => jsonResponse([]));
    const client = new HttpClient({ timeoutMs: 1000, fetchImpl });

    const status = await client.sendForStatus('http://upstream.test/api', {
      method: 'POST',
      json: { teacs: 'Dia' },
      requestId: 'gw-1-00000000'
    });

    expect(status).toBe(200);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://upstream.test/api');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"teacs":"Dia"}');
    expect(init?.headers).toEqual({
      'x-request-id': 'gw-1-00000000',
      'user-agent': 'gael-tools-gateway/0.1.0',
      'content-type': 'application/json',
      accept: 'application/json'
    });
  });

  it('turns a timeout into a retryable upstream error', async () => {
    const fetchImpl = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        })
    );
    const client = new HttpClient({ timeoutMs: 10, fetchImpl });

    const error = await client.sendForStatus('http://upstream.test', { method: 'GET' }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: 'upstream timed out after 10ms', retryable: true });
  });

  it('turns network failures into retryable upstream errors', async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    const client = new HttpClient({ timeoutMs: 1000, fetchImpl });

    const error = await client.sendForStatus('http://upstream.test', { method: 'GET' }).catch((e: unknown) => e);
    expect(error).toMatchObject({ message: 'upstream request failed: fetch failed', retryable: true });
  });

  it('probes health with a GET', async () => {
    const ok = fakeFetch(() => jsonResponse({ status: 'ok' }));
    expect(await new HttpClient({ timeoutMs: 1000, fetchImpl: ok }).probe('http://upstream.test/health')).toBe(true);
    expect(ok.mock.calls[0]?.[1].method).toBe('GET');

    const down = fakeFetch(() => jsonResponse({}, 503));
    expect(await new HttpClient({ timeoutMs: 1000, fetchImpl: down }).probe('http://upstream.test/health')).toBe(false);

    const unreachable = vi.fn<FetchLike>(async () => {
      throw new TypeError('fetch failed');
    });
    expect(await new HttpClient({ timeoutMs: 1000, fetchImpl: unreachable }).probe('http://upstream.test/health')).toBe(false);
  });

  it('keeps the deadline running while the body is read', async () => {
    const client = new HttpClient({ timeoutMs: 50, fetchImpl: fakeFetch(() => stalledResponse()) });

    const error = await client.request('http://upstream.test', { method: 'GET' }, (response) => response.json()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({ message: 'upstream timed out after 50ms', retryable: true });
  });

  it('passes upstream errors from the reader through unchanged', async () => {
    const client = new HttpClient({ timeoutMs: 1000, fetchImpl: fakeFetch(() => jsonResponse({})) });
    const failure = UpstreamError.fromStatus(418);

    const error = await client
      .request('http://upstream.test', { method: 'GET' }, async () => {
        throw failure;
      })
      .catch((e: unknown) => e);
    expect(error).toBe(failure);
  });

  it('releases the body of a failed health probe', async () => {
    const { response, state } = cancellableResponse(503);
    const client = new HttpClient({ timeoutMs: 1000, fetchImpl: fakeFetch(() => response) });

    expect(await client.probe('http://upstream.test/health')).toBe(false);
    expect(state.cancelled).toBe(true);
  });
});
