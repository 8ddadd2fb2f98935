import { randomUUID } from 'node:crypto';
import { UpstreamError, describeError } from '../mcp/errors.js';
import { USER_AGENT } from '../mcp/protocol-constants.js';
import type { Logger } from '../logging.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface SendOptions {
  method: 'GET' | 'POST';
  json?: unknown;
  requestId?: string;
}

export const REQUEST_ID_HEADER = 'x-request-id';

export function generateRequestId(): string {
  return `gw-${Date.now()}-${randomUUID().slice(0, 8)}`;
}

export function standardHeaders(requestId: string): Record<string, string> {
  return {
    [REQUEST_ID_HEADER]: requestId,
    'user-agent': USER_AGENT
  };
}

/** Releases the connection when the body is not going to be read. */
export async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel();
}

/**
 * Thin fetch wrapper used by every upstream adapter: standard headers,
 * a per-request timeout, and transport failures mapped to UpstreamError.
 * The timeout covers the whole exchange, body read included.
 */
export class HttpClient {
  readonly timeoutMs: number;

  private readonly fetchImpl: FetchLike;
  private readonly logger?: Logger;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = options.logger;
  }

  /**
   * Sends the request and hands the response to `read` while the deadline is
   * still running. UpstreamErrors thrown by `read` pass through unchanged.
   */
  async request<T>(url: string, options: SendOptions, read: (response: Response) => Promise<T>): Promise<T> {
    const requestId = options.requestId ?? generateRequestId();
    const headers = standardHeaders(requestId);
    if (options.json !== undefined) {
      headers['content-type'] = 'application/json';
      headers['accept'] = 'application/json';
    }

    const controller = new AbortController();
    const deadline = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await Promise.race([
        this.fetchImpl(url, {
          method: options.method,
          headers,
          body: options.json === undefined ? undefined : JSON.stringify(options.json),
          signal: controller.signal
        }),
        deadline
      ]);
      return await Promise.race([read(response), deadline]);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new UpstreamError(`upstream timed out after ${this.timeoutMs}ms`, { retryable: true, cause: error });
      }
      if (error instanceof UpstreamError) throw error;
      throw new UpstreamError(`upstream request failed: ${describeError(error)}`, { retryable: true, cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  /** Resolves to the response status; the body is discarded. */
  sendForStatus(url: string, options: SendOptions): Promise<number> {
    return this.request(url, options, async (response) => {
      await discardBody(response);
      return response.status;
    });
  }

  /** Liveness probe: true iff the GET answers 2xx. Never rejects. */
  async probe(url: string): Promise<boolean> {
    try {
      const status = await this.sendForStatus(url, { method: 'GET' });
      return status >= 200 && status < 300;
    } catch (error) {
      this.logger?.debug({ url, err: describeError(error) }, 'health probe failed');
      return false;
    }
  }
}
