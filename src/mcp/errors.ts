import type { JsonRpcError, JsonValue } from './protocol.js';

// JSON-RPC 2.0 codes plus the application-level tool failure code
export enum ErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  ToolError = -32000
}

/**
 * Error raised inside the gateway that already knows its RPC code.
 */
export class GatewayError extends Error {
  readonly code: ErrorCode;
  readonly data?: JsonValue;

  constructor(code: ErrorCode, message: string, data?: JsonValue) {
    super(message);
    this.name = 'GatewayError';
    this.code = code;
    this.data = data;
  }

  toRpcError(): JsonRpcError {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

export interface UpstreamErrorOptions {
  status?: number;
  retryable: boolean;
  cause?: unknown;
}

/**
 * Failure talking to a remote grammar or spellcheck service.
 * `retryable` is true for transport failures, timeouts and 5xx statuses.
 */
export class UpstreamError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UpstreamError';
    this.status = options.status;
    this.retryable = options.retryable;
  }

  static fromStatus(status: number): UpstreamError {
    return new UpstreamError(`upstream status ${status}`, { status, retryable: status >= 500 });
  }
}

export function isRetryableError(error: unknown): boolean {
  if (error instanceof UpstreamError) return error.retryable;
  return true;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
