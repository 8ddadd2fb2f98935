import type { Logger } from '../logging.js';
import type { ToolRegistry } from '../tools/registry.js';
import { decodeRpcRequest, parseErrorResponse, rpcFailure, rpcSuccess } from './envelope.js';
import { ErrorCode, GatewayError, describeError } from './errors.js';
import { SERVER_INFO, negotiateProtocolVersion } from './protocol-constants.js';
import { isJsonObject, type JsonRpcRequest, type JsonRpcResponse, type ToolCallParams } from './protocol.js';

export interface DispatcherOptions {
  logger: Logger;
  serverInfo?: { name: string; version: string };
}

/**
 * Routes one decoded JSON-RPC request against the tool registry.
 * Every path resolves to a response; nothing is thrown to the transport.
 */
export class RpcDispatcher {
  private readonly logger: Logger;
  private readonly serverInfo: { name: string; version: string };

  constructor(
    private readonly registry: ToolRegistry,
    options: DispatcherOptions
  ) {
    this.logger = options.logger;
    this.serverInfo = options.serverInfo ?? SERVER_INFO;
  }

  async handleRaw(raw: string | Buffer): Promise<JsonRpcResponse> {
    const decoded = decodeRpcRequest(raw);
    if (!decoded.ok) {
      this.logger.debug({ reason: decoded.message }, 'rejecting undecodable request');
      return parseErrorResponse(decoded.message);
    }
    return this.dispatch(decoded.request);
  }

  async dispatch(request: JsonRpcRequest): Promise<JsonRpcResponse> {
    const id = request.id;
    this.logger.debug({ method: request.method, id }, 'dispatching request');

    try {
      switch (request.method) {
        case 'initialize': {
          const requested = isJsonObject(request.params) ? request.params.protocolVersion : undefined;
          return rpcSuccess(id, {
            protocolVersion: negotiateProtocolVersion(requested),
            serverInfo: { ...this.serverInfo },
            capabilities: { tools: {} }
          });
        }

        case 'shutdown':
          return rpcSuccess(id, null);

        case 'tools.list':
        case 'tools/list':
          return rpcSuccess(id, { tools: this.registry.list() });

        case 'tools.call':
        case 'tools/call': {
          const params = this.readToolCallParams(request.params);
          const outcome = await this.registry.call(params.name, params.arguments);
          if (!outcome.ok) {
            this.logger.warn({ tool: params.name, id, err: outcome.error }, 'tool call failed');
            return rpcFailure(id, ErrorCode.ToolError, outcome.error);
          }
          return rpcSuccess(id, outcome.value);
        }

        default:
          return rpcFailure(id, ErrorCode.MethodNotFound, `unknown method: ${request.method}`);
      }
    } catch (error) {
      if (error instanceof GatewayError) {
        const { code, message, data } = error.toRpcError();
        return rpcFailure(id, code, message, data);
      }
      this.logger.error({ method: request.method, id, err: describeError(error) }, 'dispatch failed');
      return rpcFailure(id, ErrorCode.InternalError, `internal error: ${describeError(error)}`);
    }
  }

  private readToolCallParams(params: JsonRpcRequest['params']): ToolCallParams {
    const name = isJsonObject(params) ? params.name : undefined;
    if (typeof name !== 'string' || name.length === 0) {
      throw new GatewayError(ErrorCode.InvalidParams, 'invalid params: missing tool name');
    }
    const args = isJsonObject(params) ? params.arguments : undefined;
    return { name, arguments: args ?? {} };
  }
}
