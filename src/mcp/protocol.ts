export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type JsonRpcId = JsonValue;

export interface JsonRpcRequest<T = JsonValue> {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params: T;
}

export interface JsonRpcSuccess<T = JsonValue> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: T;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: JsonValue;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcError;
}

export type JsonRpcResponse<T = JsonValue> = JsonRpcSuccess<T> | JsonRpcErrorResponse;

export type JsonSchemaProperty = {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';
  description: string;
};

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
};

export type ToolDefinition = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export interface ToolCallParams {
  name: string;
  arguments: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
