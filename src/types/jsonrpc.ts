/**
 * JSON-RPC 2.0 envelope types as they travel over the line protocol
 */

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc?: string;
  /** Absent for notifications; `null` is a (discouraged) request id */
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
  /** Out-of-band token presentation accepted on any request */
  auth_token?: string;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

/**
 * Outcome of decoding one line from the wire
 */
export type DecodedMessage =
  | { kind: 'request'; request: JsonRpcRequest }
  | { kind: 'parse-error'; reason: string }
  | { kind: 'invalid'; id: JsonRpcId | undefined; notification: boolean; reason: string };
