/**
 * JSON-RPC message decoding and response building
 *
 * One line on the wire carries one JSON value. Decoding never throws: every
 * line maps onto a request, a parse error or an invalid-request outcome that
 * the connection handler turns into the matching error response.
 */

import type {
  DecodedMessage,
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcResponse,
  JsonRpcSuccessResponse,
} from './types/jsonrpc.js';

const JSONRPC_VERSION = '2.0';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValidId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

/**
 * Check if message is a valid JSON-RPC request object (carries an id)
 */
export function isJsonRpcRequest(message: unknown): boolean {
  if (!isRecord(message)) return false;
  return (
    message.jsonrpc === JSONRPC_VERSION &&
    typeof message.method === 'string' &&
    'id' in message
  );
}

/**
 * Check if message is a valid JSON-RPC response object
 */
export function isJsonRpcResponse(message: unknown): message is JsonRpcResponse {
  if (!isRecord(message)) return false;
  return (
    message.jsonrpc === JSONRPC_VERSION &&
    'id' in message &&
    ('result' in message || 'error' in message)
  );
}

/**
 * A request without an `id` member is a notification and is never answered
 */
export function isNotification(request: JsonRpcRequest): boolean {
  return !('id' in request);
}

/**
 * Decode one line into a request envelope
 *
 * A missing `jsonrpc` member is tolerated; a wrong one is not.
 */
export function decodeMessage(line: string): DecodedMessage {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    return { kind: 'parse-error', reason: error instanceof Error ? error.message : String(error) };
  }

  if (Array.isArray(value)) {
    return { kind: 'invalid', id: undefined, notification: false, reason: 'Batch requests are not supported' };
  }
  if (!isRecord(value)) {
    return { kind: 'invalid', id: undefined, notification: false, reason: 'Request must be a JSON object' };
  }

  const hasId = 'id' in value;
  const id = hasId && isValidId(value.id) ? value.id : undefined;
  const invalid = (reason: string): DecodedMessage => ({
    kind: 'invalid',
    id,
    notification: !hasId,
    reason,
  });

  if (hasId && !isValidId(value.id)) {
    return invalid('id must be a string, number or null');
  }
  if (value.jsonrpc !== undefined && value.jsonrpc !== JSONRPC_VERSION) {
    return invalid(`Unsupported jsonrpc version: ${String(value.jsonrpc)}`);
  }

  const { method, params, auth_token: authToken } = value;
  if (typeof method !== 'string' || method.length === 0) {
    return invalid('method must be a non-empty string');
  }
  if (params !== undefined && !isRecord(params)) {
    return invalid('params must be an object');
  }
  if (authToken !== undefined && typeof authToken !== 'string') {
    return invalid('auth_token must be a string');
  }

  const request: JsonRpcRequest = { jsonrpc: JSONRPC_VERSION, method };
  if (id !== undefined) request.id = id;
  if (params !== undefined) request.params = params;
  if (authToken !== undefined) request.auth_token = authToken;

  return { kind: 'request', request };
}

export function successResponse(id: JsonRpcId, result: unknown): JsonRpcSuccessResponse {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: unknown
): JsonRpcErrorResponse {
  const error = data === undefined ? { code, message } : { code, message, data };
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

/**
 * Frame a response as exactly one newline-terminated line
 */
export function serializeResponse(response: JsonRpcResponse): string {
  return JSON.stringify(response) + '\n';
}
