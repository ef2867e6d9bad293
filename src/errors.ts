/**
 * Error types for the line server
 *
 * Every class carries a stable `code` for logs and a `details` bag; only
 * JsonRpcError reaches the wire with its own protocol code.
 */

import { randomUUID } from 'node:crypto';
import { JSONRPC_ERROR, type JsonRpcErrorCode } from './constants.js';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'AUTHORIZATION_ERROR'
  | 'RATE_LIMIT_EXCEEDED'
  | 'NETWORK_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'TOOL_TIMEOUT'
  | 'JSONRPC_ERROR';

export class MCPError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'MCPError';
  }
}

/** Bad tool arguments; providers report these as "Invalid arguments: ..." */
export class ValidationError extends MCPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/** A request reached for something outside what the server exposes */
export class AuthorizationError extends MCPError {
  constructor(message = 'Insufficient permissions') {
    super(message, 'AUTHORIZATION_ERROR');
    this.name = 'AuthorizationError';
  }
}

export class RateLimitError extends MCPError {
  constructor(message: string, retryAfter?: number) {
    super(message, 'RATE_LIMIT_EXCEEDED', retryAfter ? { retryAfter } : undefined);
    this.name = 'RateLimitError';
  }
}

/** Downstream HTTP failure: transport, timeout or non-2xx status */
export class NetworkError extends MCPError {
  constructor(message: string, statusCode?: number, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', { statusCode, ...details });
    this.name = 'NetworkError';
  }
}

/** Startup problems; the only errors allowed to stop the process */
export class ConfigurationError extends MCPError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class ToolTimeoutError extends MCPError {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`, 'TOOL_TIMEOUT', { toolName, timeoutMs });
    this.name = 'ToolTimeoutError';
  }
}

/**
 * A dispatch failure with a precise protocol code
 *
 * Anything else thrown while handling a request is answered with -32603.
 */
export class JsonRpcError extends MCPError {
  constructor(
    public readonly rpcCode: JsonRpcErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'JSONRPC_ERROR', details);
    this.name = 'JsonRpcError';
  }

  static invalidParams(message: string): JsonRpcError {
    return new JsonRpcError(JSONRPC_ERROR.INVALID_PARAMS, `Invalid params: ${message}`);
  }

  static methodNotFound(method: string): JsonRpcError {
    return new JsonRpcError(JSONRPC_ERROR.METHOD_NOT_FOUND, `Method not found: ${method}`, { method });
  }
}

export function isMCPError(error: unknown): error is MCPError {
  return error instanceof MCPError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/** Id shared by an internal-error response and its log line */
export function generateCorrelationId(): string {
  return randomUUID();
}
