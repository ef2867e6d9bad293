/**
 * Protocol codes, HTTP statuses and deployment defaults
 */

export const TIME = {
  MS_PER_SECOND: 1000,
  MS_PER_MINUTE: 60_000,
  MS_PER_HOUR: 3_600_000,
  SECONDS_PER_MINUTE: 60,
} as const;

/**
 * HTTP status codes used by the downstream service client and the
 * monitoring endpoint
 */
export const HTTP_STATUS = {
  OK: 200,
  MULTIPLE_CHOICES: 300,
  NOT_FOUND: 404,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_SERVER_ERROR: 500,
  BAD_GATEWAY: 502,
  SERVICE_UNAVAILABLE: 503,
  GATEWAY_TIMEOUT: 504,
} as const;

/**
 * JSON-RPC 2.0 error codes
 *
 * -32000 and -32001 sit in the implementation-defined server error range.
 */
export const JSONRPC_ERROR = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  RATE_LIMITED: -32000,
  AUTHENTICATION_FAILED: -32001,
} as const;

export type JsonRpcErrorCode = (typeof JSONRPC_ERROR)[keyof typeof JSONRPC_ERROR];

/**
 * Protocol methods answered by the connection engine itself
 */
export const MCP_METHOD = {
  INITIALIZE: 'initialize',
  INITIALIZED: 'notifications/initialized',
  PING: 'ping',
  TOOLS_LIST: 'tools/list',
  TOOLS_CALL: 'tools/call',
  RESOURCES_LIST: 'resources/list',
  PROMPTS_LIST: 'prompts/list',
} as const;

/**
 * Defaults taken from the production deployment of the server family
 */
export const DEFAULTS = {
  HOST: '0.0.0.0',
  PORT: 3001,
  SERVER_NAME: 'mcp-line-server',
  SERVER_VERSION: '0.1.0',
  RATE_LIMIT_MAX_REQUESTS: 100,
  RATE_LIMIT_WINDOW_SECONDS: 60,
  MAX_CONNECTIONS: 50,
  IDLE_TIMEOUT_MS: 600 * TIME.MS_PER_SECOND,
  REQUEST_TIMEOUT_MS: 300 * TIME.MS_PER_SECOND,
  MAX_LINE_BYTES: 1024 * 1024,
  FAILED_ATTEMPT_THRESHOLD: 5,
  SESSION_MAX_AGE_MS: 24 * TIME.MS_PER_HOUR,
  SESSION_SWEEP_INTERVAL_MS: 5 * TIME.MS_PER_MINUTE,
  SHUTDOWN_TIMEOUT_MS: 10 * TIME.MS_PER_SECOND,
  METRICS_HISTORY_SIZE: 1000,
  MAX_FILE_SIZE: 1024 * 1024,
  DATABASE_SERVICE_URL: 'http://localhost:8000',
  DATABASE_SERVICE_TIMEOUT_MS: 30 * TIME.MS_PER_SECOND,
  DATABASE_SERVICE_RETRY_ATTEMPTS: 3,
} as const;
