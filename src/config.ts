/**
 * Server configuration
 *
 * Built once at startup from, lowest precedence first: defaults, an
 * optional YAML file, then MCP_* environment variables. The result is
 * checked by validateConfig before anything binds.
 */

import fs from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULTS, TIME } from './constants.js';
import { ConfigurationError, toError } from './errors.js';
import { LogLevel, parseLogLevel, type LogFormat } from './logger.js';
import type { TlsFiles } from './protocol-server.js';
import type { SecuritySettings } from './security-manager.js';

export const TOOL_PROVIDERS = ['admin', 'files', 'database', 'redis'] as const;
export type ToolProviderName = (typeof TOOL_PROVIDERS)[number];

export interface ServerConfig {
  server: {
    host: string;
    port: number;
    name: string;
    version: string;
    tls?: TlsFiles;
    idleTimeoutMs: number;
    maxLineBytes: number;
    shutdownTimeoutMs: number;
  };
  security: SecuritySettings;
  limits: {
    requestTimeoutMs: number;
    maxFileSize: number;
  };
  sessions: {
    maxAgeMs: number;
    sweepIntervalMs: number;
  };
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  monitoring: {
    /** Monitoring endpoint is off unless a port is set */
    port?: number;
    host: string;
    metricsPrefix: string;
    historySize: number;
  };
  tools: {
    providers: ToolProviderName[];
    /** Directory the file tools are confined to */
    fileRoot: string;
  };
  databaseService: {
    url: string;
    timeoutMs: number;
    retryAttempts: number;
  };
}

export type Environment = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** YAML file; when omitted only defaults and the environment apply */
  path?: string;
  env?: Environment;
}

const seconds = z.number().nonnegative();
const count = z.number().int();

// File layout mirrors the deployment config files: snake_case sections,
// durations in seconds
const fileSchema = z
  .object({
    server: z
      .object({
        host: z.string(),
        port: count,
        name: z.string(),
        version: z.string(),
        ssl_cert: z.string(),
        ssl_key: z.string(),
        ssl_ca: z.string(),
        idle_timeout: seconds,
        max_line_bytes: count,
        shutdown_timeout: seconds,
      })
      .partial()
      .strict(),
    security: z
      .object({
        auth_enabled: z.boolean(),
        auth_token: z.string(),
        allowed_ips: z.array(z.string()),
        blocked_ips: z.array(z.string()),
        failed_attempt_threshold: count,
        ban_duration: seconds.nullable(),
      })
      .partial()
      .strict(),
    rate_limiting: z
      .object({
        enabled: z.boolean(),
        requests_per_minute: count,
        window_seconds: count,
      })
      .partial()
      .strict(),
    limits: z
      .object({
        max_connections: count,
        request_timeout: seconds,
        max_file_size: count,
      })
      .partial()
      .strict(),
    sessions: z
      .object({
        max_age: seconds,
        sweep_interval: seconds,
      })
      .partial()
      .strict(),
    logging: z
      .object({
        level: z.string(),
        format: z.enum(['console', 'json']),
        // Accepted for compatibility; output always goes to stderr
        file: z.string(),
      })
      .partial()
      .strict(),
    monitoring: z
      .object({
        enabled: z.boolean(),
        port: count,
        host: z.string(),
        prefix: z.string(),
        history_size: count,
      })
      .partial()
      .strict(),
    tools: z
      .object({
        providers: z.array(z.enum(TOOL_PROVIDERS)),
        file_root: z.string(),
      })
      .partial()
      .strict(),
    database_service: z
      .object({
        url: z.string().url(),
        timeout: seconds,
        retry_attempts: count,
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

type FileConfig = z.infer<typeof fileSchema>;

export function defaultConfig(): ServerConfig {
  return {
    server: {
      host: DEFAULTS.HOST,
      port: DEFAULTS.PORT,
      name: DEFAULTS.SERVER_NAME,
      version: DEFAULTS.SERVER_VERSION,
      idleTimeoutMs: DEFAULTS.IDLE_TIMEOUT_MS,
      maxLineBytes: DEFAULTS.MAX_LINE_BYTES,
      shutdownTimeoutMs: DEFAULTS.SHUTDOWN_TIMEOUT_MS,
    },
    security: {
      authEnabled: true,
      allowedIps: [],
      blockedIps: [],
      banPolicy: { threshold: DEFAULTS.FAILED_ATTEMPT_THRESHOLD, durationMs: null },
      rateLimit: {
        enabled: true,
        maxRequests: DEFAULTS.RATE_LIMIT_MAX_REQUESTS,
        windowSeconds: DEFAULTS.RATE_LIMIT_WINDOW_SECONDS,
      },
      maxConnections: DEFAULTS.MAX_CONNECTIONS,
    },
    limits: {
      requestTimeoutMs: DEFAULTS.REQUEST_TIMEOUT_MS,
      maxFileSize: DEFAULTS.MAX_FILE_SIZE,
    },
    sessions: {
      maxAgeMs: DEFAULTS.SESSION_MAX_AGE_MS,
      sweepIntervalMs: DEFAULTS.SESSION_SWEEP_INTERVAL_MS,
    },
    logging: { level: LogLevel.INFO, format: 'json' },
    monitoring: {
      host: '127.0.0.1',
      metricsPrefix: 'mcp_',
      historySize: DEFAULTS.METRICS_HISTORY_SIZE,
    },
    tools: { providers: ['admin', 'files'], fileRoot: process.cwd() },
    databaseService: {
      url: DEFAULTS.DATABASE_SERVICE_URL,
      timeoutMs: DEFAULTS.DATABASE_SERVICE_TIMEOUT_MS,
      retryAttempts: DEFAULTS.DATABASE_SERVICE_RETRY_ATTEMPTS,
    },
  };
}

/**
 * Parse and schema-check a YAML document
 *
 * @throws {ConfigurationError} on YAML syntax errors or unknown/mistyped keys
 */
export function parseConfigFile(content: string, source = 'config'): FileConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${source}: ${toError(error).message}`);
  }

  // An empty document means "all defaults"
  const result = fileSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue.path.join('.') || '(root)';
    throw new ConfigurationError(`Invalid configuration at ${path}: ${issue.message}`, {
      source,
      issues: result.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
    });
  }
  return result.data;
}

function toMs(value: number): number {
  return Math.round(value * TIME.MS_PER_SECOND);
}

function applyFile(config: ServerConfig, file: FileConfig): void {
  const { server, security, rate_limiting: rate, limits, sessions, logging, monitoring, tools } = file;
  const db = file.database_service;

  if (server) {
    if (server.host !== undefined) config.server.host = server.host;
    if (server.port !== undefined) config.server.port = server.port;
    if (server.name !== undefined) config.server.name = server.name;
    if (server.version !== undefined) config.server.version = server.version;
    if (server.idle_timeout !== undefined) config.server.idleTimeoutMs = toMs(server.idle_timeout);
    if (server.max_line_bytes !== undefined) config.server.maxLineBytes = server.max_line_bytes;
    if (server.shutdown_timeout !== undefined) config.server.shutdownTimeoutMs = toMs(server.shutdown_timeout);
    applyTls(config, server.ssl_cert, server.ssl_key, server.ssl_ca);
  }

  if (security) {
    if (security.auth_enabled !== undefined) config.security.authEnabled = security.auth_enabled;
    if (security.auth_token !== undefined) config.security.authToken = security.auth_token;
    if (security.allowed_ips !== undefined) config.security.allowedIps = security.allowed_ips;
    if (security.blocked_ips !== undefined) config.security.blockedIps = security.blocked_ips;
    if (security.failed_attempt_threshold !== undefined) {
      config.security.banPolicy = { ...config.security.banPolicy, threshold: security.failed_attempt_threshold };
    }
    if (security.ban_duration !== undefined) {
      const durationMs = security.ban_duration === null ? null : toMs(security.ban_duration);
      config.security.banPolicy = { ...config.security.banPolicy, durationMs };
    }
  }

  if (rate) {
    if (rate.enabled !== undefined) config.security.rateLimit.enabled = rate.enabled;
    if (rate.requests_per_minute !== undefined) config.security.rateLimit.maxRequests = rate.requests_per_minute;
    if (rate.window_seconds !== undefined) config.security.rateLimit.windowSeconds = rate.window_seconds;
  }

  if (limits) {
    if (limits.max_connections !== undefined) config.security.maxConnections = limits.max_connections;
    if (limits.request_timeout !== undefined) config.limits.requestTimeoutMs = toMs(limits.request_timeout);
    if (limits.max_file_size !== undefined) config.limits.maxFileSize = limits.max_file_size;
  }

  if (sessions) {
    if (sessions.max_age !== undefined) config.sessions.maxAgeMs = toMs(sessions.max_age);
    if (sessions.sweep_interval !== undefined) config.sessions.sweepIntervalMs = toMs(sessions.sweep_interval);
  }

  if (logging) {
    if (logging.level !== undefined) config.logging.level = requireLogLevel(logging.level, 'logging.level');
    if (logging.format !== undefined) config.logging.format = logging.format;
  }

  if (monitoring) {
    if (monitoring.port !== undefined) config.monitoring.port = monitoring.port;
    if (monitoring.enabled === false) config.monitoring.port = undefined;
    if (monitoring.host !== undefined) config.monitoring.host = monitoring.host;
    if (monitoring.prefix !== undefined) config.monitoring.metricsPrefix = monitoring.prefix;
    if (monitoring.history_size !== undefined) config.monitoring.historySize = monitoring.history_size;
  }

  if (tools) {
    if (tools.providers !== undefined) config.tools.providers = tools.providers;
    if (tools.file_root !== undefined) config.tools.fileRoot = tools.file_root;
  }

  if (db) {
    if (db.url !== undefined) config.databaseService.url = db.url;
    if (db.timeout !== undefined) config.databaseService.timeoutMs = toMs(db.timeout);
    if (db.retry_attempts !== undefined) config.databaseService.retryAttempts = db.retry_attempts;
  }
}

function applyTls(config: ServerConfig, cert?: string, key?: string, ca?: string): void {
  if (cert === undefined && key === undefined && ca === undefined) {
    return;
  }
  const current = config.server.tls;
  config.server.tls = {
    certFile: cert ?? current?.certFile ?? '',
    keyFile: key ?? current?.keyFile ?? '',
    caFile: ca ?? current?.caFile,
  };
}

function requireLogLevel(value: string, source: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new ConfigurationError(`${source} must be one of DEBUG, INFO, WARN, ERROR, SILENT (got '${value}')`);
  }
  return level;
}

function envString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function envInt(env: Environment, name: string): number | undefined {
  const value = envString(env, name);
  if (value === undefined) {
    return undefined;
  }
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigurationError(`${name} must be an integer (got '${value}')`);
  }
  return Number.parseInt(value, 10);
}

function envList(env: Environment, name: string): string[] | undefined {
  const value = envString(env, name);
  return value?.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

function applyEnv(config: ServerConfig, env: Environment): void {
  config.server.host = envString(env, 'MCP_HOST') ?? config.server.host;
  config.server.port = envInt(env, 'MCP_PORT') ?? config.server.port;
  applyTls(config, envString(env, 'MCP_SSL_CERT'), envString(env, 'MCP_SSL_KEY'), envString(env, 'MCP_SSL_CA'));

  const authEnabled = envString(env, 'MCP_AUTH_ENABLED');
  if (authEnabled !== undefined) {
    config.security.authEnabled = authEnabled.toLowerCase() === 'true';
  }
  config.security.authToken = envString(env, 'MCP_AUTH_TOKEN') ?? config.security.authToken;
  config.security.allowedIps = envList(env, 'MCP_ALLOWED_IPS') ?? config.security.allowedIps;

  const rate = config.security.rateLimit;
  rate.maxRequests = envInt(env, 'MCP_RATE_LIMIT_REQUESTS') ?? rate.maxRequests;
  rate.windowSeconds = envInt(env, 'MCP_RATE_LIMIT_WINDOW') ?? rate.windowSeconds;
  config.security.maxConnections = envInt(env, 'MCP_MAX_CONNECTIONS') ?? config.security.maxConnections;

  const idle = envInt(env, 'MCP_IDLE_TIMEOUT');
  if (idle !== undefined) config.server.idleTimeoutMs = toMs(idle);
  const requestTimeout = envInt(env, 'MCP_REQUEST_TIMEOUT');
  if (requestTimeout !== undefined) config.limits.requestTimeoutMs = toMs(requestTimeout);

  const level = envString(env, 'MCP_LOG_LEVEL');
  if (level !== undefined) config.logging.level = requireLogLevel(level, 'MCP_LOG_LEVEL');
  const format = envString(env, 'MCP_LOG_FORMAT');
  if (format !== undefined) {
    if (format !== 'json' && format !== 'console') {
      throw new ConfigurationError(`MCP_LOG_FORMAT must be 'json' or 'console' (got '${format}')`);
    }
    config.logging.format = format;
  }

  const providers = envList(env, 'MCP_TOOLS');
  if (providers !== undefined) {
    config.tools.providers = providers.map((name) => {
      const provider = TOOL_PROVIDERS.find((candidate) => candidate === name);
      if (!provider) {
        throw new ConfigurationError(`MCP_TOOLS contains unknown provider '${name}'`, {
          available: [...TOOL_PROVIDERS],
        });
      }
      return provider;
    });
  }

  const db = config.databaseService;
  db.url = envString(env, 'MCP_DATABASE_SERVICE_URL') ?? db.url;
  const dbTimeout = envInt(env, 'MCP_DATABASE_SERVICE_TIMEOUT');
  if (dbTimeout !== undefined) db.timeoutMs = toMs(dbTimeout);
  db.retryAttempts = envInt(env, 'MCP_DATABASE_SERVICE_RETRY_ATTEMPTS') ?? db.retryAttempts;

  config.monitoring.port = envInt(env, 'MCP_MONITORING_PORT') ?? config.monitoring.port;
}

/**
 * Semantic checks the schema cannot express
 *
 * @throws {ConfigurationError} listing every problem found
 */
export function validateConfig(config: ServerConfig): void {
  const errors: string[] = [];

  if (!config.server.host) {
    errors.push('Host is required');
  }
  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Port must be between 1 and 65535');
  }
  if (config.security.authEnabled && !config.security.authToken) {
    errors.push('Auth token is required when authentication is enabled');
  }

  const tls = config.server.tls;
  if (tls) {
    if (tls.certFile && !tls.keyFile) errors.push('SSL key is required when SSL cert is provided');
    if (tls.keyFile && !tls.certFile) errors.push('SSL cert is required when SSL key is provided');
    if (!tls.certFile && !tls.keyFile) errors.push('SSL CA requires an SSL cert and key');
  }

  const positive: Array<[string, number]> = [
    ['Max connections', config.security.maxConnections],
    ['Failed attempt threshold', config.security.banPolicy.threshold],
    ['Max line bytes', config.server.maxLineBytes],
    ['Idle timeout', config.server.idleTimeoutMs],
    ['Request timeout', config.limits.requestTimeoutMs],
    ['Max file size', config.limits.maxFileSize],
    ['Session max age', config.sessions.maxAgeMs],
    ['Session sweep interval', config.sessions.sweepIntervalMs],
    ['Database service retry attempts', config.databaseService.retryAttempts],
  ];
  if (config.security.rateLimit.enabled) {
    positive.push(
      ['Rate limit requests', config.security.rateLimit.maxRequests],
      ['Rate limit window', config.security.rateLimit.windowSeconds]
    );
  }
  for (const [label, value] of positive) {
    if (!(value > 0)) {
      errors.push(`${label} must be positive`);
    }
  }

  const monitoringPort = config.monitoring.port;
  if (monitoringPort !== undefined && (monitoringPort < 1 || monitoringPort > 65535)) {
    errors.push('Monitoring port must be between 1 and 65535');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(`Configuration validation failed: ${errors.join('; ')}`, { errors });
  }
}

/**
 * Build and validate the startup configuration
 *
 * @throws {ConfigurationError} when the file is unreadable or any value is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
  const config = defaultConfig();

  if (options.path) {
    let content: string;
    try {
      content = await fs.readFile(options.path, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Cannot read config file ${options.path}: ${toError(error).message}`);
    }
    applyFile(config, parseConfigFile(content, options.path));
  }

  applyEnv(config, options.env ?? process.env);
  validateConfig(config);
  return config;
}
