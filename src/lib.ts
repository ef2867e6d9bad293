/**
 * Library exports for programmatic usage
 */
export { createServerApp, type ServerApp } from './app.js';
export { defaultConfig, loadConfig, parseConfigFile, validateConfig, type ServerConfig } from './config.js';
export { ProtocolServer, type ProtocolServerOptions, type StopOptions } from './protocol-server.js';
export { ConnectionHandler } from './connection-handler.js';
export { SecurityManager, type SecuritySettings } from './security-manager.js';
export { RateLimiter } from './rate-limiter.js';
export { IPFilter } from './ip-filter.js';
export { Authenticator } from './authenticator.js';
export { SessionManager } from './session-manager.js';
export { MetricsCollector } from './metrics.js';
export { MonitoringServer } from './monitoring-server.js';
export { ToolRegistry, textResult } from './tool-registry.js';
export { DatabaseServiceClient } from './http-client.js';
export * from './tools/index.js';
export * from './errors.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger, type Logger } from './logger.js';
export type { ClientSession } from './types/session.js';
export type { ToolDefinition, ToolHandler, ToolProvider, ToolResult } from './types/tools.js';
