/**
 * Tool provider selection
 *
 * Providers are picked by name from configuration and merged into one
 * registry; the database and redis providers share a single service client.
 */

import type { ServerConfig, ToolProviderName } from '../config.js';
import { DatabaseServiceClient, DEFAULT_RETRY_STATUS } from '../http-client.js';
import type { Logger } from '../logger.js';
import type { MetricsCollector } from '../metrics.js';
import { ToolRegistry } from '../tool-registry.js';
import type { ToolProvider } from '../types/tools.js';
import { AdminTools, type SystemProbe } from './admin-tools.js';
import { DatabaseTools } from './database-tools.js';
import { FileTools } from './file-tools.js';
import { RedisTools } from './redis-tools.js';

export { AdminTools, evaluateHealth, readSystemSnapshot } from './admin-tools.js';
export { BaseToolProvider, defineTool } from './provider.js';
export { DatabaseTools } from './database-tools.js';
export { FileTools } from './file-tools.js';
export { RedisTools } from './redis-tools.js';

export interface ToolDependencies {
  metrics: MetricsCollector;
  logger: Logger;
  probe?: SystemProbe;
}

const RETRY_BASE_DELAY_MS = 250;

export function createToolProviders(config: ServerConfig, deps: ToolDependencies): ToolProvider[] {
  let client: DatabaseServiceClient | undefined;
  const serviceClient = (): DatabaseServiceClient => {
    client ??= new DatabaseServiceClient({
      baseUrl: config.databaseService.url,
      timeoutMs: config.databaseService.timeoutMs,
      retry: {
        maxAttempts: config.databaseService.retryAttempts,
        baseDelayMs: RETRY_BASE_DELAY_MS,
        retryOnStatus: DEFAULT_RETRY_STATUS,
      },
      logger: deps.logger,
    });
    return client;
  };

  const build: Record<ToolProviderName, () => ToolProvider> = {
    admin: () =>
      new AdminTools({
        metrics: deps.metrics,
        serverInfo: { name: config.server.name, version: config.server.version },
        maxConnections: config.security.maxConnections,
        probe: deps.probe,
        logger: deps.logger,
      }),
    files: () =>
      new FileTools({ root: config.tools.fileRoot, maxFileSize: config.limits.maxFileSize, logger: deps.logger }),
    database: () => new DatabaseTools({ client: serviceClient(), logger: deps.logger }),
    redis: () => new RedisTools({ client: serviceClient(), logger: deps.logger }),
  };

  return [...new Set(config.tools.providers)].map((name) => build[name]());
}

/**
 * @throws {ConfigurationError} when two providers contribute the same tool name
 */
export function createToolRegistry(config: ServerConfig, deps: ToolDependencies): ToolRegistry {
  const registry = new ToolRegistry({ logger: deps.logger, timeoutMs: config.limits.requestTimeoutMs });
  for (const provider of createToolProviders(config, deps)) {
    registry.register(provider);
  }
  deps.logger.info('Tools registered', { providers: config.tools.providers, tools: registry.size });
  return registry;
}
