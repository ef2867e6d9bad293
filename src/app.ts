/**
 * Wire a configuration into a runnable server
 */

import type { ServerConfig } from './config.js';
import type { Logger } from './logger.js';
import { MetricsCollector } from './metrics.js';
import { MonitoringServer } from './monitoring-server.js';
import { ProtocolServer } from './protocol-server.js';
import { SecurityManager } from './security-manager.js';
import { SessionManager } from './session-manager.js';
import { createToolRegistry, type ToolDependencies } from './tools/index.js';

export interface ServerApp {
  server: ProtocolServer;
  monitoring?: MonitoringServer;
  metrics: MetricsCollector;
  sessions: SessionManager;
  security: SecurityManager;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createServerApp(
  config: ServerConfig,
  logger: Logger,
  overrides: Pick<ToolDependencies, 'probe'> = {}
): ServerApp {
  const metrics = new MetricsCollector({
    prefix: config.monitoring.metricsPrefix,
    historySize: config.monitoring.historySize,
  });
  const sessions = new SessionManager({ logger });
  const security = SecurityManager.fromSettings(config.security, logger);
  const registry = createToolRegistry(config, { metrics, logger, probe: overrides.probe });

  const server = new ProtocolServer(
    {
      host: config.server.host,
      port: config.server.port,
      tls: config.server.tls,
      serverInfo: { name: config.server.name, version: config.server.version },
      idleTimeoutMs: config.server.idleTimeoutMs,
      maxLineBytes: config.server.maxLineBytes,
      sessionMaxAgeMs: config.sessions.maxAgeMs,
      sweepIntervalMs: config.sessions.sweepIntervalMs,
    },
    { security, sessions, registry, metrics, logger }
  );

  const monitoring =
    config.monitoring.port !== undefined
      ? new MonitoringServer(
          { host: config.monitoring.host, port: config.monitoring.port },
          { metrics, sessions, server, logger }
        )
      : undefined;

  return {
    server,
    monitoring,
    metrics,
    sessions,
    security,
    async start() {
      await server.start();
      if (monitoring) {
        try {
          await monitoring.start();
        } catch (error) {
          await server.stop();
          throw error;
        }
      }
    },
    async stop() {
      await server.stop({ forceAfterMs: config.server.shutdownTimeoutMs });
      await monitoring?.stop();
    },
  };
}
