/**
 * HTTP monitoring endpoint
 *
 * Separate from the line protocol so scrapers and load balancers never
 * touch the tool port:
 *   GET /health           liveness, uptime, connection and session counts
 *   GET /metrics          Prometheus exposition
 *   GET /metrics/summary  in-memory summary as JSON
 */

import express, { type Request, type Response } from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { HTTP_STATUS } from './constants.js';
import { toError } from './errors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type { SessionManager } from './session-manager.js';

export interface MonitoringServerConfig {
  host: string;
  /** 0 picks a free port */
  port: number;
}

/** The part of the protocol server the health check reads */
export interface ServerStatus {
  readonly isRunning: boolean;
  readonly connectionCount: number;
}

export interface MonitoringServices {
  metrics: MetricsCollector;
  sessions: SessionManager;
  server: ServerStatus;
  logger: Logger;
}

export interface HealthReport {
  status: 'ok' | 'stopping';
  uptimeSeconds: number;
  activeConnections: number;
  sessions: number;
}

export class MonitoringServer {
  readonly app: express.Application;
  private httpServer: Server | null = null;

  constructor(
    private readonly config: MonitoringServerConfig,
    private readonly services: MonitoringServices
  ) {
    this.app = express();
    this.app.disable('x-powered-by');
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      const report = this.health();
      res.status(report.status === 'ok' ? HTTP_STATUS.OK : HTTP_STATUS.SERVICE_UNAVAILABLE).json(report);
    });

    this.app.get('/metrics', this.handleMetrics.bind(this));

    this.app.get('/metrics/summary', (_req: Request, res: Response) => {
      res.json(this.services.metrics.getSummary());
    });

    this.app.use((_req: Request, res: Response) => {
      res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'Not Found' });
    });
  }

  health(): HealthReport {
    const { metrics, sessions, server } = this.services;
    return {
      status: server.isRunning ? 'ok' : 'stopping',
      uptimeSeconds: Math.floor(metrics.getUptimeSeconds()),
      activeConnections: server.connectionCount,
      sessions: sessions.size,
    };
  }

  private async handleMetrics(_req: Request, res: Response): Promise<void> {
    try {
      const body = await this.services.metrics.getPrometheusMetrics();
      res.set('Content-Type', this.services.metrics.contentType);
      res.send(body);
    } catch (error) {
      const err = toError(error);
      this.services.logger.error('Metrics endpoint error', err);
      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: 'Internal Server Error', message: err.message });
    }
  }

  address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
      server.once('error', reject);
      this.httpServer = server;
    });

    const address = this.address();
    this.services.logger.info('Monitoring endpoint started', {
      host: address?.address ?? this.config.host,
      port: address?.port ?? this.config.port,
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) {
      return;
    }
    this.httpServer = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    this.services.logger.info('Monitoring endpoint stopped');
  }
}
