/**
 * Line-protocol listener
 *
 * Binds a TCP (or TLS) listener, runs one ConnectionHandler per accepted
 * socket and sweeps idle sessions and security state on an interval. The
 * shared services are built once per server and handed to every handler.
 */

import fs from 'node:fs/promises';
import net from 'node:net';
import tls from 'node:tls';
import { ConnectionHandler, type ServerIdentity } from './connection-handler.js';
import { ConfigurationError, toError } from './errors.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type { SecurityManager } from './security-manager.js';
import type { SessionManager } from './session-manager.js';
import type { ToolRegistry } from './tool-registry.js';

export interface TlsFiles {
  certFile: string;
  keyFile: string;
  /** CA bundle for verifying client certificates; enables client-cert requests */
  caFile?: string;
}

export interface ProtocolServerOptions {
  host: string;
  /** 0 picks a free port */
  port: number;
  tls?: TlsFiles;
  serverInfo: ServerIdentity;
  idleTimeoutMs: number;
  maxLineBytes: number;
  sessionMaxAgeMs: number;
  sweepIntervalMs: number;
}

export interface ProtocolServerServices {
  security: SecurityManager;
  sessions: SessionManager;
  registry: ToolRegistry;
  metrics: MetricsCollector;
  logger: Logger;
}

export interface StopOptions {
  /** Destroy connections still open after this many milliseconds */
  forceAfterMs?: number;
}

export class ProtocolServer {
  private server: net.Server | null = null;
  private sweepInterval: NodeJS.Timeout | null = null;
  private readonly handlers = new Set<ConnectionHandler>();
  private readonly running = new Set<Promise<void>>();
  private accepting = false;

  constructor(
    private readonly options: ProtocolServerOptions,
    private readonly services: ProtocolServerServices
  ) {
    services.sessions.onSessionCreated(() => services.metrics.recordSessionCreated());
    services.sessions.onSessionRemoved(() => services.metrics.recordSessionDestroyed());
  }

  get isRunning(): boolean {
    return this.accepting;
  }

  /**
   * Connections that passed admission and have not closed yet
   */
  get connectionCount(): number {
    return this.connections.length;
  }

  get connections(): ConnectionHandler[] {
    return [...this.handlers].filter((handler) => handler.state !== null && handler.state !== 'closing');
  }

  /**
   * Bind the listener
   *
   * @throws {ConfigurationError} when TLS material cannot be loaded
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new ConfigurationError('Server already started');
    }

    let server: net.Server;
    if (this.options.tls) {
      const tlsServer = await this.createTlsServer(this.options.tls);
      tlsServer.on('secureConnection', (socket) => this.accept(socket));
      tlsServer.on('tlsClientError', (error, socket) => {
        this.services.logger.warn('TLS handshake failed', { ip: socket.remoteAddress, error: error.message });
      });
      server = tlsServer;
    } else {
      server = net.createServer((socket) => this.accept(socket));
    }

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      server.once('error', onError);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error: Error) => {
      this.services.logger.error('Listener error', error);
    });

    this.server = server;
    this.accepting = true;
    this.sweepInterval = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.sweepInterval.unref();

    const address = this.address();
    this.services.logger.info('Protocol server started', {
      host: address?.address ?? this.options.host,
      port: address?.port ?? this.options.port,
      tls: this.options.tls !== undefined,
      tools: this.services.registry.size,
      authRequired: this.services.security.authRequired,
    });
  }

  /**
   * Stop accepting, let open connections finish their current request and
   * wait for them to close
   */
  async stop(options: StopOptions = {}): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    this.accepting = false;
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }

    const closed = new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          this.services.logger.warn('Listener close reported an error', { error: error.message });
        }
        resolve();
      });
    });

    for (const handler of this.handlers) {
      handler.requestClose();
    }

    let forceTimer: NodeJS.Timeout | undefined;
    if (options.forceAfterMs !== undefined) {
      forceTimer = setTimeout(() => {
        if (this.handlers.size > 0) {
          this.services.logger.warn('Forcing open connections closed', { connections: this.handlers.size });
        }
        for (const handler of this.handlers) {
          handler.destroy();
        }
      }, options.forceAfterMs);
    }

    try {
      await Promise.all([closed, ...this.running]);
    } finally {
      clearTimeout(forceTimer);
    }

    this.server = null;
    this.services.logger.info('Protocol server stopped');
  }

  address(): net.AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Forget expired sessions and prune security state
   *
   * Live sockets are left open; only registry entries go.
   */
  sweep(): string[] {
    const expired = this.services.sessions.cleanupExpiredSessions(this.options.sessionMaxAgeMs);
    const { rateLimitKeysPruned, bansLifted } = this.services.security.sweep();
    this.services.logger.debug('Sweep finished', {
      expiredSessions: expired.length,
      rateLimitKeysPruned,
      bansLifted,
    });
    return expired;
  }

  private accept(socket: net.Socket): void {
    if (!this.accepting) {
      socket.destroy();
      return;
    }

    const handler = new ConnectionHandler(socket, {
      ...this.services,
      serverInfo: this.options.serverInfo,
      idleTimeoutMs: this.options.idleTimeoutMs,
      maxLineBytes: this.options.maxLineBytes,
      activeConnections: () => this.connectionCount,
    });
    this.handlers.add(handler);

    const run = handler
      .run()
      .catch((error: unknown) => {
        this.services.logger.error('Connection handler crashed', toError(error), { ip: handler.ip });
      })
      .finally(() => {
        this.handlers.delete(handler);
        this.running.delete(run);
      });
    this.running.add(run);
  }

  private async createTlsServer(files: TlsFiles): Promise<tls.Server> {
    try {
      const [cert, key, ca] = await Promise.all([
        fs.readFile(files.certFile),
        fs.readFile(files.keyFile),
        files.caFile ? fs.readFile(files.caFile) : Promise.resolve(undefined),
      ]);
      return tls.createServer(
        ca ? { cert, key, ca, requestCert: true, rejectUnauthorized: true } : { cert, key }
      );
    } catch (error) {
      throw new ConfigurationError(`Failed to load TLS material: ${toError(error).message}`, {
        certFile: files.certFile,
        keyFile: files.keyFile,
      });
    }
  }
}
