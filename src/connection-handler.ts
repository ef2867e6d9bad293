/**
 * Per-connection protocol loop
 *
 * A handler owns one socket from accept to close:
 *   admission (allow-list, block list, connection limit)
 *   → authenticating (when a token is required) → serving → closing
 *
 * Requests are processed strictly one at a time, so responses leave in the
 * order their requests arrived. Nothing that happens inside a request,
 * including a failing tool, ends the loop; only EOF, a socket error, a
 * lockout or a server stop do. Cleanup runs on every exit path.
 */

import { getEventListeners } from 'node:events';
import type { Socket } from 'node:net';
import { LATEST_PROTOCOL_VERSION, SUPPORTED_PROTOCOL_VERSIONS } from '@modelcontextprotocol/sdk/types.js';
import { JSONRPC_ERROR, MCP_METHOD } from './constants.js';
import { JsonRpcError, generateCorrelationId, toError } from './errors.js';
import { normalizeIp } from './ip-filter.js';
import { decodeMessage, errorResponse, isNotification, serializeResponse, successResponse } from './jsonrpc.js';
import { LineReader, type LineEvent } from './line-reader.js';
import type { Logger } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import type { SecurityManager } from './security-manager.js';
import type { SessionManager } from './session-manager.js';
import type { ToolRegistry } from './tool-registry.js';
import type { JsonRpcId, JsonRpcRequest, JsonRpcResponse } from './types/jsonrpc.js';
import type { ClientSession, ConnectionState } from './types/session.js';

/** Metrics key for `tools/call` requests that named no tool */
export const INVALID_TOOL_METRIC = '<invalid>';
/** Metrics key for names the registry does not know; keeps label cardinality bounded */
export const UNKNOWN_TOOL_METRIC = '<unknown>';

export interface ServerIdentity {
  name: string;
  version: string;
}

/**
 * Shared services a handler works against; one set per ProtocolServer
 */
export interface ConnectionContext {
  security: SecurityManager;
  sessions: SessionManager;
  registry: ToolRegistry;
  metrics: MetricsCollector;
  logger: Logger;
  serverInfo: ServerIdentity;
  idleTimeoutMs: number;
  maxLineBytes: number;
  /** Connections currently admitted, excluding the one being checked */
  activeConnections: () => number;
}

type AuthOutcome = 'proceed' | 'answered' | 'close';

const ABORTED = Symbol('aborted');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export class ConnectionHandler {
  private connectionState: ConnectionState | null = null;
  private session: ClientSession | null = null;
  private reader: LineReader | null = null;
  private closeRequested = false;
  /** Aborted when the connection is torn down while a request is in flight */
  private readonly teardown = new AbortController();
  readonly ip: string;

  constructor(
    private readonly socket: Socket,
    private readonly ctx: ConnectionContext
  ) {
    const remote = socket.remoteAddress ?? 'unknown';
    this.ip = normalizeIp(remote)?.ip ?? remote;
  }

  /** Null until admission succeeds */
  get state(): ConnectionState | null {
    return this.connectionState;
  }

  get clientId(): string | undefined {
    return this.session?.clientId;
  }

  /**
   * Serve the connection until it ends
   *
   * Resolves once cleanup has finished; never rejects for per-request failures.
   */
  async run(): Promise<void> {
    const { security, sessions, metrics, logger } = this.ctx;

    // Stays attached until the socket is destroyed; the reader detaches its own on close
    this.socket.on('error', (error) => {
      logger.debug('Socket error', { ip: this.ip, error: error.message });
    });

    const admission = security.checkConnection(this.ip, this.ctx.activeConnections());
    if (!admission.allowed) {
      metrics.recordRejectedConnection(admission.reason);
      logger.warn('Connection refused', { ip: this.ip, reason: admission.reason });
      this.socket.destroy();
      return;
    }

    this.connectionState = 'admitted';
    metrics.recordConnectionChange(1);
    const session = sessions.createSession(this.ip, !security.authRequired);
    this.session = session;
    this.connectionState = session.authenticated ? 'serving' : 'authenticating';
    this.socket.setNoDelay(true);
    const reader = new LineReader(this.socket, {
      maxLineBytes: this.ctx.maxLineBytes,
      idleTimeoutMs: this.ctx.idleTimeoutMs,
    });
    this.reader = reader;
    logger.info('Client connected', { ip: this.ip, clientId: session.clientId, state: this.connectionState });

    try {
      await this.readLoop(reader, session);
    } catch (error) {
      logger.error('Connection loop failed', toError(error), { ip: this.ip, clientId: session.clientId });
    } finally {
      this.connectionState = 'closing';
      reader.close();
      sessions.removeSession(session.clientId);
      metrics.recordConnectionChange(-1);
      this.socket.destroy();
      logger.info('Client disconnected', {
        ip: this.ip,
        clientId: session.clientId,
        requests: session.requestCount,
      });
    }
  }

  /**
   * Ask the loop to finish after the request in flight
   */
  requestClose(): void {
    this.closeRequested = true;
    this.reader?.close();
  }

  /**
   * Tear the socket down immediately, abandoning any request in flight
   */
  destroy(): void {
    this.teardown.abort();
    this.socket.destroy();
  }

  /**
   * Race a request against teardown; the abort listener lives only as long as the request
   */
  private async untilTeardown<T>(work: Promise<T>): Promise<T | typeof ABORTED> {
    const signal = this.teardown.signal;
    if (signal.aborted) {
      return ABORTED;
    }

    let onAbort: () => void = () => undefined;
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      onAbort = () => resolve(ABORTED);
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return await Promise.race([work, aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  /** Number of requests currently waiting on teardown */
  get pendingAbortListeners(): number {
    return getEventListeners(this.teardown.signal, 'abort').length;
  }

  private async readLoop(reader: LineReader, session: ClientSession): Promise<void> {
    while (!this.closeRequested) {
      const event: LineEvent = await reader.next();

      switch (event.type) {
        case 'timeout':
          if (this.socket.destroyed || !this.socket.writable) {
            this.ctx.logger.info('Idle connection already closed', { clientId: session.clientId });
            return;
          }
          this.ctx.logger.debug('Client idle', { clientId: session.clientId });
          continue;

        case 'eof':
          return;

        case 'error':
          this.ctx.logger.warn('Socket error', { clientId: session.clientId, error: event.error.message });
          return;

        case 'overflow':
          this.ctx.logger.warn('Discarded oversized line', { clientId: session.clientId, bytes: event.bytes });
          await this.send(
            errorResponse(null, JSONRPC_ERROR.INVALID_REQUEST, `Invalid Request: line exceeds ${this.ctx.maxLineBytes} bytes`)
          );
          continue;

        case 'line':
          if (!(await this.handleLine(event.line, session))) {
            return;
          }
          continue;
      }
    }
  }

  /**
   * Process one line; false means the connection must close
   */
  private async handleLine(line: string, session: ClientSession): Promise<boolean> {
    const decoded = decodeMessage(line);

    if (decoded.kind === 'parse-error') {
      this.ctx.logger.warn('Invalid JSON', { clientId: session.clientId, reason: decoded.reason });
      await this.send(errorResponse(null, JSONRPC_ERROR.PARSE_ERROR, 'Parse error'));
      return true;
    }

    if (decoded.kind === 'invalid') {
      this.ctx.logger.debug('Invalid request', { clientId: session.clientId, reason: decoded.reason });
      if (!decoded.notification) {
        await this.send(
          errorResponse(decoded.id ?? null, JSONRPC_ERROR.INVALID_REQUEST, `Invalid Request: ${decoded.reason}`)
        );
      }
      return true;
    }

    const request = decoded.request;
    const notification = isNotification(request);
    const id: JsonRpcId = request.id ?? null;

    if (!this.ctx.security.checkRateLimit(this.ip)) {
      this.ctx.metrics.recordRateLimited();
      this.ctx.logger.warn('Rate limit exceeded', { ip: this.ip, clientId: session.clientId, method: request.method });
      if (!notification) {
        await this.send(errorResponse(id, JSONRPC_ERROR.RATE_LIMITED, 'Rate limit exceeded'));
      }
      return true;
    }

    this.ctx.sessions.updateSession(session.clientId);

    if (!session.authenticated) {
      const outcome = await this.authenticate(request, session, notification);
      if (outcome === 'close') return false;
      if (outcome === 'answered') return true;
    }

    try {
      const result = await this.untilTeardown(this.dispatch(request, session));
      if (result === ABORTED) {
        return false;
      }
      if (!notification) {
        await this.send(successResponse(id, result));
      }
    } catch (error) {
      await this.reportFailure(error, request, session, notification);
    }
    return true;
  }

  /**
   * Gate for unauthenticated sessions
   *
   * A token may arrive as `params.auth_token` / `params.authToken` on
   * `initialize`, or as a top-level `auth_token` on any request.
   */
  private async authenticate(
    request: JsonRpcRequest,
    session: ClientSession,
    notification: boolean
  ): Promise<AuthOutcome> {
    const params = request.params ?? {};
    const token = request.auth_token
      ?? (request.method === MCP_METHOD.INITIALIZE
        ? optionalString(params.auth_token) ?? optionalString(params.authToken)
        : undefined);

    // A missing token is a request to authenticate, not a failed attempt
    if (token === undefined) {
      if (request.method === MCP_METHOD.PING) {
        return 'proceed';
      }
      if (!notification) {
        await this.send(errorResponse(request.id ?? null, JSONRPC_ERROR.AUTHENTICATION_FAILED, 'Authentication required'));
      }
      return 'answered';
    }

    const result = this.ctx.security.checkToken(this.ip, token);
    if (result === 'accepted') {
      session.authenticated = true;
      this.connectionState = 'serving';
      this.ctx.logger.info('Client authenticated', { ip: this.ip, clientId: session.clientId });
      return 'proceed';
    }

    if (!notification) {
      await this.send(errorResponse(request.id ?? null, JSONRPC_ERROR.AUTHENTICATION_FAILED, 'Authentication failed'));
    }
    if (result === 'locked-out') {
      this.ctx.logger.warn('Closing connection after lockout', { ip: this.ip, clientId: session.clientId });
      return 'close';
    }
    return 'answered';
  }

  private async dispatch(request: JsonRpcRequest, session: ClientSession): Promise<unknown> {
    const params = request.params ?? {};

    switch (request.method) {
      case MCP_METHOD.INITIALIZE:
        return this.initialize(params, session);

      case MCP_METHOD.INITIALIZED:
        session.initialized = true;
        return {};

      case MCP_METHOD.PING:
        return {};

      case MCP_METHOD.TOOLS_LIST:
        return { tools: this.ctx.registry.listTools() };

      case MCP_METHOD.TOOLS_CALL:
        return this.callTool(params, session);

      case MCP_METHOD.RESOURCES_LIST:
        return { resources: [] };

      case MCP_METHOD.PROMPTS_LIST:
        return { prompts: [] };

      default:
        throw JsonRpcError.methodNotFound(request.method);
    }
  }

  private initialize(params: Record<string, unknown>, session: ClientSession): unknown {
    const requested = optionalString(params.protocolVersion);
    const protocolVersion = requested !== undefined && SUPPORTED_PROTOCOL_VERSIONS.includes(requested)
      ? requested
      : LATEST_PROTOCOL_VERSION;

    if (isRecord(params.clientInfo)) {
      const name = optionalString(params.clientInfo.name);
      const version = optionalString(params.clientInfo.version);
      if (name !== undefined) {
        session.userAgent = version !== undefined ? `${name}/${version}` : name;
      }
    }
    session.initialized = true;

    this.ctx.logger.info('Client initialized', {
      clientId: session.clientId,
      protocolVersion,
      userAgent: session.userAgent,
    });

    return {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: { name: this.ctx.serverInfo.name, version: this.ctx.serverInfo.version },
    };
  }

  private async callTool(params: Record<string, unknown>, session: ClientSession): Promise<unknown> {
    const started = performance.now();
    const elapsed = (): number => (performance.now() - started) / 1000;

    const name = params.name;
    if (typeof name !== 'string' || name.length === 0) {
      this.ctx.metrics.recordRequest(INVALID_TOOL_METRIC, elapsed(), false);
      throw JsonRpcError.invalidParams('params.name must be a non-empty string');
    }

    const metricName = this.ctx.registry.has(name) ? name : UNKNOWN_TOOL_METRIC;
    const args = params.arguments ?? {};
    if (!isRecord(args)) {
      this.ctx.metrics.recordRequest(metricName, elapsed(), false);
      throw JsonRpcError.invalidParams('params.arguments must be an object');
    }

    const outcome = await this.ctx.registry.callTool(name, args, session);
    this.ctx.metrics.recordRequest(metricName, elapsed(), outcome.status === 'ok');
    if (outcome.status === 'exception' || outcome.status === 'timeout') {
      this.ctx.metrics.recordToolCallError(metricName, outcome.status);
    }

    this.ctx.logger.debug('Tool call finished', { clientId: session.clientId, tool: name, status: outcome.status });
    return outcome.result;
  }

  private async reportFailure(
    error: unknown,
    request: JsonRpcRequest,
    session: ClientSession,
    notification: boolean
  ): Promise<void> {
    if (error instanceof JsonRpcError) {
      this.ctx.logger.debug('Request rejected', { clientId: session.clientId, method: request.method, code: error.rpcCode });
      if (!notification) {
        await this.send(errorResponse(request.id ?? null, error.rpcCode, error.message));
      }
      return;
    }

    const err = toError(error);
    const correlationId = generateCorrelationId();
    this.ctx.logger.error('Request handler error', err, {
      correlationId,
      clientId: session.clientId,
      method: request.method,
    });
    if (!notification) {
      await this.send(
        errorResponse(request.id ?? null, JSONRPC_ERROR.INTERNAL_ERROR, `Internal error: ${err.message}`, { correlationId })
      );
    }
  }

  /**
   * Write one response line and wait until it has been flushed
   */
  private send(response: JsonRpcResponse): Promise<void> {
    if (this.socket.destroyed || !this.socket.writable) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.socket.write(serializeResponse(response), (error) => {
        if (error) {
          this.ctx.logger.debug('Response write failed', { clientId: this.session?.clientId, error: error.message });
        }
        resolve();
      });
    });
  }
}
