/**
 * Metrics collector
 *
 * Keeps the in-memory snapshot that tools and the summary endpoint read
 * (counters, a bounded request history, per-tool tallies) and mirrors every
 * event into a prom-client registry for scraping.
 *
 * Tracks:
 * - Tool requests (count, errors, duration)
 * - Connections (active, accepted, rejected by reason, rate-limited requests)
 * - Session lifecycle (active, created, destroyed)
 */

import { Registry, Counter, Gauge, Histogram } from 'prom-client';
import { DEFAULTS, TIME } from './constants.js';

export interface MetricsCollectorConfig {
  prefix?: string;
  /** Bound on the request history ring buffer */
  historySize?: number;
  now?: () => number;
}

export interface RequestRecord {
  tool: string;
  /** Seconds */
  responseTime: number;
  success: boolean;
  timestamp: Date;
}

export interface ToolStats {
  count: number;
  errors: number;
  successRate: number;
  avgResponseTime: number;
  minResponseTime: number;
  maxResponseTime: number;
}

export interface MetricsSummary {
  serverInfo: {
    startTime: string;
    uptimeSeconds: number;
    uptimeFormatted: string;
    platform: string;
    nodeVersion: string;
  };
  requestMetrics: {
    totalRequests: number;
    errorCount: number;
    successRatePercent: number;
    activeConnections: number;
    recentRequests: Array<{ tool: string; responseTime: number; success: boolean; timestamp: string }>;
  };
  toolMetrics: Record<string, ToolStats>;
}

interface ToolTally {
  count: number;
  errors: number;
  totalTime: number;
  minTime: number;
  maxTime: number;
}

const RECENT_REQUESTS = 10;

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Format a duration as `H:MM:SS`, prefixed with whole days when there are any
 */
export function formatUptime(totalSeconds: number): string {
  const seconds = Math.floor(totalSeconds);
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / TIME.SECONDS_PER_MINUTE);
  const secs = seconds % TIME.SECONDS_PER_MINUTE;
  const clock = `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
  if (days === 0) return clock;
  return `${days} day${days === 1 ? '' : 's'}, ${clock}`;
}

export class MetricsCollector {
  private registry: Registry;
  private readonly historySize: number;
  private readonly now: () => number;

  private startTime: number;
  private requestCount = 0;
  private errorCount = 0;
  private activeConnections = 0;
  private history: RequestRecord[] = [];
  private tools = new Map<string, ToolTally>();

  // Request metrics
  private requestsTotal: Counter;
  private requestDuration: Histogram;
  private toolCallErrors: Counter;

  // Connection metrics
  private connectionsActive: Gauge;
  private connectionsTotal: Counter;
  private connectionsRejected: Counter;
  private rateLimitedTotal: Counter;

  // Session metrics
  private sessionsActive: Gauge;
  private sessionsCreatedTotal: Counter;
  private sessionsDestroyedTotal: Counter;

  constructor(config: MetricsCollectorConfig = {}) {
    this.registry = new Registry();
    this.historySize = config.historySize ?? DEFAULTS.METRICS_HISTORY_SIZE;
    this.now = config.now ?? Date.now;
    this.startTime = this.now();

    const prefix = config.prefix || 'mcp_';

    this.requestsTotal = new Counter({
      name: `${prefix}requests_total`,
      help: 'Total number of tool requests',
      labelNames: ['tool', 'status'],
      registers: [this.registry],
    });

    this.requestDuration = new Histogram({
      name: `${prefix}request_duration_seconds`,
      help: 'Tool request duration in seconds',
      labelNames: ['tool', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
      registers: [this.registry],
    });

    this.toolCallErrors = new Counter({
      name: `${prefix}tool_call_errors_total`,
      help: 'Total number of tool calls that raised or timed out',
      labelNames: ['tool', 'error_type'],
      registers: [this.registry],
    });

    this.connectionsActive = new Gauge({
      name: `${prefix}connections_active`,
      help: 'Number of open client connections',
      registers: [this.registry],
    });

    this.connectionsTotal = new Counter({
      name: `${prefix}connections_total`,
      help: 'Total number of admitted client connections',
      registers: [this.registry],
    });

    this.connectionsRejected = new Counter({
      name: `${prefix}connections_rejected_total`,
      help: 'Total number of connections refused at admission',
      labelNames: ['reason'],
      registers: [this.registry],
    });

    this.rateLimitedTotal = new Counter({
      name: `${prefix}rate_limited_total`,
      help: 'Total number of requests refused by the rate limiter',
      registers: [this.registry],
    });

    this.sessionsActive = new Gauge({
      name: `${prefix}sessions_active`,
      help: 'Number of active sessions',
      registers: [this.registry],
    });

    this.sessionsCreatedTotal = new Counter({
      name: `${prefix}sessions_created_total`,
      help: 'Total number of sessions created',
      registers: [this.registry],
    });

    this.sessionsDestroyedTotal = new Counter({
      name: `${prefix}sessions_destroyed_total`,
      help: 'Total number of sessions destroyed',
      registers: [this.registry],
    });
  }

  /**
   * Record one tool request
   *
   * @param responseTime - seconds
   */
  recordRequest(tool: string, responseTime: number, success: boolean): void {
    this.requestCount++;
    if (!success) {
      this.errorCount++;
    }

    this.history.push({ tool, responseTime, success, timestamp: new Date(this.now()) });
    if (this.history.length > this.historySize) {
      this.history.shift();
    }

    const tally = this.tools.get(tool) ?? {
      count: 0,
      errors: 0,
      totalTime: 0,
      minTime: Number.POSITIVE_INFINITY,
      maxTime: 0,
    };
    tally.count++;
    tally.totalTime += responseTime;
    tally.minTime = Math.min(tally.minTime, responseTime);
    tally.maxTime = Math.max(tally.maxTime, responseTime);
    if (!success) {
      tally.errors++;
    }
    this.tools.set(tool, tally);

    const status = success ? 'success' : 'error';
    this.requestsTotal.inc({ tool, status });
    this.requestDuration.observe({ tool, status }, responseTime);
  }

  /**
   * Record a tool call that raised or timed out
   */
  recordToolCallError(tool: string, errorType: string): void {
    this.toolCallErrors.inc({ tool, error_type: errorType });
  }

  recordConnectionChange(delta: number): void {
    this.activeConnections = Math.max(0, this.activeConnections + delta);
    this.connectionsActive.set(this.activeConnections);
    if (delta > 0) {
      this.connectionsTotal.inc(delta);
    }
  }

  recordRejectedConnection(reason: string): void {
    this.connectionsRejected.inc({ reason });
  }

  recordRateLimited(): void {
    this.rateLimitedTotal.inc();
  }

  recordSessionCreated(): void {
    this.sessionsCreatedTotal.inc();
    this.sessionsActive.inc();
  }

  recordSessionDestroyed(): void {
    this.sessionsDestroyedTotal.inc();
    this.sessionsActive.dec();
  }

  getActiveConnections(): number {
    return this.activeConnections;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  getErrorCount(): number {
    return this.errorCount;
  }

  getUptimeSeconds(): number {
    return (this.now() - this.startTime) / TIME.MS_PER_SECOND;
  }

  /**
   * Snapshot with derived values (success rates, averages) computed on read
   */
  getSummary(): MetricsSummary {
    const uptimeSeconds = this.getUptimeSeconds();
    const successRate = this.requestCount > 0
      ? ((this.requestCount - this.errorCount) / this.requestCount) * 100
      : 0;

    const toolMetrics: Record<string, ToolStats> = {};
    for (const [tool, tally] of this.tools) {
      toolMetrics[tool] = this.toToolStats(tally);
    }

    return {
      serverInfo: {
        startTime: new Date(this.startTime).toISOString(),
        uptimeSeconds,
        uptimeFormatted: formatUptime(uptimeSeconds),
        platform: process.platform,
        nodeVersion: process.version,
      },
      requestMetrics: {
        totalRequests: this.requestCount,
        errorCount: this.errorCount,
        successRatePercent: round(successRate, 2),
        activeConnections: this.activeConnections,
        recentRequests: this.history.slice(-RECENT_REQUESTS).map((record) => ({
          tool: record.tool,
          responseTime: round(record.responseTime, 3),
          success: record.success,
          timestamp: record.timestamp.toISOString(),
        })),
      },
      toolMetrics,
    };
  }

  getToolMetrics(tool: string): (ToolStats & { toolName: string }) | undefined {
    const tally = this.tools.get(tool);
    if (!tally) {
      return undefined;
    }
    return { toolName: tool, ...this.toToolStats(tally) };
  }

  getHistory(): readonly RequestRecord[] {
    return this.history;
  }

  /**
   * Get metrics in Prometheus format
   */
  async getPrometheusMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  /**
   * Get registry (for testing)
   */
  getRegistry(): Registry {
    return this.registry;
  }

  reset(): void {
    this.requestCount = 0;
    this.errorCount = 0;
    this.activeConnections = 0;
    this.history = [];
    this.tools = new Map();
    this.startTime = this.now();
    this.registry.resetMetrics();
  }

  private toToolStats(tally: ToolTally): ToolStats {
    return {
      count: tally.count,
      errors: tally.errors,
      successRate: tally.count > 0 ? round(((tally.count - tally.errors) / tally.count) * 100, 2) : 0,
      avgResponseTime: tally.count > 0 ? round(tally.totalTime / tally.count, 3) : 0,
      minResponseTime: Number.isFinite(tally.minTime) ? round(tally.minTime, 3) : 0,
      maxResponseTime: round(tally.maxTime, 3),
    };
  }
}
