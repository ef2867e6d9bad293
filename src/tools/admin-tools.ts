/**
 * Admin tools: server and host introspection
 */

import os from 'node:os';
import fs from 'node:fs/promises';
import type { Logger } from '../logger.js';
import { formatUptime, type MetricsCollector } from '../metrics.js';
import { textResult } from '../tool-registry.js';
import type { ClientSession } from '../types/session.js';
import type { ToolResult } from '../types/tools.js';
import { BaseToolProvider, defineTool, requireString } from './provider.js';

export interface SystemSnapshot {
  cpuCount: number;
  /** 1-minute load average */
  loadAverage: number;
  /** Load average relative to the core count */
  cpuLoadPercent: number;
  memoryTotalBytes: number;
  memoryUsedBytes: number;
  memoryPercent: number;
  /** Absent when the filesystem cannot be inspected */
  disk?: { totalBytes: number; usedBytes: number; percent: number };
}

export type SystemProbe = () => Promise<SystemSnapshot>;

export type HealthLevel = 'healthy' | 'warning' | 'critical';

export interface HealthCheck {
  name: string;
  status: HealthLevel;
  value: string;
}

export interface HealthReport {
  overall: HealthLevel;
  checks: HealthCheck[];
}

export interface ServerLoad {
  activeConnections: number;
  maxConnections: number;
  totalRequests: number;
  successRatePercent: number;
}

/** Percent usage at which a check turns warning / critical */
export const HEALTH_THRESHOLDS = {
  cpu: { warning: 80, critical: 95 },
  memory: { warning: 85, critical: 95 },
  disk: { warning: 85, critical: 95 },
  connections: { warning: 80, critical: 100 },
  /** Success rate below which a check turns warning / critical */
  successRate: { warning: 95, critical: 80 },
} as const;

const GIB = 1024 ** 3;

function percent(used: number, total: number): number {
  return total > 0 ? Math.round((used / total) * 1000) / 10 : 0;
}

function gib(bytes: number): string {
  return `${(bytes / GIB).toFixed(1)} GiB`;
}

export async function readSystemSnapshot(diskPath = '/'): Promise<SystemSnapshot> {
  const cpuCount = Math.max(os.cpus().length, 1);
  const loadAverage = os.loadavg()[0];
  const memoryTotalBytes = os.totalmem();
  const memoryUsedBytes = memoryTotalBytes - os.freemem();

  let disk: SystemSnapshot['disk'];
  try {
    const stats = await fs.statfs(diskPath);
    const totalBytes = stats.blocks * stats.bsize;
    const usedBytes = (stats.blocks - stats.bfree) * stats.bsize;
    disk = { totalBytes, usedBytes, percent: percent(usedBytes, totalBytes) };
  } catch {
    disk = undefined;
  }

  return {
    cpuCount,
    loadAverage,
    cpuLoadPercent: percent(loadAverage, cpuCount),
    memoryTotalBytes,
    memoryUsedBytes,
    memoryPercent: percent(memoryUsedBytes, memoryTotalBytes),
    disk,
  };
}

function usageLevel(value: number, limits: { warning: number; critical: number }): HealthLevel {
  if (value >= limits.critical) return 'critical';
  if (value >= limits.warning) return 'warning';
  return 'healthy';
}

const SEVERITY: Record<HealthLevel, number> = { healthy: 0, warning: 1, critical: 2 };

/**
 * Grade host and server load; the overall status is the worst check
 */
export function evaluateHealth(system: SystemSnapshot, load: ServerLoad): HealthReport {
  const checks: HealthCheck[] = [
    {
      name: 'cpu',
      status: usageLevel(system.cpuLoadPercent, HEALTH_THRESHOLDS.cpu),
      value: `${system.cpuLoadPercent}% (load ${system.loadAverage.toFixed(2)} on ${system.cpuCount} cores)`,
    },
    {
      name: 'memory',
      status: usageLevel(system.memoryPercent, HEALTH_THRESHOLDS.memory),
      value: `${system.memoryPercent}%`,
    },
  ];

  if (system.disk) {
    checks.push({
      name: 'disk',
      status: usageLevel(system.disk.percent, HEALTH_THRESHOLDS.disk),
      value: `${system.disk.percent}%`,
    });
  }

  const connectionUse = percent(load.activeConnections, load.maxConnections);
  checks.push({
    name: 'connections',
    status: usageLevel(connectionUse, HEALTH_THRESHOLDS.connections),
    value: `${load.activeConnections}/${load.maxConnections}`,
  });

  if (load.totalRequests === 0) {
    checks.push({ name: 'success_rate', status: 'healthy', value: 'no requests yet' });
  } else {
    const rate = load.successRatePercent;
    const { warning, critical } = HEALTH_THRESHOLDS.successRate;
    checks.push({
      name: 'success_rate',
      status: rate < critical ? 'critical' : rate < warning ? 'warning' : 'healthy',
      value: `${rate}%`,
    });
  }

  const overall = checks.reduce<HealthLevel>(
    (worst, check) => (SEVERITY[check.status] > SEVERITY[worst] ? check.status : worst),
    'healthy'
  );
  return { overall, checks };
}

export interface AdminToolsOptions {
  metrics: MetricsCollector;
  serverInfo: { name: string; version: string };
  maxConnections: number;
  probe?: SystemProbe;
  now?: () => Date;
  logger?: Logger;
}

export class AdminTools extends BaseToolProvider {
  readonly name = 'admin';
  private readonly metrics: MetricsCollector;
  private readonly probe: SystemProbe;
  private readonly now: () => Date;

  constructor(private readonly options: AdminToolsOptions) {
    super(options.logger);
    this.metrics = options.metrics;
    this.probe = options.probe ?? (() => readSystemSnapshot());
    this.now = options.now ?? (() => new Date());

    this.addTool(
      defineTool('get_system_info', 'Get host information and server status'),
      (_args, session) => this.systemInfo(session)
    );
    this.addTool(
      defineTool(
        'echo',
        'Echo a message with client metadata and a timestamp',
        { message: { type: 'string', description: 'Message to echo' } },
        ['message']
      ),
      (args, session) => this.echo(requireString(args, 'message'), session)
    );
    this.addTool(defineTool('get_metrics', 'Get server performance metrics and per-tool statistics'), () =>
      this.metricsReport()
    );
    this.addTool(
      defineTool('health_check', 'Grade CPU, memory, disk, connection headroom and error rate'),
      () => this.healthCheck()
    );
  }

  private async systemInfo(session: ClientSession): Promise<ToolResult> {
    const system = await this.probe();
    const lines = [
      'System Information',
      '',
      'Host:',
      `- Platform: ${os.platform()} ${os.release()} (${os.arch()})`,
      `- Hostname: ${os.hostname()}`,
      `- CPU Load: ${system.cpuLoadPercent}% (${system.cpuCount} cores)`,
      `- Memory: ${system.memoryPercent}% used (${gib(system.memoryUsedBytes)} / ${gib(system.memoryTotalBytes)})`,
      system.disk
        ? `- Disk: ${system.disk.percent}% used (${gib(system.disk.usedBytes)} / ${gib(system.disk.totalBytes)})`
        : '- Disk: unavailable',
      '',
      'Runtime:',
      `- Node.js: ${process.version}`,
      `- Process ID: ${process.pid}`,
      `- Working Directory: ${process.cwd()}`,
      '',
      'Server:',
      `- Name: ${this.options.serverInfo.name} ${this.options.serverInfo.version}`,
      `- Current Time: ${this.now().toISOString()}`,
      `- Uptime: ${formatUptime(this.metrics.getUptimeSeconds())}`,
      `- Active Connections: ${this.metrics.getActiveConnections()}`,
      `- Total Requests: ${this.metrics.getRequestCount()}`,
      '',
      'Client:',
      `- IP: ${session.ipAddress}`,
      `- Connected: ${session.connectedAt.toISOString()}`,
      `- Requests Made: ${session.requestCount}`,
      `- Authenticated: ${session.authenticated ? 'yes' : 'no'}`,
    ];
    return textResult(lines.join('\n'));
  }

  private echo(message: string, session: ClientSession): ToolResult {
    return textResult(
      [
        'Echo Response',
        `Message: ${message}`,
        `Timestamp: ${this.now().toISOString()}`,
        `Client IP: ${session.ipAddress}`,
        `Request Count: ${session.requestCount}`,
      ].join('\n')
    );
  }

  private metricsReport(): ToolResult {
    const summary = this.metrics.getSummary();
    const { serverInfo, requestMetrics, toolMetrics } = summary;
    const lines = [
      'Server Metrics',
      '',
      `Start Time: ${serverInfo.startTime}`,
      `Uptime: ${serverInfo.uptimeFormatted}`,
      `Total Requests: ${requestMetrics.totalRequests}`,
      `Errors: ${requestMetrics.errorCount}`,
      `Success Rate: ${requestMetrics.successRatePercent}%`,
      `Active Connections: ${requestMetrics.activeConnections}`,
    ];

    const tools = Object.entries(toolMetrics);
    if (tools.length > 0) {
      lines.push('', 'Tools:');
      for (const [tool, stats] of tools) {
        lines.push(
          `- ${tool}: ${stats.count} calls, ${stats.successRate}% ok, ` +
            `avg ${stats.avgResponseTime}s (min ${stats.minResponseTime}s, max ${stats.maxResponseTime}s)`
        );
      }
    }

    const recent = requestMetrics.recentRequests.slice(-5);
    if (recent.length > 0) {
      lines.push('', 'Recent Requests:');
      for (const request of recent) {
        lines.push(`- ${request.success ? 'ok' : 'FAILED'} ${request.tool}: ${request.responseTime}s`);
      }
    }

    return textResult(lines.join('\n'));
  }

  private async healthCheck(): Promise<ToolResult> {
    const summary = this.metrics.getSummary();
    const report = evaluateHealth(await this.probe(), {
      activeConnections: summary.requestMetrics.activeConnections,
      maxConnections: this.options.maxConnections,
      totalRequests: summary.requestMetrics.totalRequests,
      successRatePercent: summary.requestMetrics.successRatePercent,
    });

    const lines = [
      `Health Check: ${report.overall.toUpperCase()}`,
      `Timestamp: ${this.now().toISOString()}`,
      '',
      ...report.checks.map((check) => `- ${check.name}: ${check.status} (${check.value})`),
    ];
    // A critical grade is a finding, not a tool failure
    return textResult(lines.join('\n'));
  }
}
