/**
 * Redis tools proxied through the database service's command endpoint
 */

import type { DatabaseServiceClient } from '../http-client.js';
import type { Logger } from '../logger.js';
import { textResult } from '../tool-registry.js';
import type { ToolResult } from '../types/tools.js';
import { BaseToolProvider, defineTool, optionalInteger, optionalString, requireString } from './provider.js';

export interface RedisToolsOptions {
  client: DatabaseServiceClient;
  logger?: Logger;
}

type RedisCommand = 'KEYS' | 'GET' | 'SET' | 'DEL' | 'SCAN';

function field(body: unknown, key: string): unknown {
  return typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.map((item) => String(item)) : [];
}

function listing(title: string, keys: string[], limit: number): string {
  const shown = keys.slice(0, limit);
  const lines = [`${title}: ${keys.length} key(s)`];
  if (keys.length > limit) {
    lines[0] += `, showing first ${limit}`;
  }
  if (shown.length > 0) {
    lines.push('', ...shown.map((key) => `- ${key}`));
  }
  return lines.join('\n');
}

export class RedisTools extends BaseToolProvider {
  readonly name = 'redis';
  private readonly client: DatabaseServiceClient;

  constructor(options: RedisToolsOptions) {
    super(options.logger);
    this.client = options.client;

    this.addTool(defineTool('redis_health', 'Report Redis server status'), () => this.health());

    this.addTool(
      defineTool('redis_keys', 'List keys matching a glob pattern', {
        pattern: { type: 'string', description: 'Glob pattern', default: '*' },
        limit: { type: 'integer', description: 'Maximum keys to show', default: 100 },
      }),
      async (args) => {
        const pattern = optionalString(args, 'pattern') ?? '*';
        const limit = optionalInteger(args, 'limit', 100, 1);
        const keys = stringList(await this.command('KEYS', [pattern]));
        return textResult(listing(`Keys matching '${pattern}'`, keys, limit));
      }
    );

    this.addTool(
      defineTool('redis_get', 'Read a string value', { key: { type: 'string', description: 'Key' } }, ['key']),
      async (args) => {
        const key = requireString(args, 'key');
        const value = await this.command('GET', [key]);
        if (value === null || value === undefined) {
          return textResult(`Key '${key}' not found in Redis`, true);
        }
        return textResult(`Key: ${key}\nValue: ${String(value)}`);
      }
    );

    this.addTool(
      defineTool(
        'redis_set',
        'Write a string value, optionally with an expiry',
        {
          key: { type: 'string', description: 'Key' },
          value: { type: 'string', description: 'Value' },
          expire: { type: 'integer', description: 'Expiry in seconds' },
        },
        ['key', 'value']
      ),
      async (args) => {
        const key = requireString(args, 'key');
        const value = requireString(args, 'value');
        const expire = optionalInteger(args, 'expire', 0, 1);
        const commandArgs: Array<string | number> = [key, value];
        if (expire > 0) {
          commandArgs.push('EX', expire);
        }
        const reply = await this.command('SET', commandArgs);
        if (reply !== 'OK') {
          return textResult(`Failed to set key '${key}'`, true);
        }
        return textResult(expire > 0 ? `Set '${key}' (expires in ${expire}s)` : `Set '${key}'`);
      }
    );

    this.addTool(
      defineTool('redis_delete', 'Delete a key', { key: { type: 'string', description: 'Key' } }, ['key']),
      async (args) => {
        const key = requireString(args, 'key');
        const removed = await this.command('DEL', [key]);
        if (removed === 0) {
          return textResult(`Key '${key}' not found in Redis`, true);
        }
        return textResult(`Deleted '${key}'`);
      }
    );

    this.addTool(
      defineTool('redis_scan', 'Incrementally scan keys matching a pattern', {
        pattern: { type: 'string', description: 'Glob pattern', default: '*' },
        count: { type: 'integer', description: 'SCAN COUNT hint', default: 10 },
        limit: { type: 'integer', description: 'Maximum keys to show', default: 100 },
      }),
      async (args) => {
        const pattern = optionalString(args, 'pattern') ?? '*';
        const count = optionalInteger(args, 'count', 10, 1);
        const limit = optionalInteger(args, 'limit', 100, 1);
        const reply = await this.command('SCAN', [0, 'MATCH', pattern, 'COUNT', count]);
        const keys = Array.isArray(reply) ? stringList(reply[1]) : [];
        return textResult(listing(`Scan of '${pattern}'`, keys, limit));
      }
    );
  }

  private async health(): Promise<ToolResult> {
    const info = await this.client.get('/admin/health');
    const lines = ['Redis Health'];
    for (const key of ['status', 'version', 'uptime', 'connected_clients', 'used_memory', 'total_keys']) {
      const value = field(info, key);
      if (value !== undefined) {
        lines.push(`- ${key}: ${String(value)}`);
      }
    }
    return textResult(lines.join('\n'));
  }

  private async command(command: RedisCommand, args: Array<string | number>): Promise<unknown> {
    const reply = await this.client.post('/redis/command', { command, args });
    return field(reply, 'result');
  }
}
