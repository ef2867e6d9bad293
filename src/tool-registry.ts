/**
 * Tool registry and dispatch
 *
 * Maps tool names to definitions and handlers contributed by providers.
 * Dispatch never throws: unknown tools, handler exceptions and timeouts all
 * come back as `isError` results so a failing tool cannot take down the
 * connection that called it.
 */

import { ConfigurationError, ToolTimeoutError, generateCorrelationId, toError } from './errors.js';
import type { Logger } from './logger.js';
import type { ClientSession } from './types/session.js';
import type {
  ToolArguments,
  ToolDefinition,
  ToolHandler,
  ToolProvider,
  ToolResult,
} from './types/tools.js';

/**
 * How a call ended; `tool-error` is a handler that reported failure itself
 */
export type ToolCallStatus = 'ok' | 'tool-error' | 'unknown-tool' | 'exception' | 'timeout';

export interface ToolCallOutcome {
  result: ToolResult;
  status: ToolCallStatus;
}

export interface ToolRegistryOptions {
  logger?: Logger;
  /** Per-call deadline; omitted or 0 disables it */
  timeoutMs?: number;
}

interface RegisteredTool {
  definition: ToolDefinition;
  handler: ToolHandler;
  provider?: string;
}

export function textResult(text: string, isError = false): ToolResult {
  return isError ? { content: [{ type: 'text', text }], isError: true } : { content: [{ type: 'text', text }] };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger?: Logger;
  private readonly timeoutMs: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * Merge every tool a provider contributes
   *
   * @throws {ConfigurationError} on a duplicate name or a definition without handler
   */
  register(provider: ToolProvider): void {
    for (const definition of provider.getToolDefinitions()) {
      const handler = provider.getHandler(definition.name);
      if (!handler) {
        throw new ConfigurationError(`Provider '${provider.name}' has no handler for tool '${definition.name}'`, {
          provider: provider.name,
          tool: definition.name,
        });
      }
      this.add({ definition, handler, provider: provider.name });
    }
    this.logger?.debug('Tool provider registered', { provider: provider.name, tools: this.tools.size });
  }

  registerTool(definition: ToolDefinition, handler: ToolHandler): void {
    this.add({ definition, handler });
  }

  listTools(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.tools.get(name)?.handler;
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Run a tool and fold every failure mode into a ToolResult
   */
  async callTool(name: string, args: ToolArguments, session: ClientSession): Promise<ToolCallOutcome> {
    const tool = this.tools.get(name);
    if (!tool) {
      return { result: textResult(`Unknown tool: ${name}`, true), status: 'unknown-tool' };
    }

    try {
      const result = await this.withTimeout(name, tool.handler(args, session));
      return { result, status: result.isError ? 'tool-error' : 'ok' };
    } catch (error) {
      if (error instanceof ToolTimeoutError) {
        this.logger?.warn('Tool call timed out', { tool: name, clientId: session.clientId, timeoutMs: this.timeoutMs });
        return { result: textResult(error.message, true), status: 'timeout' };
      }

      const err = toError(error);
      const correlationId = generateCorrelationId();
      this.logger?.error('Tool handler error', err, { correlationId, tool: name, clientId: session.clientId });
      return { result: textResult(`Internal error: ${err.message}`, true), status: 'exception' };
    }
  }

  private add(tool: RegisteredTool): void {
    const name = tool.definition.name;
    const existing = this.tools.get(name);
    if (existing) {
      throw new ConfigurationError(`Duplicate tool name '${name}'`, {
        tool: name,
        providers: [existing.provider, tool.provider],
      });
    }
    this.tools.set(name, tool);
  }

  private async withTimeout(name: string, pending: Promise<ToolResult>): Promise<ToolResult> {
    if (this.timeoutMs <= 0) {
      return pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ToolTimeoutError(name, this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([pending, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
