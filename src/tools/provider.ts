/**
 * Shared plumbing for tool providers
 */

import { ValidationError, isMCPError, toError } from '../errors.js';
import type { Logger } from '../logger.js';
import { textResult } from '../tool-registry.js';
import type { ClientSession } from '../types/session.js';
import type {
  JsonSchemaProperty,
  ToolArguments,
  ToolDefinition,
  ToolHandler,
  ToolProvider,
  ToolResult,
} from '../types/tools.js';

export function defineTool(
  name: string,
  description: string,
  properties: Record<string, JsonSchemaProperty> = {},
  required: string[] = []
): ToolDefinition {
  return { name, description, inputSchema: { type: 'object', properties, required } };
}

export function requireString(args: ToolArguments, name: string): string {
  const value = args[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`'${name}' must be a non-empty string`, { field: name });
  }
  return value;
}

export function optionalString(args: ToolArguments, name: string): string | undefined {
  const value = args[name];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`'${name}' must be a string`, { field: name });
  }
  return value;
}

export function optionalInteger(args: ToolArguments, name: string, fallback: number, min = 0): number {
  const value = args[name];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ValidationError(`'${name}' must be an integer >= ${min}`, { field: name });
  }
  return value;
}

export function optionalBoolean(args: ToolArguments, name: string, fallback: boolean): boolean {
  const value = args[name];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`'${name}' must be a boolean`, { field: name });
  }
  return value;
}

export function requireObject(args: ToolArguments, name: string): Record<string, unknown> {
  const value = args[name];
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`'${name}' must be an object`, { field: name });
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Record/string id accepted as either JSON type; the service compares as text
 */
export function requireId(args: ToolArguments, name: string): string {
  const value = args[name];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return requireString(args, name);
}

type ProviderHandler = (args: ToolArguments, session: ClientSession) => Promise<ToolResult> | ToolResult;

/**
 * Base provider: a fixed table of tools whose handlers report failures as
 * `isError` results instead of throwing
 */
export abstract class BaseToolProvider implements ToolProvider {
  abstract readonly name: string;
  private readonly handlers = new Map<string, ToolHandler>();
  private readonly definitions: ToolDefinition[] = [];

  constructor(protected readonly logger?: Logger) {}

  protected addTool(definition: ToolDefinition, handler: ProviderHandler): void {
    this.definitions.push(definition);
    this.handlers.set(definition.name, async (args, session) => {
      try {
        return await handler(args, session);
      } catch (error) {
        return this.failure(definition.name, error);
      }
    });
  }

  getToolDefinitions(): ToolDefinition[] {
    return [...this.definitions];
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.handlers.get(name);
  }

  private failure(tool: string, error: unknown): ToolResult {
    const err = toError(error);
    if (err instanceof ValidationError) {
      return textResult(`Invalid arguments: ${err.message}`, true);
    }
    this.logger?.warn('Tool failed', { provider: this.name, tool, error: err.message, code: isMCPError(err) ? err.code : undefined });
    return textResult(`Error: ${err.message}`, true);
  }
}
