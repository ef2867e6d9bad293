/**
 * Tool contracts shared by the registry and tool providers
 */

import type { ClientSession } from './session.js';

export interface JsonSchemaProperty {
  type: 'string' | 'integer' | 'number' | 'boolean' | 'object' | 'array';
  description?: string;
  default?: unknown;
  enum?: string[];
  items?: JsonSchemaProperty;
}

/**
 * Tool metadata returned by `tools/list`
 *
 * The input schema is descriptive only; handlers validate their own arguments.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolResult {
  content: TextContent[];
  isError?: boolean;
}

export type ToolArguments = Record<string, unknown>;

export type ToolHandler = (args: ToolArguments, session: ClientSession) => Promise<ToolResult>;

/**
 * A collaborator that contributes tools to the registry
 */
export interface ToolProvider {
  readonly name: string;
  getToolDefinitions(): ToolDefinition[];
  getHandler(name: string): ToolHandler | undefined;
}
