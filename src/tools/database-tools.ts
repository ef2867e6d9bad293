/**
 * Database tools: pass-throughs to the downstream database service
 */

import { ValidationError } from '../errors.js';
import type { DatabaseServiceClient } from '../http-client.js';
import type { Logger } from '../logger.js';
import { textResult } from '../tool-registry.js';
import type { ToolArguments, ToolResult } from '../types/tools.js';
import {
  BaseToolProvider,
  defineTool,
  optionalInteger,
  optionalString,
  requireId,
  requireObject,
  requireString,
} from './provider.js';

export interface DatabaseToolsOptions {
  client: DatabaseServiceClient;
  logger?: Logger;
}

const SCHEMA = { type: 'string', description: 'Schema name' } as const;
const TABLE = { type: 'string', description: 'Table name' } as const;
const RECORD_ID = { type: 'string', description: 'Primary key of the record; integers are accepted too' } as const;
const SQL = { type: 'string', description: 'SQL statement' } as const;
const PARAMETERS = { type: 'array', description: 'Positional statement parameters' } as const;

function field(body: unknown, key: string): unknown {
  return typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;
}

/**
 * Render a service payload; a payload carrying an `error` string is a failure
 */
function jsonResult(body: unknown): ToolResult {
  const error = field(body, 'error');
  if (typeof error === 'string') {
    return textResult(`Error: ${error}`, true);
  }
  return textResult(JSON.stringify(body, null, 2));
}

function count(body: unknown, key: string): { items: unknown[]; count: number } {
  const value = field(body, key);
  const items = Array.isArray(value) ? value : [];
  return { items, count: items.length };
}

function parameters(args: ToolArguments): unknown[] | undefined {
  const value = args.parameters;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ValidationError("'parameters' must be an array", { field: 'parameters' });
  }
  return value;
}

export class DatabaseTools extends BaseToolProvider {
  readonly name = 'database';
  private readonly client: DatabaseServiceClient;

  constructor(options: DatabaseToolsOptions) {
    super(options.logger);
    this.client = options.client;

    this.addTool(defineTool('database_health', 'Check connectivity to the database service'), async () => {
      const response = await this.client.get('/health');
      return jsonResult({ status: 'connected', database_url: this.client.url, response });
    });

    this.addTool(defineTool('list_databases', 'List databases'), async () => {
      const { items, count: total } = count(await this.client.get('/databases'), 'databases');
      return jsonResult({ databases: items, count: total });
    });

    this.addTool(defineTool('list_schemas', 'List schemas in the current database'), async () => {
      const { items, count: total } = count(await this.client.get('/schemas'), 'schemas');
      return jsonResult({ schemas: items, count: total });
    });

    this.addTool(
      defineTool('list_tables', 'List tables, optionally within one schema', { schema_name: SCHEMA }),
      async (args) => {
        const schema = optionalString(args, 'schema_name');
        const { items, count: total } = count(await this.client.get('/tables', { schema }), 'tables');
        return jsonResult({ tables: items, count: total, schema: schema ?? 'all' });
      }
    );

    this.addTool(
      defineTool('execute_sql', 'Run a read-only SQL query', { sql: SQL, parameters: PARAMETERS }, ['sql']),
      async (args) =>
        jsonResult(await this.client.post('/query', { sql: requireString(args, 'sql'), parameters: parameters(args) }))
    );

    this.addTool(
      defineTool('execute_write_sql', 'Run an INSERT, UPDATE or DELETE statement', { sql: SQL, parameters: PARAMETERS }, [
        'sql',
      ]),
      async (args) =>
        jsonResult(await this.client.post('/write', { sql: requireString(args, 'sql'), parameters: parameters(args) }))
    );

    this.addTool(
      defineTool(
        'read_records',
        'Read a page of records from a table',
        {
          schema_name: SCHEMA,
          table_name: TABLE,
          limit: { type: 'integer', description: 'Maximum records', default: 100 },
          offset: { type: 'integer', description: 'Records to skip', default: 0 },
          order_by: { type: 'string', description: 'Column to order by' },
        },
        ['schema_name', 'table_name']
      ),
      async (args) =>
        jsonResult(
          await this.client.post('/records', {
            ...this.target(args),
            limit: optionalInteger(args, 'limit', 100, 1),
            offset: optionalInteger(args, 'offset', 0),
            order_by: optionalString(args, 'order_by'),
          })
        )
    );

    this.addTool(
      defineTool('read_record', 'Read one record by id', { schema_name: SCHEMA, table_name: TABLE, record_id: RECORD_ID }, [
        'schema_name',
        'table_name',
        'record_id',
      ]),
      async (args) => jsonResult(await this.client.post('/record', { ...this.target(args), id: requireId(args, 'record_id') }))
    );

    this.addTool(
      defineTool(
        'create_record',
        'Insert a record',
        { schema_name: SCHEMA, table_name: TABLE, data: { type: 'object', description: 'Column values' } },
        ['schema_name', 'table_name', 'data']
      ),
      async (args) => jsonResult(await this.client.post('/create', { ...this.target(args), data: requireObject(args, 'data') }))
    );

    this.addTool(
      defineTool(
        'update_record',
        'Update columns of a record',
        {
          schema_name: SCHEMA,
          table_name: TABLE,
          record_id: RECORD_ID,
          data: { type: 'object', description: 'Columns to change' },
        },
        ['schema_name', 'table_name', 'record_id', 'data']
      ),
      async (args) =>
        jsonResult(
          await this.client.post('/update', {
            ...this.target(args),
            id: requireId(args, 'record_id'),
            data: requireObject(args, 'data'),
          })
        )
    );

    this.addTool(
      defineTool('delete_record', 'Delete a record by id', { schema_name: SCHEMA, table_name: TABLE, record_id: RECORD_ID }, [
        'schema_name',
        'table_name',
        'record_id',
      ]),
      async (args) => jsonResult(await this.client.post('/delete', { ...this.target(args), id: requireId(args, 'record_id') }))
    );
  }

  private target(args: ToolArguments): { schema: string; table: string } {
    return { schema: requireString(args, 'schema_name'), table: requireString(args, 'table_name') };
  }
}
