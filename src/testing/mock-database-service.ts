/**
 * In-process stand-in for the downstream database service
 *
 * msw intercepts fetch calls to MOCK_DATABASE_URL and answers from an
 * in-memory catalogue, record store and key-value map.
 */

import { http, HttpResponse } from 'msw';
import { setupServer, type SetupServer } from 'msw/node';

export const MOCK_DATABASE_URL = 'http://db-service.test:8000';

type Row = Record<string, unknown> & { id: string };

export interface RecordedRequest {
  method: string;
  path: string;
  body?: Record<string, unknown>;
}

export interface MockServiceState {
  databases: string[];
  tables: Record<string, string[]>;
  rows: Map<string, Row[]>;
  kv: Map<string, string>;
}

export interface MockDatabaseService {
  baseUrl: string;
  server: SetupServer;
  state: MockServiceState;
  requests: RecordedRequest[];
  /** Restore seed data, clear the request log and drop runtime handlers */
  reset(): void;
}

function seed(): MockServiceState {
  return {
    databases: ['appdb', 'analytics'],
    tables: { public: ['users', 'orders'], audit: ['events'] },
    rows: new Map<string, Row[]>([
      [
        'public.users',
        [
          { id: '1', name: 'Ada' },
          { id: '2', name: 'Grace' },
          { id: '3', name: 'Edsger' },
        ],
      ],
      ['public.orders', []],
      ['audit.events', []],
    ]),
    kv: new Map<string, string>([
      ['user:1', 'Ada'],
      ['user:2', 'Grace'],
      ['session:abc', 'active'],
    ]),
  };
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : {};
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`);
}

export function createMockDatabaseService(): MockDatabaseService {
  const requests: RecordedRequest[] = [];
  let state = seed();

  const url = (path: string): string => `${MOCK_DATABASE_URL}${path}`;

  async function readBody(request: Request, path: string): Promise<Record<string, unknown>> {
    const body = asRecord(await request.json());
    requests.push({ method: 'POST', path, body });
    return body;
  }

  function logGet(path: string): void {
    requests.push({ method: 'GET', path });
  }

  function table(body: Record<string, unknown>): Row[] | undefined {
    return state.rows.get(`${String(body.schema)}.${String(body.table)}`);
  }

  const notFound = (detail: string) => HttpResponse.json({ detail }, { status: 404 });

  const handlers = [
    http.get(url('/health'), () => {
      logGet('/health');
      return HttpResponse.json({ status: 'ok', database: 'connected' });
    }),

    http.get(url('/databases'), () => {
      logGet('/databases');
      return HttpResponse.json({ databases: state.databases });
    }),

    http.get(url('/schemas'), () => {
      logGet('/schemas');
      return HttpResponse.json({ schemas: Object.keys(state.tables) });
    }),

    http.get(url('/tables'), ({ request }) => {
      const schema = new URL(request.url).searchParams.get('schema');
      logGet(schema ? `/tables?schema=${schema}` : '/tables');
      const tables = schema
        ? state.tables[schema] ?? []
        : Object.entries(state.tables).flatMap(([name, list]) => list.map((t) => `${name}.${t}`));
      return HttpResponse.json({ tables });
    }),

    http.post(url('/query'), async ({ request }) => {
      const body = await readBody(request, '/query');
      const sql = String(body.sql ?? '');
      if (sql.includes('fail')) {
        return HttpResponse.json({ detail: 'syntax error at or near "fail"' }, { status: 400 });
      }
      const rows = state.rows.get('public.users') ?? [];
      return HttpResponse.json({ columns: ['id', 'name'], rows, row_count: rows.length });
    }),

    http.post(url('/write'), async ({ request }) => {
      await readBody(request, '/write');
      return HttpResponse.json({ affected_rows: 1 });
    }),

    http.post(url('/records'), async ({ request }) => {
      const body = await readBody(request, '/records');
      const rows = table(body);
      if (!rows) return notFound('Table not found');
      const offset = typeof body.offset === 'number' ? body.offset : 0;
      const limit = typeof body.limit === 'number' ? body.limit : 100;
      const records = rows.slice(offset, offset + limit);
      return HttpResponse.json({ records, count: records.length });
    }),

    http.post(url('/record'), async ({ request }) => {
      const body = await readBody(request, '/record');
      const record = table(body)?.find((row) => row.id === body.id);
      return record ? HttpResponse.json({ record }) : notFound('Record not found');
    }),

    http.post(url('/create'), async ({ request }) => {
      const body = await readBody(request, '/create');
      const rows = table(body);
      if (!rows) return notFound('Table not found');
      const record: Row = { ...asRecord(body.data), id: String(rows.length + 1) };
      rows.push(record);
      return HttpResponse.json({ record, created: true });
    }),

    http.post(url('/update'), async ({ request }) => {
      const body = await readBody(request, '/update');
      const rows = table(body);
      const index = rows?.findIndex((row) => row.id === body.id) ?? -1;
      if (!rows || index === -1) return notFound('Record not found');
      const record: Row = { ...rows[index], ...asRecord(body.data), id: rows[index].id };
      rows[index] = record;
      return HttpResponse.json({ record, updated: true });
    }),

    http.post(url('/delete'), async ({ request }) => {
      const body = await readBody(request, '/delete');
      const rows = table(body);
      const index = rows?.findIndex((row) => row.id === body.id) ?? -1;
      if (!rows || index === -1) return notFound('Record not found');
      rows.splice(index, 1);
      return HttpResponse.json({ deleted: true });
    }),

    http.get(url('/admin/health'), () => {
      logGet('/admin/health');
      return HttpResponse.json({
        status: 'healthy',
        version: '7.2.4',
        uptime: '3 days',
        connected_clients: 4,
        used_memory: '1.2M',
        total_keys: state.kv.size,
      });
    }),

    http.post(url('/redis/command'), async ({ request }) => {
      const body = await readBody(request, '/redis/command');
      const args = Array.isArray(body.args) ? body.args : [];
      const kv = state.kv;

      switch (body.command) {
        case 'KEYS': {
          const matcher = globToRegExp(String(args[0] ?? '*'));
          return HttpResponse.json({ result: [...kv.keys()].filter((key) => matcher.test(key)).sort() });
        }
        case 'GET':
          return HttpResponse.json({ result: kv.get(String(args[0])) ?? null });
        case 'SET':
          kv.set(String(args[0]), String(args[1]));
          return HttpResponse.json({ result: 'OK' });
        case 'DEL':
          return HttpResponse.json({ result: kv.delete(String(args[0])) ? 1 : 0 });
        case 'SCAN': {
          const matcher = globToRegExp(String(args[2] ?? '*'));
          return HttpResponse.json({ result: [0, [...kv.keys()].filter((key) => matcher.test(key)).sort()] });
        }
        default:
          return HttpResponse.json({ error: `Unknown command ${String(body.command)}` }, { status: 400 });
      }
    }),
  ];

  const server = setupServer(...handlers);
  return {
    baseUrl: MOCK_DATABASE_URL,
    server,
    get state() {
      return state;
    },
    requests,
    reset: () => {
      state = seed();
      requests.length = 0;
      server.resetHandlers();
    },
  };
}
