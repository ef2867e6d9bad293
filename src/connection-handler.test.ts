/**
 * Socket-level tests for the per-connection protocol loop
 */

import { describe, it, expect, afterEach } from 'vitest';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import { LineClient } from './testing/line-client.js';
import { startTestServer, waitFor, type HarnessOptions, type TestServer } from './testing/server-harness.js';
import { INVALID_TOOL_METRIC, UNKNOWN_TOOL_METRIC } from './connection-handler.js';

describe('ConnectionHandler', () => {
  let harness: TestServer | undefined;
  const clients: LineClient[] = [];

  async function connect(options: HarnessOptions = {}): Promise<LineClient> {
    harness ??= await startTestServer(options);
    const client = await LineClient.connect(harness.port);
    clients.push(client);
    return client;
  }

  function server(): TestServer {
    if (!harness) throw new Error('server not started');
    return harness;
  }

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
    await harness?.stop();
    harness = undefined;
  });

  describe('end-to-end', () => {
    it('should initialize, list tools and call a tool', async () => {
      const client = await connect();

      const init = await client.request({ jsonrpc: '2.0', id: 1, method: 'initialize', params: {} });
      expect(init).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: {
          protocolVersion: LATEST_PROTOCOL_VERSION,
          capabilities: { tools: {} },
          serverInfo: { name: 'test-server', version: '9.9.9' },
        },
      });

      const list = await client.request({ jsonrpc: '2.0', id: 2, method: 'tools/list', params: {} });
      expect(list).toMatchObject({
        id: 2,
        result: { tools: expect.arrayContaining([expect.objectContaining({ name: 'echo' })]) },
      });

      const call = await client.request({
        jsonrpc: '2.0',
        id: 3,
        method: 'tools/call',
        params: { name: 'echo', arguments: { message: 'hi' } },
      });
      expect(call).toEqual({
        jsonrpc: '2.0',
        id: 3,
        result: { content: [{ type: 'text', text: 'Echo: hi' }] },
      });
      expect(server().metrics.getToolMetrics('echo')).toMatchObject({ count: 1, errors: 0 });
    });

    it('should echo a supported protocol version and record the client', async () => {
      const client = await connect();

      const init = await client.request({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '2024-11-05', clientInfo: { name: 'probe', version: '1.2.0' } },
      });
      const who = await client.request({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'whoami' } });

      expect(init).toMatchObject({ result: { protocolVersion: '2024-11-05' } });
      expect(who).toMatchObject({ result: { content: [{ type: 'text' }] } });
      const [session] = server().sessions.listSessions();
      expect(session).toMatchObject({ userAgent: 'probe/1.2.0', initialized: true, requestCount: 2 });
    });

    it('should fall back to the latest version for unknown ones', async () => {
      const client = await connect();

      const init = await client.request({
        jsonrpc: '2.0',
        id: 1,
        method: 'initialize',
        params: { protocolVersion: '1999-01-01' },
      });

      expect(init).toMatchObject({ result: { protocolVersion: LATEST_PROTOCOL_VERSION } });
    });

    it('should answer protocol completeness stubs', async () => {
      const client = await connect();

      expect(await client.request({ jsonrpc: '2.0', id: 1, method: 'resources/list' })).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: { resources: [] },
      });
      expect(await client.request({ jsonrpc: '2.0', id: 2, method: 'prompts/list' })).toEqual({
        jsonrpc: '2.0',
        id: 2,
        result: { prompts: [] },
      });
      expect(await client.request({ jsonrpc: '2.0', id: 3, method: 'ping' })).toEqual({
        jsonrpc: '2.0',
        id: 3,
        result: {},
      });
    });

    it('should answer pipelined requests in arrival order', async () => {
      const client = await connect();

      client.sendRaw(
        '{"jsonrpc":"2.0","id":1,"method":"ping"}\n' +
          '{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"echo","arguments":{"message":"x"}}}\n' +
          '{"jsonrpc":"2.0","id":3,"method":"ping"}\n'
      );

      const ids = [];
      for (let i = 0; i < 3; i++) {
        const message = await client.next();
        ids.push(typeof message === 'object' && message !== null && 'id' in message ? message.id : undefined);
      }
      expect(ids).toEqual([1, 2, 3]);
    });
  });

  describe('notifications', () => {
    it('should never answer a request without id', async () => {
      const client = await connect();

      client.send({ jsonrpc: '2.0', method: 'notifications/initialized' });
      client.send({ jsonrpc: '2.0', method: 'no/such/method' });
      client.send({ jsonrpc: '2.0', method: 'tools/call', params: { name: 'explode' } });
      client.send({ jsonrpc: '2.0', method: 'tools/call', params: { name: 'missing_tool' } });
      client.send({ method: 7 });

      const ping = await client.request({ jsonrpc: '2.0', id: 9, method: 'ping' });
      expect(ping).toEqual({ jsonrpc: '2.0', id: 9, result: {} });
      expect(await client.drain()).toEqual([]);
    });
  });

  describe('malformed input', () => {
    it('should answer a parse error and keep the connection open', async () => {
      const client = await connect();

      client.sendRaw('{"jsonrpc": "2.0", "id": \n');
      expect(await client.next()).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32700, message: 'Parse error' },
      });

      expect(await client.request({ jsonrpc: '2.0', id: 2, method: 'ping' })).toMatchObject({ id: 2, result: {} });
    });

    it('should reject batches and invalid envelopes', async () => {
      const client = await connect();

      client.sendRaw('[{"jsonrpc":"2.0","id":1,"method":"ping"}]\n');
      expect(await client.next()).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32600, message: 'Invalid Request: Batch requests are not supported' },
      });

      expect(await client.request({ id: 4, method: 7 })).toEqual({
        jsonrpc: '2.0',
        id: 4,
        error: { code: -32600, message: 'Invalid Request: method must be a non-empty string' },
      });
    });

    it('should discard oversized lines', async () => {
      const client = await connect({ maxLineBytes: 64 });

      client.sendRaw('x'.repeat(100) + '\n');
      expect(await client.next()).toEqual({
        jsonrpc: '2.0',
        id: null,
        error: { code: -32600, message: 'Invalid Request: line exceeds 64 bytes' },
      });

      expect(await client.request({ id: 2, method: 'ping' })).toMatchObject({ id: 2, result: {} });
    });

    it('should report unknown methods', async () => {
      const client = await connect();

      expect(await client.request({ jsonrpc: '2.0', id: 5, method: 'foo/bar' })).toEqual({
        jsonrpc: '2.0',
        id: 5,
        error: { code: -32601, message: 'Method not found: foo/bar' },
      });
    });
  });

  describe('tool failures', () => {
    it('should answer unknown tools with an error result and count the failure', async () => {
      const client = await connect();

      const response = await client.request({
        jsonrpc: '2.0',
        id: 1,
        method: 'tools/call',
        params: { name: 'nope', arguments: {} },
      });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: { content: [{ type: 'text', text: 'Unknown tool: nope' }], isError: true },
      });
      expect(server().metrics.getToolMetrics('nope')).toBeUndefined();
      expect(server().metrics.getToolMetrics(UNKNOWN_TOOL_METRIC)).toMatchObject({ count: 1, errors: 1 });
    });

    it('should record every unknown name under one metrics key', async () => {
      const client = await connect();

      for (let i = 0; i < 20; i++) {
        await client.request({ id: i, method: 'tools/call', params: { name: `nope-${i}`, arguments: {} } });
      }
      await client.request({ id: 99, method: 'tools/call', params: { name: 'nope-x', arguments: 'hi' } });

      const metrics = server().metrics;
      expect(metrics.getToolMetrics(UNKNOWN_TOOL_METRIC)).toMatchObject({ count: 21, errors: 21 });
      expect(metrics.getToolMetrics('nope-0')).toBeUndefined();
      expect(metrics.getToolMetrics('nope-x')).toBeUndefined();
      expect(await metrics.getPrometheusMetrics()).not.toContain('tool="nope-');
    });

    it('should not leave abort listeners behind after each request', async () => {
      const client = await connect();

      for (let i = 0; i < 10; i++) {
        await client.request({ id: i, method: 'ping' });
      }

      const [handler] = server().server.connections;
      expect(handler.pendingAbortListeners).toBe(0);
    });

    it('should contain handler exceptions', async () => {
      const client = await connect();

      const response = await client.request({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'explode' } });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: { content: [{ type: 'text', text: 'Internal error: kaboom' }], isError: true },
      });
      expect(await client.request({ jsonrpc: '2.0', id: 2, method: 'ping' })).toMatchObject({ result: {} });
    });

    it('should count handler-reported errors as failures', async () => {
      const client = await connect();

      await client.request({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'report_error' } });

      expect(server().metrics.getToolMetrics('report_error')).toMatchObject({ count: 1, errors: 1 });
    });

    it('should time out slow tools', async () => {
      const client = await connect({ toolTimeoutMs: 50 });

      const response = await client.request({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: { name: 'stall' } });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        result: { content: [{ type: 'text', text: "Tool 'stall' timed out after 50ms" }], isError: true },
      });
      expect(server().metrics.getToolMetrics('stall')).toMatchObject({ count: 1, errors: 1 });
    });

    it('should reject calls without a tool name', async () => {
      const client = await connect();

      const response = await client.request({ jsonrpc: '2.0', id: 1, method: 'tools/call', params: {} });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        error: { code: -32602, message: 'Invalid params: params.name must be a non-empty string' },
      });
      expect(server().metrics.getToolMetrics(INVALID_TOOL_METRIC)).toMatchObject({ count: 1, errors: 1 });
    });

    it('should reject non-object arguments', async () => {
      const client = await connect();

      const response = await client.request({
        jsonrpc: '2.0',
        id: 1,
        method: 'tools/call',
        params: { name: 'echo', arguments: 'hi' },
      });

      expect(response).toEqual({
        jsonrpc: '2.0',
        id: 1,
        error: { code: -32602, message: 'Invalid params: params.arguments must be an object' },
      });
    });
  });

  describe('rate limiting', () => {
    it('should refuse requests over the limit without closing', async () => {
      const client = await connect({ rateLimit: { maxRequests: 2, windowSeconds: 60 } });

      expect(await client.request({ id: 1, method: 'ping' })).toMatchObject({ result: {} });
      expect(await client.request({ id: 2, method: 'ping' })).toMatchObject({ result: {} });
      expect(await client.request({ id: 3, method: 'ping' })).toEqual({
        jsonrpc: '2.0',
        id: 3,
        error: { code: -32000, message: 'Rate limit exceeded' },
      });

      client.send({ method: 'ping' });
      expect(await client.drain()).toEqual([]);
      expect(client.isClosed).toBe(false);
    });
  });

  describe('authentication', () => {
    const token = 'test-secret';

    it('should require a token before serving tools', async () => {
      const client = await connect({ authToken: token });

      expect(await client.request({ id: 1, method: 'tools/list' })).toEqual({
        jsonrpc: '2.0',
        id: 1,
        error: { code: -32001, message: 'Authentication required' },
      });
      expect(await client.request({ id: 2, method: 'ping' })).toMatchObject({ result: {} });
    });

    it('should authenticate through initialize params', async () => {
      const client = await connect({ authToken: token });

      const failed = await client.request({ id: 1, method: 'initialize', params: { auth_token: 'wrong' } });
      expect(failed).toEqual({
        jsonrpc: '2.0',
        id: 1,
        error: { code: -32001, message: 'Authentication failed' },
      });

      const init = await client.request({ id: 2, method: 'initialize', params: { authToken: token } });
      expect(init).toMatchObject({ id: 2, result: { serverInfo: { name: 'test-server' } } });

      expect(await client.request({ id: 3, method: 'tools/list' })).toMatchObject({ result: { tools: expect.any(Array) } });
      expect(server().sessions.listSessions()[0].authenticated).toBe(true);
    });

    it('should not count an initialize without a token as a failed attempt', async () => {
      const client = await connect({ authToken: token, banThreshold: 2 });

      for (let i = 1; i <= 3; i++) {
        expect(await client.request({ id: i, method: 'initialize', params: {} })).toEqual({
          jsonrpc: '2.0',
          id: i,
          error: { code: -32001, message: 'Authentication required' },
        });
      }

      expect(server().security.ipFilter.getFailedAttempts('127.0.0.1')).toBe(0);
      expect(server().security.ipFilter.isBlocked('127.0.0.1')).toBe(false);
      expect(client.isClosed).toBe(false);
    });

    it('should accept a top-level token on any request', async () => {
      const client = await connect({ authToken: token });

      const list = await client.request({ id: 1, method: 'tools/list', auth_token: token });

      expect(list).toMatchObject({ id: 1, result: { tools: expect.any(Array) } });
    });

    it('should lock the address out and close the connection at the threshold', async () => {
      const client = await connect({ authToken: token, banThreshold: 2 });

      await client.request({ id: 1, method: 'initialize', params: { auth_token: 'wrong' } });
      const second = await client.request({ id: 2, method: 'initialize', params: { auth_token: 'wrong' } });

      expect(second).toMatchObject({ error: { code: -32001 } });
      await client.waitForClose();
      expect(server().security.ipFilter.isBlocked('127.0.0.1')).toBe(true);

      const retry = await LineClient.connect(server().port);
      clients.push(retry);
      await retry.waitForClose();
    });
  });

  describe('idle connections', () => {
    it('should keep serving across idle timeouts', async () => {
      const client = await connect({ idleTimeoutMs: 30 });
      await client.request({ id: 1, method: 'ping' });

      await new Promise((resolve) => setTimeout(resolve, 150));

      expect(client.isClosed).toBe(false);
      expect(await client.request({ id: 2, method: 'ping' })).toEqual({ jsonrpc: '2.0', id: 2, result: {} });
      expect(server().sessions.size).toBe(1);
    });

    it('should tear the connection down once the client half-closes', async () => {
      const client = await connect({ idleTimeoutMs: 30 });
      await client.request({ id: 1, method: 'ping' });

      client.halfClose();

      await client.waitForClose();
      await waitFor(() => server().sessions.size === 0);
      expect(server().metrics.getActiveConnections()).toBe(0);
    });
  });

  describe('admission and cleanup', () => {
    it('should refuse addresses outside the allow-list without a session', async () => {
      const client = await connect({ allowedIps: ['10.0.0.0/8'] });

      await client.waitForClose();

      expect(server().sessions.size).toBe(0);
      expect(await server().metrics.getPrometheusMetrics()).toContain(
        'test_connections_rejected_total{reason="not-allowed"} 1'
      );
    });

    it('should refuse connections over the limit', async () => {
      const first = await connect({ maxConnections: 1 });
      await first.request({ id: 1, method: 'ping' });

      const second = await connect();
      await second.waitForClose();

      expect(await first.request({ id: 2, method: 'ping' })).toMatchObject({ result: {} });
    });

    it('should remove the session and connection count on disconnect', async () => {
      const client = await connect();
      await client.request({ id: 1, method: 'ping' });
      expect(server().sessions.size).toBe(1);
      expect(server().metrics.getActiveConnections()).toBe(1);

      await client.close();

      await waitFor(() => server().sessions.size === 0);
      expect(server().metrics.getActiveConnections()).toBe(0);
    });
  });
});
