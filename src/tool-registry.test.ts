import { describe, it, expect, vi } from 'vitest';
import { ToolRegistry, textResult } from './tool-registry.js';
import { ConfigurationError } from './errors.js';
import type { ClientSession } from './types/session.js';
import type { ToolDefinition, ToolHandler, ToolProvider } from './types/tools.js';

function definition(name: string): ToolDefinition {
  return {
    name,
    description: `${name} tool`,
    inputSchema: { type: 'object', properties: {}, required: [] },
  };
}

function provider(name: string, handlers: Record<string, ToolHandler>): ToolProvider {
  return {
    name,
    getToolDefinitions: () => Object.keys(handlers).map(definition),
    getHandler: (tool) => handlers[tool],
  };
}

const session: ClientSession = {
  clientId: 'client-1',
  ipAddress: '127.0.0.1',
  connectedAt: new Date(0),
  lastActivity: new Date(0),
  requestCount: 0,
  authenticated: true,
  initialized: true,
};

describe('ToolRegistry', () => {
  it('should merge tools from several providers in registration order', () => {
    const registry = new ToolRegistry();
    registry.register(provider('a', { one: async () => textResult('1') }));
    registry.register(provider('b', { two: async () => textResult('2') }));

    expect(registry.listTools().map((tool) => tool.name)).toEqual(['one', 'two']);
    expect(registry.has('two')).toBe(true);
    expect(registry.size).toBe(2);
  });

  it('should reject duplicate names', () => {
    const registry = new ToolRegistry();
    registry.register(provider('a', { echo: async () => textResult('a') }));

    expect(() => registry.register(provider('b', { echo: async () => textResult('b') }))).toThrow(
      ConfigurationError
    );
  });

  it('should reject a definition without a handler', () => {
    const registry = new ToolRegistry();
    const broken: ToolProvider = {
      name: 'broken',
      getToolDefinitions: () => [definition('ghost')],
      getHandler: () => undefined,
    };

    expect(() => registry.register(broken)).toThrow("Provider 'broken' has no handler for tool 'ghost'");
  });

  it('should pass arguments and session to the handler', async () => {
    const handler = vi.fn<ToolHandler>(async (args) => textResult(`hi ${String(args.message)}`));
    const registry = new ToolRegistry();
    registry.registerTool(definition('echo'), handler);

    const outcome = await registry.callTool('echo', { message: 'there' }, session);

    expect(outcome).toEqual({ result: { content: [{ type: 'text', text: 'hi there' }] }, status: 'ok' });
    expect(handler).toHaveBeenCalledWith({ message: 'there' }, session);
  });

  it('should answer unknown tools with an error result', async () => {
    const registry = new ToolRegistry();

    const outcome = await registry.callTool('nope', {}, session);

    expect(outcome).toEqual({
      result: { content: [{ type: 'text', text: 'Unknown tool: nope' }], isError: true },
      status: 'unknown-tool',
    });
  });

  it('should keep error results reported by the handler', async () => {
    const registry = new ToolRegistry();
    registry.registerTool(definition('fails'), async () => textResult('bad input', true));

    const outcome = await registry.callTool('fails', {}, session);

    expect(outcome.status).toBe('tool-error');
    expect(outcome.result.isError).toBe(true);
  });

  it('should convert thrown errors into error results', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const registry = new ToolRegistry({ logger });
    registry.registerTool(definition('boom'), async () => {
      throw new Error('disk on fire');
    });

    const outcome = await registry.callTool('boom', {}, session);

    expect(outcome).toEqual({
      result: { content: [{ type: 'text', text: 'Internal error: disk on fire' }], isError: true },
      status: 'exception',
    });
    expect(logger.error).toHaveBeenCalledOnce();
  });

  it('should convert synchronous throws too', async () => {
    const registry = new ToolRegistry();
    const sync: ToolHandler = () => {
      throw new Error('sync failure');
    };
    registry.registerTool(definition('sync'), sync);

    const outcome = await registry.callTool('sync', {}, session);

    expect(outcome.result.content[0].text).toBe('Internal error: sync failure');
  });

  it('should time out slow handlers', async () => {
    vi.useFakeTimers();
    try {
      const registry = new ToolRegistry({ timeoutMs: 50 });
      registry.registerTool(definition('slow'), () => new Promise(() => {}));

      const pending = registry.callTool('slow', {}, session);
      await vi.advanceTimersByTimeAsync(50);

      expect(await pending).toEqual({
        result: { content: [{ type: 'text', text: "Tool 'slow' timed out after 50ms" }], isError: true },
        status: 'timeout',
      });
    } finally {
      vi.useRealTimers();
    }
  });
});
