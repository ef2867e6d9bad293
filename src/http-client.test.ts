import { describe, it, expect, beforeAll, afterEach, afterAll, vi } from 'vitest';
import { http, HttpResponse } from 'msw';
import { MCPError, NetworkError, RateLimitError } from './errors.js';
import {
  createRetryInterceptor,
  createTimeoutInterceptor,
  DatabaseServiceClient,
  DEFAULT_RETRY_STATUS,
  InterceptorChain,
  type RequestContext,
  type ResponseContext,
} from './http-client.js';
import { createMockDatabaseService, MOCK_DATABASE_URL } from './testing/mock-database-service.js';

const service = createMockDatabaseService();

function client(maxAttempts = 3): DatabaseServiceClient {
  return new DatabaseServiceClient({
    baseUrl: `${MOCK_DATABASE_URL}/`,
    timeoutMs: 1000,
    retry: { maxAttempts, baseDelayMs: 1, retryOnStatus: DEFAULT_RETRY_STATUS },
  });
}

async function caught(promise: Promise<unknown>): Promise<MCPError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof MCPError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the request to fail');
}

const ok: ResponseContext = { status: 200, headers: {}, body: { ok: true } };

function context(): RequestContext {
  return { method: 'GET', url: 'http://example.test/x', headers: {} };
}

describe('DatabaseServiceClient', () => {
  beforeAll(() => service.server.listen({ onUnhandledRequest: 'error' }));
  afterEach(() => service.reset());
  afterAll(() => service.server.close());

  it('should strip the trailing slash from the base url', () => {
    expect(client().url).toBe(MOCK_DATABASE_URL);
  });

  it('should encode query parameters and skip undefined ones', async () => {
    expect(await client().get('/tables', { schema: 'audit' })).toEqual({ tables: ['events'] });
    await client().get('/tables', { schema: undefined });

    expect(service.requests.map((request) => request.path)).toEqual(['/tables?schema=audit', '/tables']);
  });

  it('should post JSON bodies', async () => {
    await client().post('/write', { sql: 'DELETE FROM t' });

    expect(service.requests).toEqual([{ method: 'POST', path: '/write', body: { sql: 'DELETE FROM t' } }]);
  });

  it('should retry a retryable status and return the later success', async () => {
    let attempts = 0;
    service.server.use(
      http.get(`${MOCK_DATABASE_URL}/flaky`, () => {
        attempts++;
        return attempts === 1
          ? HttpResponse.json({ detail: 'warming up' }, { status: 503 })
          : HttpResponse.json({ ready: true });
      })
    );

    expect(await client().get('/flaky')).toEqual({ ready: true });
    expect(attempts).toBe(2);
  });

  it('should give up after the last attempt with the service message', async () => {
    let attempts = 0;
    service.server.use(
      http.get(`${MOCK_DATABASE_URL}/down`, () => {
        attempts++;
        return HttpResponse.json({ detail: 'maintenance' }, { status: 503 });
      })
    );

    const error = await caught(client().get('/down'));

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('maintenance');
    expect(error.details).toEqual({ statusCode: 503, url: `${MOCK_DATABASE_URL}/down` });
    expect(attempts).toBe(3);
  });

  it('should not retry client errors', async () => {
    const error = await caught(client().post('/record', { schema: 'public', table: 'users', id: '99' }));

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('Record not found');
    expect(error.details?.statusCode).toBe(404);
    expect(service.requests).toHaveLength(1);
  });

  it('should fall back to the status for bodies without a message', async () => {
    service.server.use(http.get(`${MOCK_DATABASE_URL}/empty`, () => new HttpResponse(null, { status: 500 })));

    expect((await caught(client().get('/empty'))).message).toBe('HTTP 500');
  });

  it('should map 429 to a rate limit error', async () => {
    service.server.use(
      http.get(`${MOCK_DATABASE_URL}/busy`, () =>
        HttpResponse.json({ error: 'slow down' }, { status: 429, headers: { 'Retry-After': '7' } })
      )
    );

    const error = await caught(client().get('/busy'));

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.message).toBe('slow down');
    expect(error.details).toEqual({ retryAfter: 7 });
  });

  it('should wrap transport failures', async () => {
    service.server.use(http.get(`${MOCK_DATABASE_URL}/gone`, () => HttpResponse.error()));

    const error = await caught(client(1).get('/gone'));

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message.startsWith('Database service unreachable: ')).toBe(true);
  });
});

describe('InterceptorChain', () => {
  it('should run interceptors in order around the final handler', async () => {
    const calls: string[] = [];
    const chain = new InterceptorChain([
      async (_ctx, next) => {
        calls.push('outer:before');
        const response = await next();
        calls.push('outer:after');
        return response;
      },
      async (_ctx, next) => {
        calls.push('inner');
        return next();
      },
    ]);

    const response = await chain.execute(context(), async () => {
      calls.push('final');
      return ok;
    });

    expect(response).toBe(ok);
    expect(calls).toEqual(['outer:before', 'inner', 'final', 'outer:after']);
  });
});

describe('createRetryInterceptor', () => {
  const options = { maxAttempts: 3, baseDelayMs: 1, retryOnStatus: DEFAULT_RETRY_STATUS };

  it('should retry thrown errors', async () => {
    const next = vi
      .fn<() => Promise<ResponseContext>>()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce(ok);

    expect(await createRetryInterceptor(options)(context(), next)).toBe(ok);
    expect(next).toHaveBeenCalledTimes(2);
  });

  it('should rethrow the last error once attempts run out', async () => {
    const next = vi.fn<() => Promise<ResponseContext>>().mockRejectedValue(new Error('socket hang up'));

    await expect(createRetryInterceptor(options)(context(), next)).rejects.toThrow('socket hang up');
    expect(next).toHaveBeenCalledTimes(3);
  });

  it('should return the last retryable response', async () => {
    const unavailable: ResponseContext = { status: 503, headers: {}, body: null };
    const next = vi.fn<() => Promise<ResponseContext>>().mockResolvedValue(unavailable);

    expect(await createRetryInterceptor(options)(context(), next)).toBe(unavailable);
    expect(next).toHaveBeenCalledTimes(3);
  });
});

describe('createTimeoutInterceptor', () => {
  it('should abort a slow request', async () => {
    const ctx = context();
    const next = (): Promise<ResponseContext> =>
      new Promise((_resolve, reject) => {
        ctx.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const error = await caught(createTimeoutInterceptor(20)(ctx, next));

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe('Request to http://example.test/x timed out after 20ms');
    expect(ctx.signal?.aborted).toBe(true);
  });

  it('should pass a fast response through', async () => {
    expect(await createTimeoutInterceptor(1000)(context(), async () => ok)).toBe(ok);
  });
});
