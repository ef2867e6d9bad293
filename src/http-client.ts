/**
 * HTTP client for the downstream database service
 *
 * Requests run through an interceptor chain (timeout, retry) before the
 * final fetch; each interceptor only sees the request context and the
 * `next` continuation, so they compose in any order.
 */

import { HTTP_STATUS } from './constants.js';
import { NetworkError, RateLimitError, toError } from './errors.js';
import type { Logger } from './logger.js';

export interface RequestContext {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: unknown;
  /** Set by the timeout interceptor for the final fetch */
  signal?: AbortSignal;
}

export interface ResponseContext {
  status: number;
  headers: Record<string, string>;
  body: unknown;
}

export type InterceptorFn = (
  ctx: RequestContext,
  next: () => Promise<ResponseContext>
) => Promise<ResponseContext>;

export interface RetryOptions {
  /** Total tries including the first */
  maxAttempts: number;
  /** First backoff; doubles on every retry */
  baseDelayMs: number;
  retryOnStatus: readonly number[];
}

export interface DatabaseServiceClientOptions {
  baseUrl: string;
  timeoutMs: number;
  retry: RetryOptions;
  logger?: Logger;
}

export const DEFAULT_RETRY_STATUS: readonly number[] = [
  HTTP_STATUS.BAD_GATEWAY,
  HTTP_STATUS.SERVICE_UNAVAILABLE,
  HTTP_STATUS.GATEWAY_TIMEOUT,
];

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class InterceptorChain {
  private readonly interceptors: InterceptorFn[];

  constructor(interceptors: InterceptorFn[] = []) {
    this.interceptors = [...interceptors];
  }

  async execute(ctx: RequestContext, finalHandler: () => Promise<ResponseContext>): Promise<ResponseContext> {
    let index = 0;

    const next = async (): Promise<ResponseContext> => {
      if (index >= this.interceptors.length) {
        return finalHandler();
      }
      const interceptor = this.interceptors[index++];
      return interceptor(ctx, next);
    };

    return next();
  }
}

/**
 * Retry with exponential backoff on transport failures and retryable statuses
 *
 * The last response is returned as-is once attempts run out, so the caller
 * still maps it to an error.
 */
export function createRetryInterceptor(options: RetryOptions, logger?: Logger): InterceptorFn {
  return async (ctx, next) => {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt < options.maxAttempts; attempt++) {
      const isLast = attempt === options.maxAttempts - 1;
      const delayMs = options.baseDelayMs * 2 ** attempt;

      try {
        const response = await next();
        if (!options.retryOnStatus.includes(response.status) || isLast) {
          return response;
        }
        logger?.debug('Retrying after status', { url: ctx.url, status: response.status, attempt: attempt + 1, delayMs });
      } catch (error) {
        lastError = toError(error);
        if (isLast) {
          break;
        }
        logger?.debug('Retrying after error', { url: ctx.url, error: lastError.message, attempt: attempt + 1, delayMs });
      }
      await sleep(delayMs);
    }

    throw lastError ?? new NetworkError('All retry attempts failed');
  };
}

/**
 * Abort each attempt that runs longer than `timeoutMs`
 */
export function createTimeoutInterceptor(timeoutMs: number): InterceptorFn {
  return async (ctx, next) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    ctx.signal = controller.signal;
    try {
      return await next();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new NetworkError(`Request to ${ctx.url} timed out after ${timeoutMs}ms`, undefined, { timeoutMs });
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };
}

function errorMessage(status: number, body: unknown): string {
  if (typeof body === 'object' && body !== null && !Array.isArray(body)) {
    for (const key of ['detail', 'error', 'message']) {
      const value: unknown = Reflect.get(body, key);
      if (typeof value === 'string' && value.length > 0) {
        return value;
      }
    }
  } else if (typeof body === 'string' && body.length > 0) {
    return body;
  }
  return `HTTP ${status}`;
}

export class DatabaseServiceClient {
  private readonly baseUrl: string;
  private readonly chain: InterceptorChain;

  constructor(options: DatabaseServiceClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    // Retry wraps timeout so every attempt gets its own deadline
    this.chain = new InterceptorChain([
      createRetryInterceptor(options.retry, options.logger),
      createTimeoutInterceptor(options.timeoutMs),
    ]);
  }

  get url(): string {
    return this.baseUrl;
  }

  get(path: string, params?: Record<string, string | undefined>): Promise<unknown> {
    let url = this.baseUrl + path;
    const entries = Object.entries(params ?? {}).filter(
      (entry): entry is [string, string] => entry[1] !== undefined
    );
    if (entries.length > 0) {
      url += '?' + new URLSearchParams(entries).toString();
    }
    return this.request({ method: 'GET', url, headers: { Accept: 'application/json' } });
  }

  post(path: string, body: unknown): Promise<unknown> {
    return this.request({
      method: 'POST',
      url: this.baseUrl + path,
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      body,
    });
  }

  /**
   * @throws {NetworkError} on transport failures, timeouts and non-2xx statuses
   * @throws {RateLimitError} on 429
   */
  private async request(ctx: RequestContext): Promise<unknown> {
    const response = await this.chain.execute(ctx, () => this.send(ctx));

    if (response.status < HTTP_STATUS.OK || response.status >= HTTP_STATUS.MULTIPLE_CHOICES) {
      const message = errorMessage(response.status, response.body);
      if (response.status === HTTP_STATUS.TOO_MANY_REQUESTS) {
        const retryAfter = response.headers['retry-after'];
        throw new RateLimitError(message, retryAfter ? Number.parseInt(retryAfter, 10) : undefined);
      }
      throw new NetworkError(message, response.status, { url: ctx.url });
    }

    return response.body;
  }

  private async send(ctx: RequestContext): Promise<ResponseContext> {
    let response: Response;
    try {
      response = await fetch(ctx.url, {
        method: ctx.method,
        headers: ctx.headers,
        body: ctx.method === 'POST' ? JSON.stringify(ctx.body ?? {}) : undefined,
        signal: ctx.signal,
      });
    } catch (error) {
      // The timeout interceptor turns aborts into its own error
      if (ctx.signal?.aborted) {
        throw error;
      }
      throw new NetworkError(`Database service unreachable: ${toError(error).message}`, undefined, { url: ctx.url });
    }

    const body: unknown = response.headers.get('content-type')?.includes('application/json')
      ? await response.json()
      : await response.text();

    return {
      status: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body,
    };
  }
}
