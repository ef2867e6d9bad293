/**
 * Newline framing over a socket
 *
 * Turns the socket's byte stream into a pull-based sequence of events so
 * the connection loop can await one line at a time. Each wait carries the
 * idle deadline; a deadline expiring is reported, not treated as failure.
 */

import type { Socket } from 'node:net';

export type LineEvent =
  | { type: 'line'; line: string }
  | { type: 'timeout' }
  /** A line exceeded the limit and was discarded up to its newline */
  | { type: 'overflow'; bytes: number }
  | { type: 'eof' }
  | { type: 'error'; error: Error };

export interface LineReaderOptions {
  maxLineBytes: number;
  idleTimeoutMs: number;
}

const NEWLINE = 0x0a;
/** Queued lines above which the socket is paused until the consumer catches up */
const HIGH_WATER_LINES = 64;

export class LineReader {
  private readonly queue: LineEvent[] = [];
  private partial: Buffer[] = [];
  private partialBytes = 0;
  /** Bytes dropped from the current oversized line, 0 when not discarding */
  private discarding = 0;
  private finished = false;
  private waiter: ((event: LineEvent) => void) | null = null;

  private readonly onData = (chunk: Buffer | string): void => this.ingest(
    typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk
  );
  private readonly onEnd = (): void => this.finish();
  private readonly onClose = (): void => this.finish();
  private readonly onError = (error: Error): void => {
    this.push({ type: 'error', error });
    this.finish();
  };

  constructor(
    private readonly socket: Socket,
    private readonly options: LineReaderOptions
  ) {
    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('close', this.onClose);
    socket.on('error', this.onError);
  }

  /**
   * Wait for the next event
   *
   * After `eof` or `error` every further call resolves to `eof`.
   */
  next(): Promise<LineEvent> {
    const queued = this.queue.shift();
    if (queued) {
      if (this.queue.length < HIGH_WATER_LINES && this.socket.isPaused() && !this.finished) {
        this.socket.resume();
      }
      return Promise.resolve(queued);
    }
    if (this.finished) {
      return Promise.resolve({ type: 'eof' });
    }

    return new Promise((resolve) => {
      const timer = this.options.idleTimeoutMs > 0
        ? setTimeout(() => {
            this.waiter = null;
            resolve({ type: 'timeout' });
          }, this.options.idleTimeoutMs)
        : undefined;

      this.waiter = (event) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(event);
      };
    });
  }

  /**
   * Detach from the socket; pending waits resolve to `eof`
   */
  close(): void {
    this.socket.off('data', this.onData);
    this.socket.off('end', this.onEnd);
    this.socket.off('close', this.onClose);
    this.socket.off('error', this.onError);
    this.finished = true;
    this.waiter?.({ type: 'eof' });
  }

  private ingest(chunk: Buffer): void {
    let start = 0;
    while (start < chunk.length) {
      const newline = chunk.indexOf(NEWLINE, start);
      const end = newline === -1 ? chunk.length : newline;
      this.append(chunk.subarray(start, end));
      if (newline === -1) {
        break;
      }
      this.completeLine();
      start = newline + 1;
    }

    if (this.queue.length >= HIGH_WATER_LINES) {
      this.socket.pause();
    }
  }

  private append(bytes: Buffer): void {
    if (bytes.length === 0) return;

    if (this.discarding > 0) {
      this.discarding += bytes.length;
      return;
    }

    if (this.partialBytes + bytes.length > this.options.maxLineBytes) {
      this.discarding = this.partialBytes + bytes.length;
      this.partial = [];
      this.partialBytes = 0;
      return;
    }

    this.partial.push(bytes);
    this.partialBytes += bytes.length;
  }

  private completeLine(): void {
    if (this.discarding > 0) {
      this.push({ type: 'overflow', bytes: this.discarding });
      this.discarding = 0;
      return;
    }

    const line = Buffer.concat(this.partial, this.partialBytes).toString('utf8').trim();
    this.partial = [];
    this.partialBytes = 0;
    if (line.length > 0) {
      this.push({ type: 'line', line });
    }
  }

  private finish(): void {
    if (this.finished) return;

    // A final line without a trailing newline still counts
    if (this.partialBytes > 0 || this.discarding > 0) {
      this.completeLine();
    }
    this.finished = true;
    this.push({ type: 'eof' });
  }

  private push(event: LineEvent): void {
    if (this.waiter) {
      this.waiter(event);
    } else {
      this.queue.push(event);
    }
  }
}
