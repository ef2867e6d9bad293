/**
 * Shared-secret token verification
 */

import { Buffer } from 'node:buffer';
import { timingSafeEqual } from 'node:crypto';

export interface AuthenticatorOptions {
  enabled: boolean;
  token?: string;
}

function padBuffer(buffer: Buffer, length: number): Buffer {
  if (buffer.length === length) return buffer;
  const padded = Buffer.alloc(length);
  buffer.copy(padded);
  return padded;
}

/**
 * Constant-time string equality
 *
 * Inputs of different lengths are padded to a common length first so the
 * comparison never exits early on a length mismatch.
 */
export function timingSafeEqualUtf8(a: string, b: string): boolean {
  const aBuffer = Buffer.from(a, 'utf8');
  const bBuffer = Buffer.from(b, 'utf8');
  const maxLength = Math.max(aBuffer.length, bBuffer.length, 1);

  const equal = timingSafeEqual(padBuffer(aBuffer, maxLength), padBuffer(bBuffer, maxLength));
  return equal && aBuffer.length === bBuffer.length;
}

export class Authenticator {
  private readonly secret: string | null;

  constructor(options: AuthenticatorOptions) {
    this.secret = options.enabled && options.token ? options.token : null;
  }

  /**
   * False when auth is switched off or no secret is configured
   */
  get enabled(): boolean {
    return this.secret !== null;
  }

  verifyToken(token: string | undefined): boolean {
    if (this.secret === null) {
      return true;
    }
    if (token === undefined) {
      return false;
    }
    return timingSafeEqualUtf8(token, this.secret);
  }
}
