/**
 * Security facade used by connection handlers
 *
 * Composes the IP filter, rate limiter and authenticator behind the
 * admission checks a connection passes through, in the order they apply.
 */

import { Authenticator } from './authenticator.js';
import { IPFilter, type BanPolicy } from './ip-filter.js';
import { RateLimiter } from './rate-limiter.js';
import type { Logger } from './logger.js';

export type AdmissionRejection = 'not-allowed' | 'blocked' | 'connection-limit';

export type AdmissionResult =
  | { allowed: true }
  | { allowed: false; reason: AdmissionRejection };

/**
 * Outcome of presenting a token
 *
 * `locked-out` means this failure pushed the address over the ban threshold.
 */
export type TokenCheckResult = 'accepted' | 'rejected' | 'locked-out';

export interface SecurityManagerOptions {
  ipFilter: IPFilter;
  authenticator: Authenticator;
  /** Omitted when rate limiting is switched off */
  rateLimiter?: RateLimiter;
  maxConnections: number;
  logger?: Logger;
}

export interface SecuritySettings {
  authEnabled: boolean;
  authToken?: string;
  allowedIps: readonly string[];
  blockedIps: readonly string[];
  banPolicy: BanPolicy;
  rateLimit: { enabled: boolean; maxRequests: number; windowSeconds: number };
  maxConnections: number;
}

export interface SweepResult {
  rateLimitKeysPruned: number;
  bansLifted: number;
}

export class SecurityManager {
  readonly ipFilter: IPFilter;
  readonly authenticator: Authenticator;
  private readonly rateLimiter?: RateLimiter;
  private readonly maxConnections: number;
  private readonly logger?: Logger;

  constructor(options: SecurityManagerOptions) {
    this.ipFilter = options.ipFilter;
    this.authenticator = options.authenticator;
    this.rateLimiter = options.rateLimiter;
    this.maxConnections = options.maxConnections;
    this.logger = options.logger;
  }

  static fromSettings(settings: SecuritySettings, logger?: Logger): SecurityManager {
    return new SecurityManager({
      ipFilter: new IPFilter({
        allowedIps: settings.allowedIps,
        blockedIps: settings.blockedIps,
        banPolicy: settings.banPolicy,
        logger,
      }),
      authenticator: new Authenticator({ enabled: settings.authEnabled, token: settings.authToken }),
      rateLimiter: settings.rateLimit.enabled
        ? new RateLimiter({
            maxRequests: settings.rateLimit.maxRequests,
            windowSeconds: settings.rateLimit.windowSeconds,
          })
        : undefined,
      maxConnections: settings.maxConnections,
      logger,
    });
  }

  get authRequired(): boolean {
    return this.authenticator.enabled;
  }

  /**
   * Admission gates for a new connection: allow-list, then block list and
   * lockout, then the connection limit
   */
  checkConnection(ip: string, activeConnections: number): AdmissionResult {
    if (!this.ipFilter.matchesAllowList(ip)) {
      return { allowed: false, reason: 'not-allowed' };
    }
    if (this.ipFilter.isBlocked(ip)) {
      return { allowed: false, reason: 'blocked' };
    }
    if (activeConnections >= this.maxConnections) {
      return { allowed: false, reason: 'connection-limit' };
    }
    return { allowed: true };
  }

  checkRateLimit(ip: string): boolean {
    return this.rateLimiter?.isAllowed(ip) ?? true;
  }

  getRemainingRequests(ip: string): number | undefined {
    return this.rateLimiter?.getRemainingRequests(ip);
  }

  /**
   * Verify a presented token; failures count towards the lockout
   */
  checkToken(ip: string, token: string | undefined): TokenCheckResult {
    if (this.authenticator.verifyToken(token)) {
      this.ipFilter.clearFailedAttempts(ip);
      return 'accepted';
    }

    const lockedOut = this.ipFilter.recordFailedAttempt(ip);
    this.logger?.warn('Authentication failed', {
      ip,
      tokenPresented: token !== undefined,
      failedAttempts: this.ipFilter.getFailedAttempts(ip),
      lockedOut,
    });
    return lockedOut ? 'locked-out' : 'rejected';
  }

  sweep(): SweepResult {
    return {
      rateLimitKeysPruned: this.rateLimiter?.prune() ?? 0,
      bansLifted: this.ipFilter.prune(),
    };
  }
}
