/**
 * IP admission filter
 *
 * Combines an optional allow-list (exact addresses or CIDR ranges, IPv4 and
 * IPv6) with a failed-attempt lockout. Bans follow a BanPolicy: a `null`
 * duration keeps the address banned until the process restarts.
 */

import { BlockList, isIP } from 'node:net';
import type { Logger } from './logger.js';

type IpFamily = 'ipv4' | 'ipv6';

export interface NormalizedIp {
  ip: string;
  family: IpFamily;
}

export interface BanPolicy {
  /** Failed attempts that trigger a ban */
  threshold: number;
  /** Ban length in milliseconds; null bans for the process lifetime */
  durationMs: number | null;
}

export const PERMANENT_BAN_POLICY: BanPolicy = { threshold: 5, durationMs: null };

export interface IPFilterOptions {
  allowedIps?: readonly string[];
  blockedIps?: readonly string[];
  banPolicy?: BanPolicy;
  logger?: Logger;
  now?: () => number;
}

const MAPPED_IPV4_PREFIX = '::ffff:';

/**
 * Normalize a peer address for matching
 *
 * IPv4-mapped IPv6 peers (`::ffff:10.0.0.1`) are reported as IPv4 so that
 * IPv4 allow-list entries apply to dual-stack listeners.
 */
export function normalizeIp(input: string): NormalizedIp | null {
  const trimmed = input.trim().toLowerCase();
  if (!trimmed) return null;

  const ipType = isIP(trimmed);
  if (ipType === 4) return { ip: trimmed, family: 'ipv4' };
  if (ipType === 6) {
    if (trimmed.startsWith(MAPPED_IPV4_PREFIX)) {
      const mapped = trimmed.slice(MAPPED_IPV4_PREFIX.length);
      if (isIP(mapped) === 4) return { ip: mapped, family: 'ipv4' };
    }
    return { ip: trimmed, family: 'ipv6' };
  }
  return null;
}

/**
 * Parse an allow-list entry into a BlockList rule
 *
 * Returns false for entries that are neither an address nor a valid CIDR.
 */
function addEntry(list: BlockList, entry: string): boolean {
  const slash = entry.indexOf('/');
  if (slash === -1) {
    const address = normalizeIp(entry);
    if (!address) return false;
    list.addAddress(address.ip, address.family);
    return true;
  }

  const network = normalizeIp(entry.slice(0, slash));
  const prefixText = entry.slice(slash + 1).trim();
  if (!network || !/^\d{1,3}$/.test(prefixText)) return false;

  const prefix = Number.parseInt(prefixText, 10);
  const maxPrefix = network.family === 'ipv4' ? 32 : 128;
  if (prefix > maxPrefix) return false;

  list.addSubnet(network.ip, prefix, network.family);
  return true;
}

export class IPFilter {
  private readonly allowList: BlockList | null;
  private readonly banPolicy: BanPolicy;
  private readonly now: () => number;
  private readonly logger?: Logger;
  /** Normalized ip → ban expiry (epoch ms) or null for permanent */
  private readonly bans = new Map<string, number | null>();
  private readonly failedAttempts = new Map<string, number>();

  constructor(options: IPFilterOptions = {}) {
    this.banPolicy = options.banPolicy ?? PERMANENT_BAN_POLICY;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
    this.allowList = this.buildAllowList(options.allowedIps ?? []);

    for (const ip of options.blockedIps ?? []) {
      const normalized = normalizeIp(ip);
      if (normalized) {
        this.bans.set(normalized.ip, null);
      } else {
        this.logger?.warn('Skipping invalid blocked IP entry', { entry: ip });
      }
    }
  }

  /**
   * Admission check: false when banned, otherwise true unless an allow-list
   * is configured and the address matches none of its entries
   */
  isAllowed(ip: string): boolean {
    if (this.isBlocked(ip)) {
      return false;
    }
    return this.matchesAllowList(ip);
  }

  /**
   * Allow-list membership alone, ignoring bans
   */
  matchesAllowList(ip: string): boolean {
    if (!this.allowList) {
      return true;
    }
    const normalized = normalizeIp(ip);
    if (!normalized) {
      return false;
    }
    return this.allowList.check(normalized.ip, normalized.family);
  }

  isBlocked(ip: string): boolean {
    const key = this.keyFor(ip);
    if (!this.bans.has(key)) {
      return false;
    }

    const expiresAt = this.bans.get(key);
    if (expiresAt === null || expiresAt === undefined || expiresAt > this.now()) {
      return true;
    }

    this.bans.delete(key);
    return false;
  }

  /**
   * Count a failed authentication attempt
   *
   * Returns true when this attempt triggered a ban.
   */
  recordFailedAttempt(ip: string): boolean {
    const key = this.keyFor(ip);
    const attempts = (this.failedAttempts.get(key) ?? 0) + 1;

    if (attempts < this.banPolicy.threshold) {
      this.failedAttempts.set(key, attempts);
      return false;
    }

    this.failedAttempts.delete(key);
    this.ban(key, this.banPolicy.durationMs);
    this.logger?.warn('IP banned after repeated authentication failures', {
      ip: key,
      attempts,
      durationMs: this.banPolicy.durationMs,
    });
    return true;
  }

  getFailedAttempts(ip: string): number {
    return this.failedAttempts.get(this.keyFor(ip)) ?? 0;
  }

  clearFailedAttempts(ip: string): void {
    this.failedAttempts.delete(this.keyFor(ip));
  }

  ban(ip: string, durationMs: number | null = null): void {
    const key = this.keyFor(ip);
    this.bans.set(key, durationMs === null ? null : this.now() + durationMs);
  }

  unban(ip: string): boolean {
    return this.bans.delete(this.keyFor(ip));
  }

  /**
   * Remove bans that have run out
   *
   * Returns the number of bans lifted.
   */
  prune(): number {
    const now = this.now();
    let lifted = 0;
    for (const [ip, expiresAt] of this.bans) {
      if (expiresAt !== null && expiresAt <= now) {
        this.bans.delete(ip);
        lifted++;
      }
    }
    return lifted;
  }

  get blockedCount(): number {
    return this.bans.size;
  }

  private keyFor(ip: string): string {
    return normalizeIp(ip)?.ip ?? ip;
  }

  private buildAllowList(entries: readonly string[]): BlockList | null {
    if (entries.length === 0) {
      return null;
    }

    const list = new BlockList();
    let accepted = 0;
    for (const entry of entries) {
      if (addEntry(list, entry)) {
        accepted++;
      } else {
        this.logger?.warn('Skipping invalid allow-list entry', { entry });
      }
    }

    // An allow-list made only of invalid entries still denies everyone
    if (accepted === 0) {
      this.logger?.warn('Allow-list has no valid entries; all connections will be refused');
    }
    return list;
  }
}
