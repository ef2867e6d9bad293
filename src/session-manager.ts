/**
 * Live session registry
 *
 * One ClientSession per accepted connection, keyed by client id. The
 * periodic sweep only forgets registry entries; it never closes sockets.
 */

import { randomUUID } from 'node:crypto';
import type { ClientSession } from './types/session.js';
import type { Logger } from './logger.js';
import { toError } from './errors.js';

export type SessionListener = (session: ClientSession) => void;

export interface SessionManagerOptions {
  logger?: Logger;
  now?: () => number;
}

export class SessionManager {
  private readonly sessions = new Map<string, ClientSession>();
  private readonly createdListeners: SessionListener[] = [];
  private readonly removedListeners: SessionListener[] = [];
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(options: SessionManagerOptions = {}) {
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  createSession(ipAddress: string, authenticated = false): ClientSession {
    const timestamp = new Date(this.now());
    const session: ClientSession = {
      clientId: randomUUID(),
      ipAddress,
      connectedAt: timestamp,
      lastActivity: timestamp,
      requestCount: 0,
      authenticated,
      initialized: false,
    };

    this.sessions.set(session.clientId, session);
    this.logger?.debug('Session created', { clientId: session.clientId, ip: ipAddress });
    this.notify(this.createdListeners, session);
    return session;
  }

  getSession(clientId: string): ClientSession | undefined {
    return this.sessions.get(clientId);
  }

  /**
   * Record activity on a session: bumps `lastActivity` and `requestCount`
   */
  updateSession(clientId: string): ClientSession | undefined {
    const session = this.sessions.get(clientId);
    if (session) {
      session.lastActivity = new Date(this.now());
      session.requestCount++;
    }
    return session;
  }

  removeSession(clientId: string): boolean {
    const session = this.sessions.get(clientId);
    if (!session) {
      return false;
    }

    this.sessions.delete(clientId);
    this.logger?.debug('Session removed', { clientId, requests: session.requestCount });
    this.notify(this.removedListeners, session);
    return true;
  }

  /**
   * Evict sessions whose last activity predates `now - maxAgeMs`
   *
   * Returns the ids of the evicted sessions.
   */
  cleanupExpiredSessions(maxAgeMs: number): string[] {
    const cutoff = this.now() - maxAgeMs;
    const expired: string[] = [];

    for (const [clientId, session] of this.sessions) {
      if (session.lastActivity.getTime() < cutoff) {
        expired.push(clientId);
      }
    }

    for (const clientId of expired) {
      this.removeSession(clientId);
    }

    if (expired.length > 0) {
      this.logger?.info('Cleaned up expired sessions', { count: expired.length });
    }
    return expired;
  }

  listSessions(): ClientSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  onSessionCreated(listener: SessionListener): void {
    this.createdListeners.push(listener);
  }

  onSessionRemoved(listener: SessionListener): void {
    this.removedListeners.push(listener);
  }

  private notify(listeners: SessionListener[], session: ClientSession): void {
    for (const listener of listeners) {
      try {
        listener(session);
      } catch (error) {
        this.logger?.error('Session listener error', toError(error), { clientId: session.clientId });
      }
    }
  }
}
