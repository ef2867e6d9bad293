/**
 * Client session model
 *
 * One session per accepted connection. Sessions are created after the
 * connection passes the IP and connection-limit gates and are mutated only
 * by the connection that owns them.
 */

export interface ClientSession {
  clientId: string;
  ipAddress: string;
  connectedAt: Date;
  lastActivity: Date;
  requestCount: number;
  authenticated: boolean;
  /** Set once the client has completed `initialize` */
  initialized: boolean;
  /** `name/version` from the client's `clientInfo`, when it sent one */
  userAgent?: string;
}

/**
 * Lifecycle of a single connection
 *
 * admitted → authenticating → serving → closing; connections that fail
 * admission never reach `admitted`.
 */
export type ConnectionState = 'admitted' | 'authenticating' | 'serving' | 'closing';
