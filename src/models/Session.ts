/**
 * Session model
 * Matches the 'sessions' table schema
 *
 * Only the SHA-256 hash of the cookie token is stored.
 */
export interface Session {
  id: number;
  tokenHash: string;
  userId: number;
  csrfToken: string;
  createdAt: Date;
  lastActivityAt: Date;
  expiresAt: Date;
  absoluteExpiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
}

export interface CreateSessionInput {
  tokenHash: string;
  userId: number;
  csrfToken: string;
  createdAt: Date;
  expiresAt: Date;
  absoluteExpiresAt: Date;
  ipAddress: string | null;
  userAgent: string | null;
}

/**
 * Request context captured for audit fields
 */
export interface ClientContext {
  ipAddress: string | null;
  userAgent: string | null;
}
