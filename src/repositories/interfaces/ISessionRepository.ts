import { CreateSessionInput, Session } from '@/models';

/**
 * Session Repository Interface
 */
export interface ISessionRepository {
  create(input: CreateSessionInput): Promise<Session>;

  findByTokenHash(tokenHash: string): Promise<Session | null>;

  /**
   * Record activity and move the sliding expiry
   */
  touch(sessionId: number, lastActivityAt: Date, expiresAt: Date): Promise<void>;

  updateCsrfToken(sessionId: number, csrfToken: string): Promise<void>;

  deleteById(sessionId: number): Promise<void>;

  /**
   * Delete every session of a user, optionally keeping one
   * @returns number of sessions removed
   */
  deleteByUserId(userId: number, exceptSessionId?: number): Promise<number>;

  /**
   * Purge sessions whose expiry has passed
   * @returns number of sessions removed
   */
  deleteExpired(now: Date): Promise<number>;
}
