import { createHash, randomBytes } from 'node:crypto';
import { SESSION_POLICY } from '@/config/businessRules';
import { ClientContext, Session, User } from '@/models';
import { SessionExpiredError, SessionNotFoundError } from '@/errors';
import { ISessionRepository, IUserRepository } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { Clock, systemClock } from '@/utils/clock';
import { CsrfService } from './csrf.service';

const log = createLogger('SessionService');

const TOKEN_BYTES = 32;

export interface SessionTimeouts {
  idleTimeoutMs: number;
  absoluteTimeoutMs: number;
}

export const DEFAULT_SESSION_TIMEOUTS: SessionTimeouts = {
  idleTimeoutMs: SESSION_POLICY.IDLE_TIMEOUT_MS,
  absoluteTimeoutMs: SESSION_POLICY.ABSOLUTE_TIMEOUT_MS,
};

export interface ValidatedSession {
  session: Session;
  user: User;
}

/**
 * SHA-256 of the cookie token, the only form that reaches the database
 */
export function hashSessionToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

/**
 * Session Manager
 *
 * Opaque random tokens with sliding expiry: every validated request moves
 * expiresAt to min(now + idle timeout, absolute expiry).
 */
export class SessionService {
  constructor(
    private sessionRepo: ISessionRepository,
    private userRepo: IUserRepository,
    private csrf: CsrfService,
    private timeouts: SessionTimeouts = DEFAULT_SESSION_TIMEOUTS,
    private clock: Clock = systemClock
  ) {}

  /**
   * Start a session for a user
   * @returns the stored session and the raw token for the cookie
   */
  async create(userId: number, context: ClientContext): Promise<{ session: Session; token: string }> {
    const now = this.clock();
    const token = randomBytes(TOKEN_BYTES).toString('base64url');
    const absoluteExpiresAt = new Date(now.getTime() + this.timeouts.absoluteTimeoutMs);

    const session = await this.sessionRepo.create({
      tokenHash: hashSessionToken(token),
      userId,
      csrfToken: this.csrf.generateToken(),
      createdAt: now,
      expiresAt: this.slidingExpiry(now, absoluteExpiresAt),
      absoluteExpiresAt,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    log.debug({ userId, sessionId: session.id }, 'Session created');
    return { session, token };
  }

  /**
   * Resolve a cookie token to its session and user, extending the session
   *
   * @throws SessionNotFoundError for unknown tokens and deactivated users
   * @throws SessionExpiredError when the idle or absolute limit has passed
   */
  async validate(token: string): Promise<ValidatedSession> {
    const session = await this.sessionRepo.findByTokenHash(hashSessionToken(token));
    if (!session) {
      throw new SessionNotFoundError();
    }

    const now = this.clock();
    if (now >= session.expiresAt || now >= session.absoluteExpiresAt) {
      await this.sessionRepo.deleteById(session.id);
      log.debug({ userId: session.userId, sessionId: session.id }, 'Expired session removed');
      throw new SessionExpiredError();
    }

    const user = await this.userRepo.findById(session.userId);
    if (!user || !user.isActive) {
      await this.sessionRepo.deleteByUserId(session.userId);
      throw new SessionNotFoundError();
    }

    const expiresAt = this.slidingExpiry(now, session.absoluteExpiresAt);
    await this.sessionRepo.touch(session.id, now, expiresAt);

    return { session: { ...session, lastActivityAt: now, expiresAt }, user };
  }

  /**
   * Logout: delete the session behind a token (no-op for unknown tokens)
   */
  async revoke(token: string): Promise<void> {
    const session = await this.sessionRepo.findByTokenHash(hashSessionToken(token));
    if (session) {
      await this.sessionRepo.deleteById(session.id);
      log.debug({ userId: session.userId, sessionId: session.id }, 'Session revoked');
    }
  }

  /**
   * Delete every session of a user, optionally keeping the caller's own
   * @returns number of sessions removed
   */
  async revokeAll(userId: number, exceptSessionId?: number): Promise<number> {
    const removed = await this.sessionRepo.deleteByUserId(userId, exceptSessionId);
    if (removed > 0) {
      log.info({ userId, removed }, 'Sessions revoked');
    }
    return removed;
  }

  async purgeExpired(): Promise<number> {
    return this.sessionRepo.deleteExpired(this.clock());
  }

  private slidingExpiry(now: Date, absoluteExpiresAt: Date): Date {
    return new Date(Math.min(now.getTime() + this.timeouts.idleTimeoutMs, absoluteExpiresAt.getTime()));
  }
}
