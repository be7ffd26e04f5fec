import { LOGIN_OUTCOMES } from '@/constants/banking';
import { ClientContext, PublicUser, Session } from '@/models';
import { AccountLockedError, AuthenticationError } from '@/errors';
import { IUnitOfWork } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IMetrics } from '@/interfaces/IMetrics';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { Clock, systemClock } from '@/utils/clock';
import { CredentialService, RegistrationInput } from './credential.service';
import { CsrfService } from './csrf.service';
import { EncryptionService } from './encryption.service';
import { LockoutService } from './lockout.service';
import { SessionService, ValidatedSession } from './session.service';
import { toPublicUser } from './user.presenter';

const log = createLogger('AuthService');

export interface LoginResult {
  user: PublicUser;
  session: Session;
  /** Raw session token for the cookie */
  token: string;
  csrfToken: string;
}

/**
 * Authentication flows: registration, login, logout, password change
 *
 * Login runs the lockout decision and the attempt write in one transaction
 * under the per-username lock. Errors are thrown after commit so the attempt
 * row is durable whatever the outcome.
 */
export class AuthService {
  constructor(
    private unitOfWork: IUnitOfWork,
    private credentials: CredentialService,
    private lockout: LockoutService,
    private sessions: SessionService,
    private csrf: CsrfService,
    private encryption: EncryptionService,
    private metrics: IMetrics = new NoOpMetrics(),
    private clock: Clock = systemClock
  ) {}

  async register(input: RegistrationInput): Promise<PublicUser> {
    const user = await this.credentials.register(input);
    return toPublicUser(user, this.encryption);
  }

  /**
   * @throws AccountLockedError while the username is locked (password not checked)
   * @throws AuthenticationError for every other failure, with a uniform message
   */
  async login(username: string, password: string, context: ClientContext): Promise<LoginResult> {
    const result = await this.unitOfWork.run(async (scope) => {
      const before = await this.lockout.acquire(scope, username);

      if (before.locked) {
        const existing = await scope.users.findByUsername(username);
        await this.lockout.recordLocked(scope, username, existing?.id ?? null, context);
        return { kind: 'locked', remainingLockSeconds: before.remainingLockSeconds } as const;
      }

      const match = await this.credentials.verify(username, password, scope.users);
      const outcome = match.ok ? LOGIN_OUTCOMES.SUCCESS : LOGIN_OUTCOMES.FAILURE;
      const after = await this.lockout.record(scope, username, match.userId, outcome, context);

      if (!match.ok || !match.user) {
        return { kind: 'failed', lockedNow: after.locked } as const;
      }

      await scope.users.updateLastLogin(match.user.id, this.clock());
      await this.credentials.upgradeHashIfNeeded(match.user, password, scope.users);
      return { kind: 'authenticated', user: { ...match.user, failedLoginAttempts: 0, lockedUntil: null } } as const;
    });

    if (result.kind === 'locked') {
      this.metrics.incrementCounter('auth_logins_total', 1, { outcome: LOGIN_OUTCOMES.LOCKED });
      log.warn({ username, ipAddress: context.ipAddress }, 'Login attempt on locked account');
      throw new AccountLockedError(result.remainingLockSeconds);
    }

    if (result.kind === 'failed') {
      this.metrics.incrementCounter('auth_logins_total', 1, { outcome: LOGIN_OUTCOMES.FAILURE });
      if (result.lockedNow) {
        this.metrics.incrementCounter('auth_lockouts_total');
      }
      log.info({ username, ipAddress: context.ipAddress }, 'Login failed');
      throw new AuthenticationError();
    }

    const { session, token } = await this.sessions.create(result.user.id, context);
    this.metrics.incrementCounter('auth_logins_total', 1, { outcome: LOGIN_OUTCOMES.SUCCESS });
    log.info({ userId: result.user.id, sessionId: session.id, ipAddress: context.ipAddress }, 'Login succeeded');

    return {
      user: toPublicUser(result.user, this.encryption),
      session,
      token,
      csrfToken: session.csrfToken,
    };
  }

  async logout(token: string): Promise<void> {
    await this.sessions.revoke(token);
  }

  /**
   * Current session summary (exposes the CSRF token to the client)
   */
  describeSession(validated: ValidatedSession): { user: PublicUser; csrfToken: string; expiresAt: Date } {
    return {
      user: toPublicUser(validated.user, this.encryption),
      csrfToken: validated.session.csrfToken,
      expiresAt: validated.session.expiresAt,
    };
  }

  /**
   * Change the caller's password
   *
   * The current-password check is a login attempt: it runs under the
   * per-username lock, is recorded, and is refused while the username is
   * locked. Every other session of the user is revoked and the current session
   * gets a new CSRF token, which is returned.
   *
   * @throws AccountLockedError while the username is locked
   * @throws AuthenticationError when the current password is wrong
   */
  async changePassword(
    current: ValidatedSession,
    currentPassword: string,
    newPassword: string,
    context: ClientContext
  ): Promise<string> {
    const { user, session } = current;

    const result = await this.unitOfWork.run(async (scope) => {
      const before = await this.lockout.acquire(scope, user.username);

      if (before.locked) {
        await this.lockout.recordLocked(scope, user.username, user.id, context);
        return { kind: 'locked', remainingLockSeconds: before.remainingLockSeconds } as const;
      }

      const match = await this.credentials.verify(user.username, currentPassword, scope.users);
      const ok = match.ok && match.userId === user.id;
      const after = await this.lockout.record(
        scope,
        user.username,
        user.id,
        ok ? LOGIN_OUTCOMES.SUCCESS : LOGIN_OUTCOMES.FAILURE,
        context
      );

      return ok ? ({ kind: 'verified' } as const) : ({ kind: 'failed', lockedNow: after.locked } as const);
    });

    if (result.kind === 'locked') {
      log.warn({ userId: user.id, ipAddress: context.ipAddress }, 'Password change on locked account');
      throw new AccountLockedError(result.remainingLockSeconds);
    }

    if (result.kind === 'failed') {
      if (result.lockedNow) {
        this.metrics.incrementCounter('auth_lockouts_total');
      }
      log.info({ userId: user.id, ipAddress: context.ipAddress }, 'Password change rejected');
      throw new AuthenticationError('Current password is incorrect');
    }

    await this.credentials.rehash(user.id, newPassword);
    const revoked = await this.sessions.revokeAll(user.id, session.id);
    const csrfToken = await this.csrf.issue(session);
    log.info({ userId: user.id, revokedSessions: revoked }, 'Password changed');
    return csrfToken;
  }
}
