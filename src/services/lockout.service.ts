import { LOCKOUT_POLICY } from '@/config/businessRules';
import { LOGIN_OUTCOMES, LoginOutcome } from '@/constants/banking';
import { ClientContext, LoginAttempt } from '@/models';
import { IUnitOfWork, ILoginAttemptRepository, RepositoryScope } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { Clock, systemClock } from '@/utils/clock';

const log = createLogger('LockoutService');

export interface LockoutPolicyConfig {
  /** Failures inside the window that trigger a lock */
  threshold: number;
  windowMs: number;
  durationMs: number;
}

export const DEFAULT_LOCKOUT_POLICY: LockoutPolicyConfig = {
  threshold: LOCKOUT_POLICY.THRESHOLD,
  windowMs: LOCKOUT_POLICY.WINDOW_MS,
  durationMs: LOCKOUT_POLICY.DURATION_MS,
};

export interface LockState {
  locked: boolean;
  lockedUntil: Date | null;
  /** Failures counted toward the next lock (or that caused the current one) */
  failedAttempts: number;
  remainingLockSeconds: number;
}

export interface LockDecision extends LockState {
  /** False when the attempt arrived while the username was locked */
  allowed: boolean;
}

/**
 * Replay the attempt log into a lock state
 *
 * Attempts must be in chronological order. A lock starts at the failure that
 * reaches the threshold and lasts `durationMs`; once it elapses the failure
 * count starts from zero. Successes and admin resets clear everything.
 */
export function evaluateLockState(
  attempts: ReadonlyArray<Pick<LoginAttempt, 'outcome' | 'attemptedAt'>>,
  now: Date,
  policy: LockoutPolicyConfig
): LockState {
  let failures: number[] = [];
  let lockedUntil: number | null = null;

  for (const attempt of attempts) {
    const t = attempt.attemptedAt.getTime();

    if (lockedUntil !== null && t >= lockedUntil) {
      lockedUntil = null;
      failures = [];
    }

    switch (attempt.outcome) {
      case LOGIN_OUTCOMES.SUCCESS:
      case LOGIN_OUTCOMES.ADMIN_RESET:
        failures = [];
        lockedUntil = null;
        break;

      case LOGIN_OUTCOMES.FAILURE:
        if (lockedUntil !== null) break;
        failures = failures.filter((f) => t - f < policy.windowMs);
        failures.push(t);
        if (failures.length >= policy.threshold) {
          lockedUntil = t + policy.durationMs;
        }
        break;

      case LOGIN_OUTCOMES.LOCKED:
        break;
    }
  }

  const nowMs = now.getTime();

  if (lockedUntil !== null && nowMs < lockedUntil) {
    return {
      locked: true,
      lockedUntil: new Date(lockedUntil),
      failedAttempts: failures.length,
      remainingLockSeconds: Math.ceil((lockedUntil - nowMs) / 1000),
    };
  }

  const recentFailures = lockedUntil !== null ? [] : failures.filter((f) => nowMs - f < policy.windowMs);
  return {
    locked: false,
    lockedUntil: null,
    failedAttempts: recentFailures.length,
    remainingLockSeconds: 0,
  };
}

/**
 * Lockout Tracker
 *
 * The login_attempts log is the source of truth. Every decision runs inside a
 * transaction holding an exclusive per-username lock, and the attempt row is
 * written before the decision is returned, so concurrent failures are all
 * counted. The users row gets a cached copy of the result.
 */
export class LockoutService {
  constructor(
    private unitOfWork: IUnitOfWork,
    private loginAttemptRepo: ILoginAttemptRepository,
    private policy: LockoutPolicyConfig = DEFAULT_LOCKOUT_POLICY,
    private clock: Clock = systemClock
  ) {}

  /**
   * Record an attempt whose outcome is already known and return the decision
   * Attempts made while locked are stored as `locked` and not counted.
   */
  async checkAndRecord(
    username: string,
    outcome: typeof LOGIN_OUTCOMES.SUCCESS | typeof LOGIN_OUTCOMES.FAILURE,
    context: ClientContext,
    userId: number | null = null
  ): Promise<LockDecision> {
    return this.unitOfWork.run(async (scope) => {
      const before = await this.acquire(scope, username);
      if (before.locked) {
        await this.append(scope, username, userId, LOGIN_OUTCOMES.LOCKED, context);
        return { ...before, allowed: false };
      }

      const after = await this.record(scope, username, userId, outcome, context);
      return { ...after, allowed: true };
    });
  }

  /**
   * Read-only evaluation (admin view)
   */
  async status(username: string): Promise<LockState> {
    const now = this.clock();
    const attempts = await this.loginAttemptRepo.findByUsernameSince(username, this.lookbackStart(now));
    return evaluateLockState(attempts, now, this.policy);
  }

  /**
   * Enter the per-username critical section of `scope` and evaluate the lock
   */
  async acquire(scope: RepositoryScope, username: string): Promise<LockState> {
    await scope.lock(`login:${username}`);
    return this.evaluate(scope, username);
  }

  /**
   * Append an attempt, re-evaluate and refresh the cached counters on the user
   * Must run after acquire() in the same scope.
   */
  async record(
    scope: RepositoryScope,
    username: string,
    userId: number | null,
    outcome: LoginOutcome,
    context: ClientContext
  ): Promise<LockState> {
    await this.append(scope, username, userId, outcome, context);
    const state = await this.evaluate(scope, username);

    if (userId !== null) {
      await scope.users.updateLockState(userId, state.failedAttempts, state.lockedUntil);
    }

    if (outcome === LOGIN_OUTCOMES.FAILURE && state.locked) {
      log.warn(
        { username, userId, lockedUntil: state.lockedUntil?.toISOString(), ipAddress: context.ipAddress },
        'Account locked after repeated failed logins'
      );
    }

    return state;
  }

  /**
   * Log an attempt rejected because the username is locked
   */
  async recordLocked(scope: RepositoryScope, username: string, userId: number | null, context: ClientContext): Promise<void> {
    await this.append(scope, username, userId, LOGIN_OUTCOMES.LOCKED, context);
  }

  /**
   * Clear the lock by appending an admin_reset attempt
   */
  async reset(scope: RepositoryScope, username: string, userId: number, context: ClientContext): Promise<LockState> {
    await this.acquire(scope, username);
    return this.record(scope, username, userId, LOGIN_OUTCOMES.ADMIN_RESET, context);
  }

  private async evaluate(scope: RepositoryScope, username: string): Promise<LockState> {
    const now = this.clock();
    const attempts = await scope.loginAttempts.findByUsernameSince(username, this.lookbackStart(now));
    return evaluateLockState(attempts, now, this.policy);
  }

  private async append(
    scope: RepositoryScope,
    username: string,
    userId: number | null,
    outcome: LoginOutcome,
    context: ClientContext
  ): Promise<void> {
    await scope.loginAttempts.create({
      username,
      userId,
      outcome,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      attemptedAt: this.clock(),
    });
  }

  /**
   * Oldest attempt that can still influence the current state:
   * a lock lasts durationMs after a failure, which counts failures windowMs back
   */
  private lookbackStart(now: Date): Date {
    return new Date(now.getTime() - this.policy.windowMs - this.policy.durationMs);
  }
}
