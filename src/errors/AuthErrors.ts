import { AppError } from './AppError';

/**
 * Authentication Failure (401)
 * The message is identical for unknown usernames, wrong passwords and
 * deactivated users.
 */
export class AuthenticationError extends AppError {
  constructor(message: string = 'Invalid username or password') {
    super(message, 401, 'AUTHENTICATION_FAILURE');
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Account Locked (423)
 * Raised while the lockout tracker holds a lock on the username
 */
export class AccountLockedError extends AppError {
  public readonly remainingLockSeconds: number;

  constructor(remainingLockSeconds: number) {
    super(
      `Account is temporarily locked. Try again in ${Math.ceil(remainingLockSeconds / 60)} minute(s).`,
      423,
      'ACCOUNT_LOCKED'
    );
    this.remainingLockSeconds = remainingLockSeconds;
    Object.setPrototypeOf(this, AccountLockedError.prototype);
  }

  public override details(): Record<string, unknown> {
    return { remainingLockSeconds: this.remainingLockSeconds };
  }
}

/**
 * Weak Password (400)
 * Lists every password rule the candidate fails
 */
export class WeakPasswordError extends AppError {
  public readonly rules: string[];

  constructor(rules: string[]) {
    super(`Password does not meet requirements: ${rules[0] ?? 'invalid password'}`, 400, 'WEAK_PASSWORD');
    this.rules = rules;
    Object.setPrototypeOf(this, WeakPasswordError.prototype);
  }

  public override details(): Record<string, unknown> {
    return { rules: this.rules };
  }
}

/**
 * Duplicate Identity (409)
 * Username or email already registered
 */
export class DuplicateIdentityError extends AppError {
  public readonly field: 'username' | 'email';

  constructor(field: 'username' | 'email') {
    super(`An account with this ${field} already exists`, 409, 'DUPLICATE_IDENTITY');
    this.field = field;
    Object.setPrototypeOf(this, DuplicateIdentityError.prototype);
  }

  public override details(): Record<string, unknown> {
    return { field: this.field };
  }
}
