import { LoginOutcome } from '@/constants/banking';

/**
 * LoginAttempt model
 * Matches the 'login_attempts' table schema. Append-only.
 */
export interface LoginAttempt {
  id: number;
  username: string;
  userId: number | null;
  outcome: LoginOutcome;
  ipAddress: string | null;
  userAgent: string | null;
  attemptedAt: Date;
}

export interface CreateLoginAttemptInput {
  username: string;
  userId: number | null;
  outcome: LoginOutcome;
  ipAddress: string | null;
  userAgent: string | null;
  attemptedAt: Date;
}
