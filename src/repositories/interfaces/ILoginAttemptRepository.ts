import { CreateLoginAttemptInput, LoginAttempt } from '@/models';

/**
 * Login Attempt Repository Interface
 * Append-only log read by the lockout tracker
 */
export interface ILoginAttemptRepository {
  create(input: CreateLoginAttemptInput): Promise<LoginAttempt>;

  /**
   * Attempts for a username at or after `since`, oldest first
   */
  findByUsernameSince(username: string, since: Date): Promise<LoginAttempt[]>;

  /**
   * Most recent attempts for a username, newest first (admin view)
   */
  findRecentByUsername(username: string, limit: number): Promise<LoginAttempt[]>;
}
