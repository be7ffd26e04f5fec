import { CreateUserInput, User } from '@/models';

/**
 * User Repository Interface
 * Defines the contract for user data access operations
 */
export interface IUserRepository {
  /**
   * Find a user by their ID
   * @returns Promise resolving to User or null if not found
   */
  findById(userId: number): Promise<User | null>;

  /**
   * Find a user by username (case-sensitive, usernames are stored as typed)
   */
  findByUsername(username: string): Promise<User | null>;

  /**
   * Find a user by email (case-insensitive)
   */
  findByEmail(email: string): Promise<User | null>;

  create(input: CreateUserInput): Promise<User>;

  /**
   * Replace the stored password hash
   * Only the credential store's re-hash path calls this
   */
  updatePasswordHash(userId: number, passwordHash: string): Promise<void>;

  /**
   * Write the cached lockout decision (counter + lock-until)
   */
  updateLockState(userId: number, failedLoginAttempts: number, lockedUntil: Date | null): Promise<void>;

  updateLastLogin(userId: number, at: Date): Promise<void>;

  setActive(userId: number, isActive: boolean): Promise<User>;

  /**
   * List users ordered by id, optionally filtered by username/email/full name
   */
  list(options: { search?: string; limit: number; offset: number }): Promise<{ users: User[]; total: number }>;
}
