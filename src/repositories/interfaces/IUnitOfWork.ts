import { IAccountRepository } from './IAccountRepository';
import { ILoginAttemptRepository } from './ILoginAttemptRepository';
import { ISessionRepository } from './ISessionRepository';
import { ITransactionRepository } from './ITransactionRepository';
import { IUserRepository } from './IUserRepository';

/**
 * Repositories bound to one database transaction
 */
export interface RepositoryScope {
  users: IUserRepository;
  accounts: IAccountRepository;
  transactions: ITransactionRepository;
  loginAttempts: ILoginAttemptRepository;
  sessions: ISessionRepository;

  /**
   * Take an exclusive lock on an arbitrary key until the transaction ends
   * Serializes work on rows that may not exist yet (e.g. login attempts for a username)
   */
  lock(key: string): Promise<void>;
}

/**
 * Unit of Work
 * Runs `work` inside a single transaction: commits when it resolves, rolls
 * back every write when it rejects.
 */
export interface IUnitOfWork {
  run<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T>;
}
