import { AccountStatus, AccountType } from '@/constants/banking';
import { Account, CreateAccountInput } from '@/models';

/**
 * Account Repository Interface
 * Defines the contract for account data access operations
 */
export interface IAccountRepository {
  findById(accountId: number): Promise<Account | null>;

  /**
   * Find an account by its 10-digit number (destination lookup)
   */
  findByNumber(accountNumber: string): Promise<Account | null>;

  /**
   * All accounts owned by a user, oldest first
   */
  findByUserId(userId: number): Promise<Account[]>;

  findActiveByUserAndType(userId: number, accountType: AccountType): Promise<Account | null>;

  accountNumberExists(accountNumber: string): Promise<boolean>;

  create(input: CreateAccountInput): Promise<Account>;

  /**
   * Lock account rows for the rest of the current transaction
   * Rows are locked in ascending id order so concurrent transfers touching the
   * same pair cannot deadlock. Missing ids are simply absent from the result.
   */
  lockForUpdate(accountIds: number[]): Promise<Account[]>;

  /**
   * Set the balance of a locked account
   * @param balance - NUMERIC string, never negative
   */
  updateBalance(accountId: number, balance: string): Promise<void>;

  setStatus(accountId: number, status: AccountStatus): Promise<Account>;
}
