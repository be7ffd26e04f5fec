import { AccountStatus, AccountType, ACCOUNT_STATUSES } from '@/constants/banking';
import { Account, CreateAccountInput } from '@/models';
import { BusinessRuleError, NotFoundError } from '@/errors';
import { IAccountRepository } from './interfaces/IAccountRepository';
import { BaseRepository } from './base.repository';
import { isUniqueViolation } from './pgErrors';

const ACCOUNT_COLUMNS = `
  id,
  user_id AS "userId",
  account_number AS "accountNumber",
  account_type AS "accountType",
  balance,
  status,
  created_at AS "createdAt"
`;

/**
 * Account Repository
 * Handles all database operations for accounts
 *
 * Balances are NUMERIC(15,2) and come back as strings for precision.
 */
export class AccountRepository extends BaseRepository implements IAccountRepository {
  async findById(accountId: number): Promise<Account | null> {
    const result = await this.run<Account>(`SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`, [accountId]);
    return result.rows[0] || null;
  }

  async findByNumber(accountNumber: string): Promise<Account | null> {
    const result = await this.run<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE account_number = $1`,
      [accountNumber]
    );
    return result.rows[0] || null;
  }

  async findByUserId(userId: number): Promise<Account[]> {
    const result = await this.run<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE user_id = $1 ORDER BY id ASC`,
      [userId]
    );
    return result.rows;
  }

  async findActiveByUserAndType(userId: number, accountType: AccountType): Promise<Account | null> {
    const result = await this.run<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE user_id = $1 AND account_type = $2 AND status = $3`,
      [userId, accountType, ACCOUNT_STATUSES.ACTIVE]
    );
    return result.rows[0] || null;
  }

  async accountNumberExists(accountNumber: string): Promise<boolean> {
    const result = await this.run<{ exists: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM accounts WHERE account_number = $1) AS "exists"',
      [accountNumber]
    );
    return result.rows[0]?.exists ?? false;
  }

  /**
   * @throws BusinessRuleError when the user already has an active account of this type
   */
  async create(input: CreateAccountInput): Promise<Account> {
    try {
      const result = await this.run<Account>(
        `
        INSERT INTO accounts (user_id, account_number, account_type)
        VALUES ($1, $2, $3)
        RETURNING ${ACCOUNT_COLUMNS}
        `,
        [input.userId, input.accountNumber, input.accountType]
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error('Account insert returned no row');
      }
      return row;
    } catch (error) {
      if (isUniqueViolation(error) && error.constraint === 'accounts_one_active_per_type') {
        throw new BusinessRuleError(
          `You already have an active ${input.accountType} account`,
          'DUPLICATE_ACCOUNT_TYPE'
        );
      }
      throw error;
    }
  }

  /**
   * Uses FOR UPDATE: only meaningful inside a transaction (bound client)
   */
  async lockForUpdate(accountIds: number[]): Promise<Account[]> {
    const result = await this.run<Account>(
      `
      SELECT ${ACCOUNT_COLUMNS}
      FROM accounts
      WHERE id = ANY($1::int[])
      ORDER BY id ASC
      FOR UPDATE
      `,
      [accountIds]
    );
    return result.rows;
  }

  async updateBalance(accountId: number, balance: string): Promise<void> {
    await this.run('UPDATE accounts SET balance = $2 WHERE id = $1', [accountId, balance]);
  }

  async setStatus(accountId: number, status: AccountStatus): Promise<Account> {
    const result = await this.run<Account>(
      `UPDATE accounts SET status = $2 WHERE id = $1 RETURNING ${ACCOUNT_COLUMNS}`,
      [accountId, status]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Account ${accountId} not found`);
    }
    return row;
  }
}
