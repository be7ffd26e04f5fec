import { PoolClient } from 'pg';
import { transaction } from '@/config/database';
import { IUnitOfWork, RepositoryScope } from './interfaces/IUnitOfWork';
import { UserRepository } from './user.repository';
import { AccountRepository } from './account.repository';
import { TransactionRepository } from './transaction.repository';
import { LoginAttemptRepository } from './loginAttempt.repository';
import { SessionRepository } from './session.repository';

/**
 * PostgreSQL Unit of Work
 *
 * One READ COMMITTED transaction per run. lock() takes a transaction-scoped
 * advisory lock, released automatically on COMMIT or ROLLBACK.
 */
export class PgUnitOfWork implements IUnitOfWork {
  async run<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    return transaction((client) => work(this.createScope(client)));
  }

  private createScope(client: PoolClient): RepositoryScope {
    return {
      users: new UserRepository(client),
      accounts: new AccountRepository(client),
      transactions: new TransactionRepository(client),
      loginAttempts: new LoginAttemptRepository(client),
      sessions: new SessionRepository(client),
      lock: async (key: string) => {
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [key]);
      },
    };
  }
}
