/**
 * In-Memory Database
 *
 * Repository fakes over plain Maps, behind the same interfaces as the
 * PostgreSQL repositories, plus a unit of work that mirrors the transaction
 * semantics the services rely on:
 * - lock(key) and lockForUpdate() hold a keyed mutex until the unit of work ends
 * - every write inside a unit of work is journaled and undone on rollback
 * - table constraints (unique keys, balance >= 0) are enforced on write
 */

import { ACCOUNT_STATUSES, AccountStatus, AccountType, TRANSACTION_KINDS } from '@/constants/banking';
import {
  Account,
  CreateAccountInput,
  CreateLoginAttemptInput,
  CreateSessionInput,
  CreateTransactionInput,
  CreateUserInput,
  LoginAttempt,
  Session,
  Transaction,
  User,
} from '@/models';
import { BusinessRuleError, DuplicateIdentityError, NotFoundError } from '@/errors';
import {
  IAccountRepository,
  ILoginAttemptRepository,
  ISessionRepository,
  ITransactionRepository,
  IUnitOfWork,
  IUserRepository,
  RepositoryScope,
} from '@/repositories/interfaces';
import { Clock } from '@/utils/clock';
import { decodeCursor, encodeCursor } from '@/utils/cursor';

type Undo = () => void;
type Journal = Undo[] | null;
type LockFn = (key: string) => Promise<void>;
type Table = 'users' | 'accounts' | 'transactions' | 'loginAttempts' | 'sessions';

/**
 * FIFO mutex per key
 */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async acquire(key: string): Promise<() => void> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    return () => {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
  }
}

export class InMemoryDatabase {
  readonly users = new Map<number, User>();
  readonly accounts = new Map<number, Account>();
  readonly transactions = new Map<number, Transaction>();
  readonly loginAttempts = new Map<number, LoginAttempt>();
  readonly sessions = new Map<number, Session>();
  private sequences: Record<Table, number> = { users: 0, accounts: 0, transactions: 0, loginAttempts: 0, sessions: 0 };

  constructor(public clock: Clock = () => new Date()) {}

  nextId(table: Table): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }

  reset(): void {
    this.users.clear();
    this.accounts.clear();
    this.transactions.clear();
    this.loginAttempts.clear();
    this.sessions.clear();
    this.sequences = { users: 0, accounts: 0, transactions: 0, loginAttempts: 0, sessions: 0 };
  }
}

/**
 * Insert or replace a row, recording how to revert it
 */
function write<T>(table: Map<number, T>, id: number, row: T, journal: Journal): void {
  const previous = table.get(id);
  table.set(id, row);
  journal?.push(() => {
    if (previous === undefined) {
      table.delete(id);
    } else {
      table.set(id, previous);
    }
  });
}

function remove<T>(table: Map<number, T>, id: number, journal: Journal): boolean {
  const previous = table.get(id);
  if (previous === undefined) {
    return false;
  }
  table.delete(id);
  journal?.push(() => table.set(id, previous));
  return true;
}

function copy<T extends object>(row: T | undefined): T | null {
  return row ? { ...row } : null;
}

export class InMemoryUserRepository implements IUserRepository {
  constructor(private db: InMemoryDatabase, private journal: Journal = null) {}

  async findById(userId: number): Promise<User | null> {
    return copy(this.db.users.get(userId));
  }

  async findByUsername(username: string): Promise<User | null> {
    return copy([...this.db.users.values()].find((u) => u.username === username));
  }

  async findByEmail(email: string): Promise<User | null> {
    const wanted = email.toLowerCase();
    return copy([...this.db.users.values()].find((u) => u.email.toLowerCase() === wanted));
  }

  async create(input: CreateUserInput): Promise<User> {
    const users = [...this.db.users.values()];
    if (users.some((u) => u.username === input.username)) {
      throw new DuplicateIdentityError('username');
    }
    if (users.some((u) => u.email.toLowerCase() === input.email.toLowerCase())) {
      throw new DuplicateIdentityError('email');
    }

    const user: User = {
      id: this.db.nextId('users'),
      username: input.username,
      email: input.email,
      fullName: input.fullName,
      phoneEncrypted: input.phoneEncrypted,
      passwordHash: input.passwordHash,
      role: input.role,
      isActive: true,
      failedLoginAttempts: 0,
      lockedUntil: null,
      lastLogin: null,
      createdAt: this.db.clock(),
    };
    write(this.db.users, user.id, user, this.journal);
    return { ...user };
  }

  async updatePasswordHash(userId: number, passwordHash: string): Promise<void> {
    this.update(userId, { passwordHash });
  }

  async updateLockState(userId: number, failedLoginAttempts: number, lockedUntil: Date | null): Promise<void> {
    this.update(userId, { failedLoginAttempts, lockedUntil });
  }

  async updateLastLogin(userId: number, at: Date): Promise<void> {
    this.update(userId, { lastLogin: at });
  }

  async setActive(userId: number, isActive: boolean): Promise<User> {
    const user = this.update(userId, { isActive });
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return user;
  }

  async list(options: { search?: string; limit: number; offset: number }): Promise<{ users: User[]; total: number }> {
    const term = options.search?.toLowerCase();
    const matching = [...this.db.users.values()]
      .filter(
        (u) =>
          !term ||
          u.username.toLowerCase().includes(term) ||
          u.email.toLowerCase().includes(term) ||
          u.fullName.toLowerCase().includes(term)
      )
      .sort((a, b) => a.id - b.id);

    return {
      users: matching.slice(options.offset, options.offset + options.limit).map((u) => ({ ...u })),
      total: matching.length,
    };
  }

  private update(userId: number, changes: Partial<User>): User | null {
    const current = this.db.users.get(userId);
    if (!current) {
      return null;
    }
    const next = { ...current, ...changes };
    write(this.db.users, userId, next, this.journal);
    return { ...next };
  }
}

export class InMemoryAccountRepository implements IAccountRepository {
  constructor(
    private db: InMemoryDatabase,
    private journal: Journal = null,
    private lock: LockFn | null = null
  ) {}

  async findById(accountId: number): Promise<Account | null> {
    return copy(this.db.accounts.get(accountId));
  }

  async findByNumber(accountNumber: string): Promise<Account | null> {
    return copy([...this.db.accounts.values()].find((a) => a.accountNumber === accountNumber));
  }

  async findByUserId(userId: number): Promise<Account[]> {
    return [...this.db.accounts.values()]
      .filter((a) => a.userId === userId)
      .sort((a, b) => a.id - b.id)
      .map((a) => ({ ...a }));
  }

  async findActiveByUserAndType(userId: number, accountType: AccountType): Promise<Account | null> {
    return copy(
      [...this.db.accounts.values()].find(
        (a) => a.userId === userId && a.accountType === accountType && a.status === ACCOUNT_STATUSES.ACTIVE
      )
    );
  }

  async accountNumberExists(accountNumber: string): Promise<boolean> {
    return [...this.db.accounts.values()].some((a) => a.accountNumber === accountNumber);
  }

  async create(input: CreateAccountInput): Promise<Account> {
    const accounts = [...this.db.accounts.values()];
    if (accounts.some((a) => a.accountNumber === input.accountNumber)) {
      throw new Error('duplicate key value violates unique constraint "accounts_account_number_key"');
    }
    if (
      accounts.some(
        (a) => a.userId === input.userId && a.accountType === input.accountType && a.status === ACCOUNT_STATUSES.ACTIVE
      )
    ) {
      throw new BusinessRuleError(`You already have an active ${input.accountType} account`, 'DUPLICATE_ACCOUNT_TYPE');
    }

    const account: Account = {
      id: this.db.nextId('accounts'),
      userId: input.userId,
      accountNumber: input.accountNumber,
      accountType: input.accountType,
      balance: '0.00',
      status: ACCOUNT_STATUSES.ACTIVE,
      createdAt: this.db.clock(),
    };
    write(this.db.accounts, account.id, account, this.journal);
    return { ...account };
  }

  async lockForUpdate(accountIds: number[]): Promise<Account[]> {
    const ids = [...new Set(accountIds)].sort((a, b) => a - b);
    if (this.lock) {
      for (const id of ids) {
        await this.lock(`account:${id}`);
      }
    }

    const locked: Account[] = [];
    for (const id of ids) {
      const account = this.db.accounts.get(id);
      if (account) {
        locked.push({ ...account });
      }
    }
    return locked;
  }

  async updateBalance(accountId: number, balance: string): Promise<void> {
    const current = this.db.accounts.get(accountId);
    if (!current) {
      return;
    }
    if (Number(balance) < 0) {
      throw new Error('new row for relation "accounts" violates check constraint "accounts_balance_check"');
    }
    write(this.db.accounts, accountId, { ...current, balance }, this.journal);
  }

  async setStatus(accountId: number, status: AccountStatus): Promise<Account> {
    const current = this.db.accounts.get(accountId);
    if (!current) {
      throw new NotFoundError(`Account ${accountId} not found`);
    }
    const next = { ...current, status };
    write(this.db.accounts, accountId, next, this.journal);
    return { ...next };
  }
}

export class InMemoryTransactionRepository implements ITransactionRepository {
  constructor(private db: InMemoryDatabase, private journal: Journal = null) {}

  async create(input: CreateTransactionInput): Promise<Transaction> {
    if (Number(input.amount) <= 0) {
      throw new Error('new row for relation "transactions" violates check constraint "transactions_amount_check"');
    }
    const reversalOf = input.reversalOf ?? null;
    if (reversalOf !== null && [...this.db.transactions.values()].some((t) => t.reversalOf === reversalOf)) {
      throw new Error('duplicate key value violates unique constraint "transactions_reversal_of_key"');
    }

    const transaction: Transaction = {
      id: this.db.nextId('transactions'),
      kind: input.kind,
      fromAccountId: input.fromAccountId,
      toAccountId: input.toAccountId,
      amount: input.amount,
      descriptionEncrypted: input.descriptionEncrypted,
      status: input.status,
      failureReason: input.failureReason ?? null,
      reversalOf,
      initiatedBy: input.initiatedBy,
      sourceIp: input.sourceIp ?? null,
      createdAt: this.db.clock(),
    };
    write(this.db.transactions, transaction.id, transaction, this.journal);
    return { ...transaction };
  }

  async findById(transactionId: number): Promise<Transaction | null> {
    return copy(this.db.transactions.get(transactionId));
  }

  async findReversalOf(transactionId: number): Promise<Transaction | null> {
    return copy(
      [...this.db.transactions.values()].find(
        (t) => t.reversalOf === transactionId && t.kind === TRANSACTION_KINDS.REVERSAL
      )
    );
  }

  async findByAccountId(
    accountId: number,
    limit: number,
    cursor?: string
  ): Promise<{ transactions: Transaction[]; nextCursor: string | null; hasMore: boolean }> {
    const position = cursor ? decodeCursor(cursor) : null;
    const before = (t: Transaction): boolean => {
      if (!position) return true;
      const delta = t.createdAt.getTime() - position.createdAt.getTime();
      return delta < 0 || (delta === 0 && t.id < position.id);
    };

    const rows = [...this.db.transactions.values()]
      .filter((t) => (t.fromAccountId === accountId || t.toAccountId === accountId) && before(t))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);

    const hasMore = rows.length > limit;
    const transactions = rows.slice(0, limit).map((t) => ({ ...t }));
    const last = transactions[transactions.length - 1];

    return {
      transactions,
      nextCursor: hasMore && last ? encodeCursor(last) : null,
      hasMore,
    };
  }
}

export class InMemoryLoginAttemptRepository implements ILoginAttemptRepository {
  constructor(private db: InMemoryDatabase, private journal: Journal = null) {}

  async create(input: CreateLoginAttemptInput): Promise<LoginAttempt> {
    const attempt: LoginAttempt = { id: this.db.nextId('loginAttempts'), ...input };
    write(this.db.loginAttempts, attempt.id, attempt, this.journal);
    return { ...attempt };
  }

  async findByUsernameSince(username: string, since: Date): Promise<LoginAttempt[]> {
    return [...this.db.loginAttempts.values()]
      .filter((a) => a.username === username && a.attemptedAt.getTime() >= since.getTime())
      .sort((a, b) => a.attemptedAt.getTime() - b.attemptedAt.getTime() || a.id - b.id)
      .map((a) => ({ ...a }));
  }

  async findRecentByUsername(username: string, limit: number): Promise<LoginAttempt[]> {
    return [...this.db.loginAttempts.values()]
      .filter((a) => a.username === username)
      .sort((a, b) => b.attemptedAt.getTime() - a.attemptedAt.getTime() || b.id - a.id)
      .slice(0, limit)
      .map((a) => ({ ...a }));
  }
}

export class InMemorySessionRepository implements ISessionRepository {
  constructor(private db: InMemoryDatabase, private journal: Journal = null) {}

  async create(input: CreateSessionInput): Promise<Session> {
    const session: Session = {
      id: this.db.nextId('sessions'),
      tokenHash: input.tokenHash,
      userId: input.userId,
      csrfToken: input.csrfToken,
      createdAt: input.createdAt,
      lastActivityAt: input.createdAt,
      expiresAt: input.expiresAt,
      absoluteExpiresAt: input.absoluteExpiresAt,
      ipAddress: input.ipAddress,
      userAgent: input.userAgent,
    };
    write(this.db.sessions, session.id, session, this.journal);
    return { ...session };
  }

  async findByTokenHash(tokenHash: string): Promise<Session | null> {
    return copy([...this.db.sessions.values()].find((s) => s.tokenHash === tokenHash));
  }

  async touch(sessionId: number, lastActivityAt: Date, expiresAt: Date): Promise<void> {
    const current = this.db.sessions.get(sessionId);
    if (current) {
      write(this.db.sessions, sessionId, { ...current, lastActivityAt, expiresAt }, this.journal);
    }
  }

  async updateCsrfToken(sessionId: number, csrfToken: string): Promise<void> {
    const current = this.db.sessions.get(sessionId);
    if (current) {
      write(this.db.sessions, sessionId, { ...current, csrfToken }, this.journal);
    }
  }

  async deleteById(sessionId: number): Promise<void> {
    remove(this.db.sessions, sessionId, this.journal);
  }

  async deleteByUserId(userId: number, exceptSessionId?: number): Promise<number> {
    let removed = 0;
    for (const session of [...this.db.sessions.values()]) {
      if (session.userId === userId && session.id !== exceptSessionId && remove(this.db.sessions, session.id, this.journal)) {
        removed += 1;
      }
    }
    return removed;
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const session of [...this.db.sessions.values()]) {
      if (session.expiresAt.getTime() <= now.getTime() && remove(this.db.sessions, session.id, this.journal)) {
        removed += 1;
      }
    }
    return removed;
  }
}

/**
 * Unit of work over the in-memory tables
 * Locks are reentrant within one run and released when it settles.
 */
export class InMemoryUnitOfWork implements IUnitOfWork {
  private commits = 0;
  private rollbacks = 0;

  constructor(private db: InMemoryDatabase, private mutex: KeyedMutex = new KeyedMutex()) {}

  async run<T>(work: (scope: RepositoryScope) => Promise<T>): Promise<T> {
    const journal: Undo[] = [];
    const held = new Set<string>();
    const releases: Array<() => void> = [];

    const lock: LockFn = async (key) => {
      if (held.has(key)) return;
      held.add(key);
      releases.push(await this.mutex.acquire(key));
    };

    const scope: RepositoryScope = {
      users: new InMemoryUserRepository(this.db, journal),
      accounts: new InMemoryAccountRepository(this.db, journal, lock),
      transactions: new InMemoryTransactionRepository(this.db, journal),
      loginAttempts: new InMemoryLoginAttemptRepository(this.db, journal),
      sessions: new InMemorySessionRepository(this.db, journal),
      lock,
    };

    try {
      const result = await work(scope);
      this.commits += 1;
      return result;
    } catch (error) {
      for (const undo of journal.reverse()) {
        undo();
      }
      this.rollbacks += 1;
      throw error;
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  get stats(): { commits: number; rollbacks: number } {
    return { commits: this.commits, rollbacks: this.rollbacks };
  }
}
