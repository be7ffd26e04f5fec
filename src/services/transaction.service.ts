import Decimal from 'decimal.js';
import { PAGINATION_LIMITS } from '@/config/businessRules';
import {
  ACCOUNT_STATUSES,
  ROLES,
  TRANSACTION_KINDS,
  TRANSACTION_STATUSES,
} from '@/constants/banking';
import { Account, Transaction, TransactionResult, TransactionView } from '@/models';
import {
  AccountInactiveError,
  BusinessRuleError,
  InsufficientFundsError,
  InvalidDestinationError,
  NotFoundError,
  SelfTransferError,
} from '@/errors';
import { IAccountRepository, ITransactionRepository, IUnitOfWork } from '@/repositories/interfaces';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IMetrics } from '@/interfaces/IMetrics';
import { NoOpMetrics } from '@/adapters/metrics/NoOpMetrics';
import { formatAmount, parseAmount } from '@/utils/money';
import { sanitizeDescription } from '@/utils/sanitize';
import { AuthContext, requireRole } from './authorization.service';
import { EncryptionService } from './encryption.service';

const log = createLogger('TransactionEngine');

export interface TransferInput {
  sourceAccountId: number;
  destinationAccountNumber: string;
  amount: string | number;
  description?: string | null;
}

export interface Actor {
  userId: number;
  ipAddress: string | null;
}

type FailureCode = 'INSUFFICIENT_FUNDS' | 'ACCOUNT_INACTIVE';

type TransferOutcome =
  | { kind: 'completed'; record: Transaction }
  | { kind: 'failed'; code: FailureCode; record: Transaction };

/**
 * Transaction Engine
 *
 * Every balance change happens here, inside one database transaction that
 * holds FOR UPDATE locks on the touched account rows (ascending id order).
 * Checks run against the locked balances, so two transfers from the same
 * account cannot both pass the funds check on a stale balance.
 *
 * Transaction rows are append-only. A reversal is a new row.
 */
export class TransactionService {
  constructor(
    private unitOfWork: IUnitOfWork,
    private accountRepo: IAccountRepository,
    private transactionRepo: ITransactionRepository,
    private encryption: EncryptionService,
    private metrics: IMetrics = new NoOpMetrics()
  ) {}

  /**
   * Move funds from one of the actor's accounts to any account by number
   *
   * Business Rules:
   * - amount > 0, at most 2 decimals, not above the per-transfer maximum
   * - destination must exist and differ from the source
   * - source must belong to the actor
   * - both accounts active, source balance ≥ amount
   *
   * InsufficientFunds and AccountInactive leave balances untouched but persist
   * a `failed` record; the thrown error carries its id.
   */
  async transfer(input: TransferInput, actor: Actor): Promise<TransactionResult> {
    const amount = parseAmount(input.amount);
    const amountText = formatAmount(amount);
    const descriptionEncrypted = this.encryption.encryptOptional(sanitizeDescription(input.description));
    const endTimer = this.metrics.startTimer('transfer_duration_ms');

    const outcome = await this.unitOfWork.run<TransferOutcome>(async (scope) => {
      const destination = await scope.accounts.findByNumber(input.destinationAccountNumber);
      if (!destination) {
        throw new InvalidDestinationError();
      }
      if (destination.id === input.sourceAccountId) {
        throw new SelfTransferError();
      }

      const locked = await scope.accounts.lockForUpdate([input.sourceAccountId, destination.id]);
      const source = locked.find((a) => a.id === input.sourceAccountId);
      const target = locked.find((a) => a.id === destination.id);

      // Someone else's account is reported exactly like a missing one
      if (!source || source.userId !== actor.userId) {
        throw new NotFoundError('Account not found');
      }
      if (!target) {
        throw new InvalidDestinationError();
      }

      const failure = this.checkTransferable(source, target, amount);
      const base = {
        kind: TRANSACTION_KINDS.TRANSFER,
        fromAccountId: source.id,
        toAccountId: target.id,
        amount: amountText,
        descriptionEncrypted,
        initiatedBy: actor.userId,
        sourceIp: actor.ipAddress,
      };

      if (failure) {
        const record = await scope.transactions.create({
          ...base,
          status: TRANSACTION_STATUSES.FAILED,
          failureReason: failure,
        });
        return { kind: 'failed', code: failure, record };
      }

      await scope.accounts.updateBalance(source.id, formatAmount(new Decimal(source.balance).minus(amount)));
      await scope.accounts.updateBalance(target.id, formatAmount(new Decimal(target.balance).plus(amount)));

      const record = await scope.transactions.create({ ...base, status: TRANSACTION_STATUSES.COMPLETED });
      return { kind: 'completed', record };
    });

    endTimer();
    this.metrics.incrementCounter('transactions_total', 1, {
      kind: TRANSACTION_KINDS.TRANSFER,
      status: outcome.record.status,
    });

    if (outcome.kind === 'failed') {
      log.warn(
        {
          transactionId: outcome.record.id,
          reason: outcome.code,
          fromAccountId: outcome.record.fromAccountId,
          toAccountId: outcome.record.toAccountId,
          userId: actor.userId,
        },
        'Transfer failed'
      );
      throw outcome.code === 'INSUFFICIENT_FUNDS'
        ? new InsufficientFundsError(outcome.record.id)
        : new AccountInactiveError(outcome.record.id);
    }

    log.info(
      {
        transactionId: outcome.record.id,
        fromAccountId: outcome.record.fromAccountId,
        toAccountId: outcome.record.toAccountId,
        userId: actor.userId,
      },
      'Transfer completed'
    );

    return { transactionId: outcome.record.id, status: outcome.record.status };
  }

  /**
   * Credit an account (administrator cash-in)
   */
  async deposit(
    accountId: number,
    amountInput: string | number,
    description: string | null | undefined,
    actor: Actor
  ): Promise<TransactionResult> {
    const amount = parseAmount(amountInput);
    const descriptionEncrypted = this.encryption.encryptOptional(sanitizeDescription(description));

    const record = await this.unitOfWork.run(async (scope) => {
      const [account] = await scope.accounts.lockForUpdate([accountId]);
      if (!account) {
        throw new NotFoundError('Account not found');
      }
      if (account.status !== ACCOUNT_STATUSES.ACTIVE) {
        throw new AccountInactiveError();
      }

      await scope.accounts.updateBalance(account.id, formatAmount(new Decimal(account.balance).plus(amount)));

      return scope.transactions.create({
        kind: TRANSACTION_KINDS.DEPOSIT,
        fromAccountId: null,
        toAccountId: account.id,
        amount: formatAmount(amount),
        descriptionEncrypted,
        status: TRANSACTION_STATUSES.COMPLETED,
        initiatedBy: actor.userId,
        sourceIp: actor.ipAddress,
      });
    });

    this.metrics.incrementCounter('transactions_total', 1, { kind: TRANSACTION_KINDS.DEPOSIT, status: record.status });
    log.info({ transactionId: record.id, accountId, adminId: actor.userId }, 'Deposit completed');

    return { transactionId: record.id, status: record.status };
  }

  /**
   * Compensate a completed transfer
   *
   * Creates a `reversal` row (status `reversed`) that debits the original
   * destination and credits the original source. The original row is untouched.
   * A transfer can be reversed once.
   */
  async reverse(transactionId: number, reason: string | null | undefined, actor: Actor): Promise<TransactionResult> {
    const descriptionEncrypted = this.encryption.encryptOptional(
      sanitizeDescription(reason ?? `Reversal of transaction ${transactionId}`)
    );

    const record = await this.unitOfWork.run(async (scope) => {
      const original = await scope.transactions.findById(transactionId);
      if (!original) {
        throw new NotFoundError('Transaction not found');
      }
      if (
        original.kind !== TRANSACTION_KINDS.TRANSFER ||
        original.status !== TRANSACTION_STATUSES.COMPLETED ||
        original.fromAccountId === null
      ) {
        throw new BusinessRuleError('Only completed transfers can be reversed', 'NOT_REVERSIBLE');
      }

      const sourceId = original.fromAccountId;
      const destinationId = original.toAccountId;
      const locked = await scope.accounts.lockForUpdate([sourceId, destinationId]);

      // Checked under the row locks so two reversals of the same transfer serialize
      if (await scope.transactions.findReversalOf(original.id)) {
        throw new BusinessRuleError('Transaction has already been reversed', 'ALREADY_REVERSED');
      }

      const source = locked.find((a) => a.id === sourceId);
      const destination = locked.find((a) => a.id === destinationId);
      if (!source || !destination) {
        throw new NotFoundError('Account not found');
      }

      const amount = new Decimal(original.amount);
      if (new Decimal(destination.balance).lt(amount)) {
        throw new InsufficientFundsError();
      }

      await scope.accounts.updateBalance(destination.id, formatAmount(new Decimal(destination.balance).minus(amount)));
      await scope.accounts.updateBalance(source.id, formatAmount(new Decimal(source.balance).plus(amount)));

      return scope.transactions.create({
        kind: TRANSACTION_KINDS.REVERSAL,
        fromAccountId: destination.id,
        toAccountId: source.id,
        amount: formatAmount(amount),
        descriptionEncrypted,
        status: TRANSACTION_STATUSES.REVERSED,
        reversalOf: original.id,
        initiatedBy: actor.userId,
        sourceIp: actor.ipAddress,
      });
    });

    this.metrics.incrementCounter('transactions_total', 1, { kind: TRANSACTION_KINDS.REVERSAL, status: record.status });
    log.warn({ transactionId: record.id, reversalOf: transactionId, adminId: actor.userId }, 'Transfer reversed');

    return { transactionId: record.id, status: record.status };
  }

  /**
   * Transaction history of one account, newest first, descriptions decrypted
   * Owners see their own accounts; administrators see every account.
   */
  async listAccountTransactions(
    accountId: number,
    viewer: AuthContext,
    limit: number = PAGINATION_LIMITS.DEFAULT_PAGE_SIZE,
    cursor?: string
  ): Promise<{ transactions: TransactionView[]; nextCursor: string | null; hasMore: boolean }> {
    const account = await this.accountRepo.findById(accountId);
    if (!account || (account.userId !== viewer.userId && !requireRole(viewer, ROLES.ADMIN))) {
      throw new NotFoundError('Account not found');
    }

    const pageSize = Math.min(Math.max(1, limit), PAGINATION_LIMITS.MAX_PAGE_SIZE);
    const page = await this.transactionRepo.findByAccountId(accountId, pageSize, cursor);

    return {
      transactions: page.transactions.map((t) => this.toView(t, accountId)),
      nextCursor: page.nextCursor,
      hasMore: page.hasMore,
    };
  }

  private checkTransferable(source: Account, target: Account, amount: Decimal): FailureCode | null {
    if (source.status !== ACCOUNT_STATUSES.ACTIVE || target.status !== ACCOUNT_STATUSES.ACTIVE) {
      return 'ACCOUNT_INACTIVE';
    }
    if (new Decimal(source.balance).lt(amount)) {
      return 'INSUFFICIENT_FUNDS';
    }
    return null;
  }

  private toView(transaction: Transaction, accountId: number): TransactionView {
    let direction: TransactionView['direction'] = 'none';
    if (transaction.status !== TRANSACTION_STATUSES.FAILED) {
      direction = transaction.fromAccountId === accountId ? 'debit' : 'credit';
    }

    return {
      id: transaction.id,
      kind: transaction.kind,
      status: transaction.status,
      direction,
      amount: transaction.amount,
      fromAccountId: transaction.fromAccountId,
      toAccountId: transaction.toAccountId,
      description: this.encryption.decryptOptional(transaction.descriptionEncrypted),
      failureReason: transaction.failureReason,
      reversalOf: transaction.reversalOf,
      createdAt: transaction.createdAt,
    };
  }
}
