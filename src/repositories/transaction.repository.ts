import { CreateTransactionInput, Transaction } from '@/models';
import { TRANSACTION_KINDS } from '@/constants/banking';
import { ITransactionRepository } from './interfaces/ITransactionRepository';
import { BaseRepository } from './base.repository';
import { decodeCursor, encodeCursor } from '@/utils/cursor';

const TRANSACTION_COLUMNS = `
  id,
  kind,
  from_account_id AS "fromAccountId",
  to_account_id AS "toAccountId",
  amount,
  description_encrypted AS "descriptionEncrypted",
  status,
  failure_reason AS "failureReason",
  reversal_of AS "reversalOf",
  initiated_by AS "initiatedBy",
  source_ip AS "sourceIp",
  created_at AS "createdAt"
`;

/**
 * Transaction Repository
 * Insert and read only. The table has no UPDATE path.
 */
export class TransactionRepository extends BaseRepository implements ITransactionRepository {
  async create(input: CreateTransactionInput): Promise<Transaction> {
    const result = await this.run<Transaction>(
      `
      INSERT INTO transactions (
        kind,
        from_account_id,
        to_account_id,
        amount,
        description_encrypted,
        status,
        failure_reason,
        reversal_of,
        initiated_by,
        source_ip
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
      RETURNING ${TRANSACTION_COLUMNS}
      `,
      [
        input.kind,
        input.fromAccountId,
        input.toAccountId,
        input.amount,
        input.descriptionEncrypted,
        input.status,
        input.failureReason ?? null,
        input.reversalOf ?? null,
        input.initiatedBy,
        input.sourceIp ?? null,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('Transaction insert returned no row');
    }
    return row;
  }

  async findById(transactionId: number): Promise<Transaction | null> {
    const result = await this.run<Transaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = $1`,
      [transactionId]
    );
    return result.rows[0] || null;
  }

  async findReversalOf(transactionId: number): Promise<Transaction | null> {
    const result = await this.run<Transaction>(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE reversal_of = $1 AND kind = $2`,
      [transactionId, TRANSACTION_KINDS.REVERSAL]
    );
    return result.rows[0] || null;
  }

  /**
   * Keyset pagination on (created_at, id), newest first
   */
  async findByAccountId(
    accountId: number,
    limit: number,
    cursor?: string
  ): Promise<{ transactions: Transaction[]; nextCursor: string | null; hasMore: boolean }> {
    const params: unknown[] = [accountId];
    let cursorClause = '';

    if (cursor) {
      const position = decodeCursor(cursor);
      params.push(position.createdAt, position.id);
      cursorClause = `AND (created_at, id) < ($${params.length - 1}, $${params.length})`;
    }

    // Fetch one extra row to know whether another page exists
    params.push(limit + 1);
    const result = await this.run<Transaction>(
      `
      SELECT ${TRANSACTION_COLUMNS}
      FROM transactions
      WHERE (from_account_id = $1 OR to_account_id = $1)
      ${cursorClause}
      ORDER BY created_at DESC, id DESC
      LIMIT $${params.length}
      `,
      params
    );

    const hasMore = result.rows.length > limit;
    const transactions = hasMore ? result.rows.slice(0, limit) : result.rows;
    const last = transactions[transactions.length - 1];

    return {
      transactions,
      nextCursor: hasMore && last ? encodeCursor(last) : null,
      hasMore,
    };
  }
}
