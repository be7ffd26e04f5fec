import { CreateTransactionInput, Transaction } from '@/models';

/**
 * Transaction Repository Interface
 * Append-only: there is no update operation
 */
export interface ITransactionRepository {
  create(input: CreateTransactionInput): Promise<Transaction>;

  findById(transactionId: number): Promise<Transaction | null>;

  /**
   * Find the compensating record of a transfer, if one exists
   */
  findReversalOf(transactionId: number): Promise<Transaction | null>;

  /**
   * Transactions touching an account (either side), newest first
   * @param cursor - opaque cursor returned as nextCursor by the previous page
   */
  findByAccountId(
    accountId: number,
    limit: number,
    cursor?: string
  ): Promise<{ transactions: Transaction[]; nextCursor: string | null; hasMore: boolean }>;
}
