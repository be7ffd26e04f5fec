import { TransactionKind, TransactionStatus } from '@/constants/banking';

/**
 * Transaction model
 * Matches the 'transactions' table schema. Rows are never updated.
 */
export interface Transaction {
  id: number;
  kind: TransactionKind;
  fromAccountId: number | null; // null for deposits
  toAccountId: number;
  amount: string; // NUMERIC from DB (returns as string for precision)
  descriptionEncrypted: string | null;
  status: TransactionStatus;
  failureReason: string | null;
  reversalOf: number | null;
  initiatedBy: number;
  sourceIp: string | null;
  createdAt: Date;
}

/**
 * Transaction creation input
 */
export interface CreateTransactionInput {
  kind: TransactionKind;
  fromAccountId: number | null;
  toAccountId: number;
  amount: string;
  descriptionEncrypted: string | null;
  status: TransactionStatus;
  failureReason?: string | null;
  reversalOf?: number | null;
  initiatedBy: number;
  sourceIp?: string | null;
}

/**
 * Transaction as returned by the API
 * Description decrypted, direction relative to the viewed account
 */
export interface TransactionView {
  id: number;
  kind: TransactionKind;
  status: TransactionStatus;
  direction: 'debit' | 'credit' | 'none';
  amount: string;
  fromAccountId: number | null;
  toAccountId: number;
  description: string | null;
  failureReason: string | null;
  reversalOf: number | null;
  createdAt: Date;
}

/**
 * Result of a transfer, deposit or reversal
 */
export interface TransactionResult {
  transactionId: number;
  status: TransactionStatus;
}
