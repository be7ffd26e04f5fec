import { AccountStatus, AccountType } from '@/constants/banking';

/**
 * Account model
 * Matches the 'accounts' table schema
 */
export interface Account {
  id: number;
  userId: number;
  accountNumber: string;
  accountType: AccountType;
  balance: string; // NUMERIC from DB (returns as string for precision)
  status: AccountStatus;
  createdAt: Date;
}

/**
 * Account creation input
 */
export interface CreateAccountInput {
  userId: number;
  accountNumber: string;
  accountType: AccountType;
}
