import { z } from 'zod';
import { ACCOUNT_TYPES } from '@/constants/banking';
import { PAGINATION_LIMITS } from '@/config/businessRules';

export const openAccountSchema = z.object({
  accountType: z.enum([ACCOUNT_TYPES.CHECKING, ACCOUNT_TYPES.SAVINGS]),
});

/**
 * Cursor pagination query
 * Cursor is opaque to clients (see utils/cursor.ts)
 */
export const transactionHistoryQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGINATION_LIMITS.MAX_PAGE_SIZE)
    .default(PAGINATION_LIMITS.DEFAULT_PAGE_SIZE),
  cursor: z.string().max(200).optional(),
});

export type OpenAccountInput = z.infer<typeof openAccountSchema>;
export type TransactionHistoryQuery = z.infer<typeof transactionHistoryQuerySchema>;
