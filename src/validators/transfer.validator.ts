import { z } from 'zod';
import { ACCOUNT_NUMBER_LENGTH } from '@/constants/banking';
import { TRANSFER_LIMITS } from '@/config/businessRules';

/**
 * Monetary amount as sent by clients
 * Accepts a JSON number or a decimal string; scale and range are checked by
 * parseAmount so both forms share one set of messages.
 */
export const amountSchema = z.union([
  z.number().finite(),
  z.string().trim().regex(/^\d+(\.\d+)?$/, { message: 'Amount must be a valid number' }),
]);

const descriptionSchema = z
  .string()
  .max(TRANSFER_LIMITS.MAX_DESCRIPTION_LENGTH * 4)
  .optional()
  .nullable();

/**
 * Transfer creation validation schema
 *
 * - Destination is addressed by account number, source by id (must be owned)
 * - Description is optional; control characters are stripped and the result
 *   capped at MAX_DESCRIPTION_LENGTH before encryption
 */
export const transferSchema = z.object({
  sourceAccountId: z.number().int().positive(),
  destinationAccountNumber: z
    .string()
    .trim()
    .regex(new RegExp(`^\\d{${ACCOUNT_NUMBER_LENGTH}}$`), {
      message: `Destination account number must be exactly ${ACCOUNT_NUMBER_LENGTH} digits`,
    }),
  amount: amountSchema,
  description: descriptionSchema,
});

/**
 * Administrator deposit (cash-in)
 */
export const depositSchema = z.object({
  amount: amountSchema,
  description: descriptionSchema,
});

export type TransferRequest = z.infer<typeof transferSchema>;
export type DepositRequest = z.infer<typeof depositSchema>;
