import { z } from 'zod';
import { ACCOUNT_STATUSES } from '@/constants/banking';
import { PAGINATION_LIMITS, PASSWORD_POLICY, TRANSFER_LIMITS } from '@/config/businessRules';

export const listUsersQuerySchema = z.object({
  search: z.string().trim().max(100).optional(),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(PAGINATION_LIMITS.MAX_PAGE_SIZE)
    .default(PAGINATION_LIMITS.DEFAULT_PAGE_SIZE),
  offset: z.coerce.number().int().min(0).default(0),
});

export const loginAttemptsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(PAGINATION_LIMITS.MAX_PAGE_SIZE).default(20),
});

export const userStatusSchema = z.object({
  isActive: z.boolean(),
});

export const resetPasswordSchema = z.object({
  newPassword: z.string().max(PASSWORD_POLICY.MAX_LENGTH),
});

export const accountStatusSchema = z.object({
  status: z.enum([ACCOUNT_STATUSES.ACTIVE, ACCOUNT_STATUSES.DISABLED]),
});

export const reversalSchema = z.object({
  reason: z
    .string()
    .max(TRANSFER_LIMITS.MAX_DESCRIPTION_LENGTH * 4)
    .optional()
    .nullable(),
});

export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
