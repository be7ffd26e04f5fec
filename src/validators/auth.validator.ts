import { z } from 'zod';
import { PASSWORD_POLICY } from '@/config/businessRules';

/**
 * Registration payload
 *
 * Password strength rules are checked by the credential store so that the
 * response can list every unmet rule (WEAK_PASSWORD); here only the shape
 * and the hard length cap are enforced.
 */
export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(3, { message: 'Username must be at least 3 characters long' })
    .max(80, { message: 'Username cannot exceed 80 characters' })
    .regex(/^[A-Za-z0-9_]+$/, {
      message: 'Username may only contain letters, numbers and underscores',
    }),
  email: z.string().trim().toLowerCase().email().max(255),
  password: z.string().max(PASSWORD_POLICY.MAX_LENGTH),
  fullName: z.string().trim().min(2, { message: 'Full name must be at least 2 characters long' }).max(255),
  phone: z
    .string()
    .trim()
    .regex(/^\+?[0-9 ()-]{6,20}$/, { message: 'Invalid phone number' })
    .optional()
    .nullable(),
});

/**
 * Login payload
 * No policy checks: a wrong-but-weak password is still just a failed attempt
 */
export const loginSchema = z.object({
  username: z.string().trim().min(1).max(80),
  password: z.string().min(1).max(PASSWORD_POLICY.MAX_LENGTH),
});

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1).max(PASSWORD_POLICY.MAX_LENGTH),
  newPassword: z.string().max(PASSWORD_POLICY.MAX_LENGTH),
});

export type RegisterInput = z.infer<typeof registerSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
