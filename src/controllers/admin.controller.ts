import { Request, Response, NextFunction } from 'express';
import { adminService, transactionService } from '@/config/dependencies';
import {
  listUsersQuerySchema,
  loginAttemptsQuerySchema,
  userStatusSchema,
  resetPasswordSchema,
  accountStatusSchema,
  reversalSchema,
} from '@/validators/admin.validator';
import { depositSchema } from '@/validators/transfer.validator';
import { parseIdParam, validate } from '@/validators/validate';
import { requireAuth } from '@/middlewares/session';
import { getClientContext, getClientIp } from '@/utils/clientIp';

/**
 * Admin Controller
 * Every route here sits behind requireAdmin
 */

/**
 * GET /api/v1/admin/users?search=&limit=&offset=
 */
export async function listUsers(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query = validate(listUsersQuerySchema, req.query, 'Invalid query parameters');
    const result = await adminService.listUsers(query);

    res.json({ success: true, ...result });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/admin/users/:userId/login-attempts
 */
export async function getLoginAttempts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const userId = parseIdParam(req.params.userId, 'user ID');
    const { limit } = validate(loginAttemptsQuerySchema, req.query, 'Invalid query parameters');
    const result = await adminService.getLoginAttempts(userId, limit);

    res.json({ success: true, ...result });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/users/:userId/unlock
 */
export async function unlockUser(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const admin = requireAuth(req);
    const userId = parseIdParam(req.params.userId, 'user ID');
    const lockState = await adminService.unlockUser(userId, admin, getClientContext(req));

    res.json({ success: true, lockState });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/users/:userId/status
 */
export async function setUserStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const admin = requireAuth(req);
    const userId = parseIdParam(req.params.userId, 'user ID');
    const { isActive } = validate(userStatusSchema, req.body, 'Invalid status data');
    const user = await adminService.setUserActive(userId, isActive, admin);

    res.json({ success: true, user });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/users/:userId/password
 */
export async function resetUserPassword(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const admin = requireAuth(req);
    const userId = parseIdParam(req.params.userId, 'user ID');
    const { newPassword } = validate(resetPasswordSchema, req.body, 'Invalid password data');
    await adminService.resetPassword(userId, newPassword, admin, getClientContext(req));

    res.json({ success: true });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/accounts/:accountId/status
 */
export async function setAccountStatus(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const admin = requireAuth(req);
    const accountId = parseIdParam(req.params.accountId, 'account ID');
    const { status } = validate(accountStatusSchema, req.body, 'Invalid status data');
    const account = await adminService.setAccountStatus(accountId, status, admin);

    res.json({ success: true, account });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/accounts/:accountId/deposits
 */
export async function createDeposit(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const admin = requireAuth(req);
    const accountId = parseIdParam(req.params.accountId, 'account ID');
    const { amount, description } = validate(depositSchema, req.body, 'Invalid deposit data');
    const result = await transactionService.deposit(accountId, amount, description, {
      userId: admin.userId,
      ipAddress: getClientIp(req),
    });

    res.status(201).json({ success: true, ...result });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/admin/transactions/:transactionId/reversal
 */
export async function reverseTransaction(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const admin = requireAuth(req);
    const transactionId = parseIdParam(req.params.transactionId, 'transaction ID');
    const { reason } = validate(reversalSchema, req.body, 'Invalid reversal data');
    const result = await transactionService.reverse(transactionId, reason, {
      userId: admin.userId,
      ipAddress: getClientIp(req),
    });

    res.status(201).json({ success: true, ...result });
  } catch (error) {
    next(error);
  }
}
