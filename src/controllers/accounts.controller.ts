import { Request, Response, NextFunction } from 'express';
import { accountService, transactionService } from '@/config/dependencies';
import { openAccountSchema, transactionHistoryQuerySchema } from '@/validators/account.validator';
import { parseIdParam, validate } from '@/validators/validate';
import { requireAuth } from '@/middlewares/session';

/**
 * Accounts Controller
 */

/**
 * GET /api/v1/accounts
 * Accounts owned by the caller
 */
export async function listAccounts(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const auth = requireAuth(req);
    const accounts = await accountService.listAccounts(auth.userId);

    res.json({ success: true, accounts });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/accounts
 */
export async function openAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const auth = requireAuth(req);
    const { accountType } = validate(openAccountSchema, req.body, 'Invalid account data');
    const account = await accountService.openAccount(auth.userId, accountType);

    res.status(201).json({ success: true, account });
  } catch (error) {
    next(error);
  }
}

/**
 * GET /api/v1/accounts/:accountId/transactions?limit=50&cursor=...
 * Unknown accounts and accounts of other users both answer 404
 */
export async function getAccountTransactions(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const auth = requireAuth(req);
    const accountId = parseIdParam(req.params.accountId, 'account ID');
    const { limit, cursor } = validate(transactionHistoryQuerySchema, req.query, 'Invalid pagination parameters');

    const page = await transactionService.listAccountTransactions(accountId, auth, limit, cursor);

    res.json({ success: true, ...page });
  } catch (error) {
    next(error);
  }
}
