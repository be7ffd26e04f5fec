import { Router } from 'express';
import * as accountsController from '@/controllers/accounts.controller';
import { requireSession } from '@/middlewares/session';
import { csrfProtection } from '@/middlewares/csrf';

const router = Router();

router.use(requireSession, csrfProtection);

/**
 * GET /api/v1/accounts
 */
router.get('/', accountsController.listAccounts);

/**
 * POST /api/v1/accounts
 * Open a checking or savings account
 */
router.post('/', accountsController.openAccount);

/**
 * GET /api/v1/accounts/:accountId/transactions
 */
router.get('/:accountId/transactions', accountsController.getAccountTransactions);

export default router;
