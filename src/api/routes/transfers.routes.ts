import { Router } from 'express';
import * as transfersController from '@/controllers/transfers.controller';
import { requireSession } from '@/middlewares/session';
import { csrfProtection } from '@/middlewares/csrf';

const router = Router();

/**
 * POST /api/v1/transfers
 */
router.post('/', requireSession, csrfProtection, transfersController.createTransfer);

export default router;
