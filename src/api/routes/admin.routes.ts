import { Router } from 'express';
import * as adminController from '@/controllers/admin.controller';
import { requireSession } from '@/middlewares/session';
import { csrfProtection } from '@/middlewares/csrf';
import { requireAdmin } from '@/middlewares/authorization';

const router = Router();

// Session, then CSRF (state-changing methods only), then role
router.use(requireSession, csrfProtection, requireAdmin);

router.get('/users', adminController.listUsers);
router.get('/users/:userId/login-attempts', adminController.getLoginAttempts);
router.post('/users/:userId/unlock', adminController.unlockUser);
router.post('/users/:userId/status', adminController.setUserStatus);
router.post('/users/:userId/password', adminController.resetUserPassword);

router.post('/accounts/:accountId/status', adminController.setAccountStatus);
router.post('/accounts/:accountId/deposits', adminController.createDeposit);

router.post('/transactions/:transactionId/reversal', adminController.reverseTransaction);

export default router;
