import { Request, Response, NextFunction } from 'express';
import { transactionService } from '@/config/dependencies';
import { transferSchema } from '@/validators/transfer.validator';
import { validate } from '@/validators/validate';
import { requireAuth } from '@/middlewares/session';
import { getClientIp } from '@/utils/clientIp';

/**
 * POST /api/v1/transfers
 * Move funds from an account owned by the caller to any active account
 */
export async function createTransfer(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const auth = requireAuth(req);
    const input = validate(transferSchema, req.body, 'Invalid transfer data');

    const result = await transactionService.transfer(input, {
      userId: auth.userId,
      ipAddress: getClientIp(req),
    });

    res.status(201).json({ success: true, ...result });
  } catch (error) {
    next(error);
  }
}
