import Decimal from 'decimal.js';
import { TRANSFER_LIMITS } from '@/config/businessRules';
import { ValidationError } from '@/errors';

/**
 * Parse a monetary amount from user input
 *
 * Accepts a number or a numeric string. The amount must be positive, have at
 * most two decimal places and not exceed the per-transfer maximum.
 *
 * @returns the amount as a Decimal
 * @throws ValidationError when any rule fails
 */
export function parseAmount(input: string | number): Decimal {
  let amount: Decimal;
  try {
    amount = new Decimal(typeof input === 'string' ? input.trim() : input);
  } catch {
    throw new ValidationError('Amount must be a valid number');
  }

  if (!amount.isFinite()) {
    throw new ValidationError('Amount must be a valid number');
  }
  if (amount.lte(0)) {
    throw new ValidationError('Amount must be positive');
  }
  if (amount.decimalPlaces() > TRANSFER_LIMITS.AMOUNT_SCALE) {
    throw new ValidationError(`Amount must have at most ${TRANSFER_LIMITS.AMOUNT_SCALE} decimal places`);
  }
  if (amount.gt(TRANSFER_LIMITS.MAX_TRANSFER_AMOUNT)) {
    throw new ValidationError(`Amount cannot exceed ${TRANSFER_LIMITS.MAX_TRANSFER_AMOUNT}`);
  }

  return amount;
}

/**
 * Render a Decimal in the canonical NUMERIC(15,2) form ("1234.50")
 */
export function formatAmount(amount: Decimal): string {
  return amount.toFixed(TRANSFER_LIMITS.AMOUNT_SCALE);
}
