import { BusinessRuleError } from './BusinessRuleError';

/**
 * Transfer failures (422)
 *
 * transactionId is set when the engine persisted a `failed` audit record,
 * so callers can tell "nothing happened" from "attempted and failed".
 */
export abstract class TransferError extends BusinessRuleError {
  public readonly transactionId?: number;

  protected constructor(message: string, code: string, transactionId?: number) {
    super(message, code);
    this.transactionId = transactionId;
    Object.setPrototypeOf(this, TransferError.prototype);
  }

  public override details(): Record<string, unknown> {
    return this.transactionId === undefined ? {} : { transactionId: this.transactionId };
  }
}

export class InsufficientFundsError extends TransferError {
  constructor(transactionId?: number) {
    super('Insufficient funds', 'INSUFFICIENT_FUNDS', transactionId);
    Object.setPrototypeOf(this, InsufficientFundsError.prototype);
  }
}

export class AccountInactiveError extends TransferError {
  constructor(transactionId?: number) {
    super('Account is not active', 'ACCOUNT_INACTIVE', transactionId);
    Object.setPrototypeOf(this, AccountInactiveError.prototype);
  }
}

export class InvalidDestinationError extends TransferError {
  constructor() {
    super('Destination account not found', 'INVALID_DESTINATION');
    Object.setPrototypeOf(this, InvalidDestinationError.prototype);
  }
}

export class SelfTransferError extends TransferError {
  constructor() {
    super('Cannot transfer to the same account', 'SELF_TRANSFER');
    Object.setPrototypeOf(this, SelfTransferError.prototype);
  }
}
