import { AppError } from './AppError';

/**
 * Business Rule Error (422 Unprocessable Entity)
 * Thrown when request is valid but violates business rules
 * Examples: second active savings account, disabling the last administrator
 */
export class BusinessRuleError extends AppError {
  constructor(message: string, code: string = 'BUSINESS_RULE_VIOLATION') {
    super(message, 422, code);
    Object.setPrototypeOf(this, BusinessRuleError.prototype);
  }
}
