/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './NotFoundError';
export * from './BusinessRuleError';
export * from './AuthErrors';
export * from './SessionErrors';
export * from './RateLimitExceededError';
export * from './TransferErrors';
export * from './DecryptionError';
