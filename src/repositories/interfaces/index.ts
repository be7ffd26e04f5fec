/**
 * Repository Interfaces
 * Barrel export for all repository interface contracts
 */

export * from './IUserRepository';
export * from './IAccountRepository';
export * from './ITransactionRepository';
export * from './ILoginAttemptRepository';
export * from './ISessionRepository';
export * from './IUnitOfWork';
