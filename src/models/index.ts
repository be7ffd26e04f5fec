/**
 * Central export point for all models
 * Allows clean imports: import { Account, User } from '@/models'
 */

export * from './User';
export * from './Account';
export * from './Transaction';
export * from './LoginAttempt';
export * from './Session';
