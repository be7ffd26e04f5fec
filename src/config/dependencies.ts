/**
 * Dependency Container
 * Instantiates and wires all repositories and services
 *
 * This is the single source of truth for dependency injection.
 * All concrete implementations are created here and injected into services.
 * Integration tests replace this module with an in-memory container.
 */

import Redis from 'ioredis';
import { env } from '@/config/env';

// Repository implementations
import { UserRepository } from '@/repositories/user.repository';
import { AccountRepository } from '@/repositories/account.repository';
import { TransactionRepository } from '@/repositories/transaction.repository';
import { LoginAttemptRepository } from '@/repositories/loginAttempt.repository';
import { SessionRepository } from '@/repositories/session.repository';
import { PgUnitOfWork } from '@/repositories/unitOfWork';

// Adapters
import { IRateLimitStore } from '@/interfaces/IRateLimitStore';
import { MemoryRateLimitStore } from '@/adapters/rateLimit/MemoryRateLimitStore';
import { RedisRateLimitStore } from '@/adapters/rateLimit/RedisRateLimitStore';
import { metrics } from '@/adapters/metrics/MetricsFactory';

// Service implementations
import { initializeEncryption } from '@/services/encryption.service';
import { CredentialService } from '@/services/credential.service';
import { LockoutService } from '@/services/lockout.service';
import { CsrfService } from '@/services/csrf.service';
import { SessionService } from '@/services/session.service';
import { RateLimiterService } from '@/services/rateLimiter.service';
import { TransactionService } from '@/services/transaction.service';
import { AuthService } from '@/services/auth.service';
import { AccountService } from '@/services/account.service';
import { AdminService } from '@/services/admin.service';

// ============================================================================
// PROCESS-WIDE STATE
// ============================================================================

/**
 * Encryption key is loaded here, before any route module can run.
 * Throws (and aborts startup) when ENCRYPTION_KEY is too short.
 */
export const encryptionService = initializeEncryption(env.ENCRYPTION_KEY);

/**
 * Rate limit counters
 * memory = this process only; redis = shared by every instance
 */
export const rateLimitStore: IRateLimitStore =
  env.RATE_LIMIT_STORE === 'redis'
    ? new RedisRateLimitStore(new Redis(env.REDIS_URL, { maxRetriesPerRequest: 2 }))
    : new MemoryRateLimitStore();

// ============================================================================
// REPOSITORIES
// ============================================================================

export const unitOfWork = new PgUnitOfWork();
export const userRepository = new UserRepository();
export const accountRepository = new AccountRepository();
export const transactionRepository = new TransactionRepository();
export const loginAttemptRepository = new LoginAttemptRepository();
export const sessionRepository = new SessionRepository();

// ============================================================================
// SERVICES
// ============================================================================

export const credentialService = new CredentialService(userRepository, encryptionService);

export const lockoutService = new LockoutService(unitOfWork, loginAttemptRepository);

export const csrfService = new CsrfService(sessionRepository);

export const sessionService = new SessionService(sessionRepository, userRepository, csrfService);

export const rateLimiterService = new RateLimiterService(rateLimitStore);

/**
 * Transaction Engine
 * Transfers, deposits, reversals and account history
 */
export const transactionService = new TransactionService(
  unitOfWork,
  accountRepository,
  transactionRepository,
  encryptionService,
  metrics
);

export const authService = new AuthService(
  unitOfWork,
  credentialService,
  lockoutService,
  sessionService,
  csrfService,
  encryptionService,
  metrics
);

export const accountService = new AccountService(accountRepository);

export const adminService = new AdminService(
  unitOfWork,
  userRepository,
  accountRepository,
  loginAttemptRepository,
  credentialService,
  lockoutService,
  sessionService,
  encryptionService
);
