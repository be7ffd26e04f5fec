import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { metrics } from '@/adapters/metrics/MetricsFactory';
import { testConnection, closePool } from '@/config/database';
import { credentialService, rateLimitStore, sessionService } from '@/config/dependencies';
import { getEncryption } from '@/services/encryption.service';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

// Expired session rows are removed hourly; validation already rejects them
const SESSION_PURGE_INTERVAL_MS = 60 * 60 * 1000;

let server: Server | undefined;
let purgeTimer: NodeJS.Timeout | undefined;

async function purgeExpiredSessions(): Promise<void> {
  try {
    const removed = await sessionService.purgeExpired();
    if (removed > 0) {
      logger.info({ removed }, 'Expired sessions purged');
    }
  } catch (error) {
    logger.error({ error }, 'Failed to purge expired sessions');
  }
}

/**
 * Create the first administrator when ADMIN_PASSWORD is configured
 */
async function bootstrapAdmin(): Promise<void> {
  if (!env.ADMIN_PASSWORD) {
    return;
  }

  await credentialService.ensureAdmin({
    username: env.ADMIN_USERNAME,
    email: env.ADMIN_EMAIL,
    password: env.ADMIN_PASSWORD,
    fullName: 'System Administrator',
  });
}

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    logger.info('Testing database connection...');
    const dbConnected = await testConnection();

    if (!dbConnected) {
      logger.error('Failed to connect to database. Exiting...');
      process.exit(1);
    }

    // Throws when the dependency graph did not load the key
    const encryption = getEncryption();

    await bootstrapAdmin();

    server = app.listen(env.PORT, () => {
      logger.info(
        {
          port: env.PORT,
          env: env.NODE_ENV,
          rateLimitStore: env.RATE_LIMIT_STORE,
          keyFingerprint: encryption.keyFingerprint,
        },
        `Server running on http://localhost:${env.PORT}`
      );
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${env.PORT} is already in use`);
      } else {
        logger.error({ error }, 'Server error');
      }
      process.exit(1);
    });

    purgeTimer = setInterval(() => {
      void purgeExpiredSessions();
    }, SESSION_PURGE_INTERVAL_MS);
    purgeTimer.unref();
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

async function releaseResources(): Promise<void> {
  const results = await Promise.allSettled([closePool(), rateLimitStore.close(), metrics.flush()]);
  for (const result of results) {
    if (result.status === 'rejected') {
      logger.error({ error: result.reason }, 'Error releasing resources during shutdown');
    }
  }
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (purgeTimer) {
    clearInterval(purgeTimer);
  }

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('HTTP server closed');

    releaseResources()
      .then(() => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error({ error }, 'Graceful shutdown failed');
        process.exit(1);
      });
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught Exception');
  process.exit(1);
});

void startServer();
