import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';
import swaggerUi, { JsonObject } from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// Trust exactly TRUST_PROXY_HOPS reverse proxies for req.ip
// With 0, X-Forwarded-For is ignored and clients cannot choose their rate-limit key
app.set('trust proxy', env.TRUST_PROXY_HOPS);

// Security headers
app.use(helmet());

// CORS: credentialed requests only from the configured origin
app.use(
  cors({
    origin: env.CORS_ORIGIN || false,
    credentials: env.CORS_ORIGIN !== '',
    allowedHeaders: ['Content-Type', 'X-CSRFToken'],
  })
);

// Body parsers with size limits
app.use(express.json({ limit: '10kb' }));
app.use(cookieParser());

// HTTP metrics tracking (tracks all requests except /health and /metrics)
app.use(metricsMiddleware);

// Request logging (pino-http)
app.use(requestLogger);

// ============================================
// Routes
// ============================================

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Swagger API Documentation
try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (isJsonObject(openapiDocument)) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

// API routes (mounted at /api)
app.use('/api', apiRoutes);

app.get('/', (_req, res) => {
  res.json({
    name: 'Secure Bank Core',
    version: '1.0.0',
    documentation: '/api-docs',
    endpoints: {
      health: '/api/health',
      auth: '/api/v1/auth',
      accounts: '/api/v1/accounts',
      transfers: '/api/v1/transfers',
      admin: '/api/v1/admin',
    },
  });
});

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
