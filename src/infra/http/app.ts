import express, { Express } from 'express';
import { createLedgerRoutes } from './routes/ledger.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { LedgerServices } from '../container.js';

export interface AppOptions {
  services: LedgerServices;
  jwtSecret: string;
  /** Rejects when the backing store does not answer. */
  checkHealth: () => Promise<void>;
  rateLimitPerMinute?: number;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(createApiRateLimiter(options.rateLimitPerMinute));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    withTimeout(options.checkHealth(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(503).json({
          code: 'STORE_UNAVAILABLE',
          message: 'Ledger store unavailable',
        });
      });
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  // Ledger routes (protected)
  app.use('/api', createLedgerRoutes(options.services, options.jwtSecret));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
