import express from 'express';
import { TokenService } from '../../domain/auth/token.js';
import { UserStore } from '../../application/users/userStore.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';

export interface AppDeps {
  userStore: UserStore;
  tokenService: TokenService;
  /** Resolves when the database answers. */
  healthCheck: () => Promise<unknown>;
}

const HEALTH_TIMEOUT_MS = 2000;

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

export function createApp({ userStore, tokenService, healthCheck }: AppDeps): express.Application {
  const app = express();

  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withTimeout(healthCheck(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.use(createSwaggerRoutes());
  app.use(createUserRoutes({ userStore, tokenService }));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
