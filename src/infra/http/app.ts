import express from 'express';
import { AuthDependencies } from '../di/injection.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';
import { createAuthRoutes } from './routes/auth.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { TokenOptions } from './token.js';

export interface AppOptions {
  token: TokenOptions;
  /** Serve swagger UI at /docs. */
  docs?: boolean;
}

export function createApp(deps: AuthDependencies, options: AppOptions): express.Express {
  const app = express();

  app.use(express.json());
  app.use(createApiRateLimiter());

  app.use(createHealthRoutes(deps));

  if (options.docs ?? true) {
    app.use(createSwaggerRoutes());
  }

  app.use('/api/auth', createAuthRoutes(deps, options.token));

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
