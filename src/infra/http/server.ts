// Must stay first: the logger reads NODE_ENV and LOG_LEVEL on import.
import 'dotenv/config';
import { Server } from 'http';
import { fileURLToPath } from 'url';
import { loadConfig } from '../config.js';
import { Container } from '../di/container.js';
import { buildAuthDependencies, registerDependencies } from '../di/injection.js';
import { logger } from '../logger.js';
import { createApp } from './app.js';

/**
 * Startup wiring: config, container, dependency graph, HTTP listener.
 * Wiring errors surface here, before the port is opened.
 */
export function start(): Server {
  const config = loadConfig();
  if (config.logLevel) {
    logger.level = config.logLevel;
  }

  const container = registerDependencies(new Container(), config);
  const deps = buildAuthDependencies(container);

  const app = createApp(deps, {
    token: {
      secret: config.jwtSecret,
      expiresInSeconds: config.jwtExpiresInSeconds,
    },
  });

  const server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/healthz`);
  });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');

    server.close((closeError) => {
      if (closeError) {
        logger.error({ err: closeError }, 'HTTP server did not close cleanly');
        process.exitCode = 1;
      }
      container
        .dispose()
        .then(() => logger.info('Shutdown complete'))
        .catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to release resources');
          process.exitCode = 1;
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  return server;
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  try {
    start();
  } catch (error) {
    logger.fatal({ err: error }, 'Startup failed');
    process.exitCode = 1;
  }
}
