import { loadConfig } from '../config.js';
import { createRuntime } from '../container.js';
import { getLogger } from '../logger.js';
import { createApp } from './app.js';

const logger = getLogger('server');

const config = loadConfig();

if (!config.jwtSecret) {
  throw new Error('JWT_SECRET environment variable is required');
}

const runtime = createRuntime(config);
const app = createApp({
  services: runtime.services,
  jwtSecret: config.jwtSecret,
  checkHealth: runtime.checkHealth,
});

// Start server
const server = app.listen(config.port, () => {
  logger.info({ port: config.port, store: config.store }, `Server running on http://localhost:${config.port}`);
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Failed to close the ledger store');
        process.exit(1);
      });
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
