import dotenv from 'dotenv';
import { loadConfig, ConfigError, type AppConfig } from '../../config.js';
import { createPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { NoteRepo } from '../db/noteRepo.js';
import { configureLogger, describeError, logger } from '../logger.js';
import { createApp } from './app.js';

dotenv.config();

// Fail fast: a missing JWT_SECRET never falls back to a built-in value
function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('server', error.message);
      process.exit(1);
    }
    throw error;
  }
}

function start(): void {
  const config = readConfig();
  configureLogger({ level: config.logLevel, json: config.env === 'production' });

  if (!config.databaseUrl) {
    logger.error('server', 'DATABASE_URL environment variable is required');
    process.exit(1);
  }

  const pool = createPool(config.databaseUrl);
  const app = createApp({
    token: config.token,
    users: new UserRepo(pool),
    notes: new NoteRepo(pool),
    checkDatabase: () => pool.query('SELECT 1'),
  });

  const server = app.listen(config.port, () => {
    logger.info('server', `Server running on http://localhost:${config.port}`, {
      docs: `http://localhost:${config.port}/docs`,
      tokenTtlMinutes: config.token.ttlMinutes,
    });
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info('server', `Received ${signal}, shutting down`);
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('server', 'Failed to close database pool', describeError(error));
          process.exit(1);
        });
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

start();
