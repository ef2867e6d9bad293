#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Configuration comes from the YAML file named by MCP_CONFIG (optional)
 * and MCP_* environment variables, with `.env` loaded first.
 */

import 'dotenv/config';
import { createServerApp } from './app.js';
import { loadConfig } from './config.js';
import { ConfigurationError, toError } from './errors.js';
import { ConsoleLogger, createLogger } from './logger.js';

async function main(): Promise<void> {
  const config = await loadConfig({ path: process.env.MCP_CONFIG }).catch((error: unknown) => {
    new ConsoleLogger().error('Invalid configuration', toError(error));
    return process.exit(1);
  });

  const logger = createLogger(config.logging.format, config.logging.level);
  const app = createServerApp(config, logger);

  try {
    await app.start();
  } catch (error) {
    const err = toError(error);
    logger.error(err instanceof ConfigurationError ? 'Invalid configuration' : 'Failed to start server', err);
    process.exit(1);
  }

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await app.stop();
      logger.info('Server stopped successfully');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  new ConsoleLogger().error('Fatal error', toError(error));
  process.exit(1);
});
