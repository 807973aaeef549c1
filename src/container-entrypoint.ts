#!/usr/bin/env node
/**
 * Container Entrypoint
 * Main entry point for the Docker container
 */

import { runEntrypoint } from './main.js';
import { EXIT_CODES } from './core/errors.js';
import { logger } from './core/logger.js';

process.on('uncaughtException', (err: Error) => {
  logger.error('Uncaught exception', { error: err.message, stack: err.stack });
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', {
    error: reason instanceof Error ? reason.message : String(reason),
  });
});

runEntrypoint(process.env)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((err: unknown) => {
    logger.error('Supervisor failure', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(EXIT_CODES.SUPERVISOR_FAILURE);
  });
