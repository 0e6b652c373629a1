#!/usr/bin/env node
import { createProgram } from './cli';
import { logger } from './core/logger';
import { getErrorMessage } from './core/errors';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Fatal error');
    console.error(`[!] Fatal error: ${getErrorMessage(error)}`);
    process.exit(1);
  });
