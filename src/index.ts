#!/usr/bin/env node
import { main } from './cli';
import { logger } from './utils/logger';

main(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.error('Unexpected failure', { error });
    process.exitCode = 1;
  }
);
