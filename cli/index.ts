#!/usr/bin/env node
import { ConfigurationError } from '../lib/errors';
import logger from '../lib/logger';
import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof ConfigurationError) {
      logger.error({ code: err.code, cause: err.cause }, err.message);
    } else {
      logger.error({ err }, 'node-optimizer failed');
    }
    process.exitCode = 1;
  });
