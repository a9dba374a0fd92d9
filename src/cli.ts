#!/usr/bin/env node

/**
 * linestat CLI
 */

import { errorMessage, logger } from './core/index.js';
import { createProgram } from './cli/program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(errorMessage(error));
    process.exitCode = 1;
  });
