#!/usr/bin/env node
/**
 * @arch testsmith.cli.entry
 */
import { createCli } from './cli/index.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from './utils/errors.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(getErrorMessage(error));
    process.exit(1);
  });
