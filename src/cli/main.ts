#!/usr/bin/env node
import { createCli } from './index.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(errorMessage(error));
    process.exit(1);
  });
