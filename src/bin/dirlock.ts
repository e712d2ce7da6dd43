#!/usr/bin/env node
import { runCli } from '../cli.js';
import { logger } from '../shared/logging/logger.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.fatal({ err }, 'dirlock failed');
    process.exitCode = 1;
  }
);
