#!/usr/bin/env node
import './env-setup.js';

import { flushLoggers, getLogger } from '@bankwire/logger';

import { configureCliLogging } from './features/shared/command-execution.js';
import { createProgram } from './program.js';

// Replaced per command once --verbose and --log-file are known
configureCliLogging({});

const logger = getLogger('CLI');

async function main() {
  await createProgram().parseAsync();
  flushLoggers();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  flushLoggers();
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  flushLoggers();
  process.exit(1);
});

main().catch((error) => {
  logger.error(`CLI failed: ${String(error)}`);
  flushLoggers();
  process.exit(1);
});
