#!/usr/bin/env tsx
import 'dotenv/config';

import { flushLoggers, getLogger } from '@fxlake/logger';
import { Command } from 'commander';

import { registerAggregateCommand } from './features/aggregate/aggregate.js';
import { registerIngestCommand } from './features/ingest/ingest.js';
import { registerRunCommand } from './features/run/run.js';
import { registerValidateCommand } from './features/validate/validate.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('fxlake')
    .description('Daily exchange-rate lake: ingestion, validation and trend analytics')
    .version('1.0.0');

  // Raw layer: fetch and store the provider snapshot
  registerIngestCommand(program);

  // Silver layer: normalize, validate and score a snapshot
  registerValidateCommand(program);

  // Gold layer: daily metrics, trends, summaries and market overview
  registerAggregateCommand(program);

  // All of the above for one date
  registerRunCommand(program);

  await program.parseAsync();
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

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  flushLoggers();
  process.exit(1);
});
