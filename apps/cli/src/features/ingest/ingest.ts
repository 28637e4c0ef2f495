import type { PipelineError } from '@fxlake/core';
import type { IngestionResult } from '@fxlake/ingestion';
import type { Command } from 'commander';
import { err, type Result } from 'neverthrow';

import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { IngestCommandOptionsSchema, type IngestCommandOptions } from '../shared/schemas.js';
import { isJsonFlagSet, toError } from '../shared/utils.js';

import { formatIngestionSummary } from './ingest-utils.js';

export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Fetch the latest rates for a base currency and store them as the raw snapshot')
    .option('--currency <code>', 'Base currency (default: USD)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeIngestCommand(rawOptions);
    });
}

async function executeIngestCommand(rawOptions: unknown): Promise<void> {
  const validationResult = IngestCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonFlagSet(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('ingest', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options: IngestCommandOptions = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');
  output.intro('fxlake ingest');
  const spinner = output.spinner();
  spinner?.start(`Fetching latest ${options.currency} rates...`);

  try {
    const result = await runCommand(async (ctx): Promise<Result<IngestionResult, PipelineError>> => {
      const ingester = ctx.snapshotIngester();
      if (ingester.isErr()) {
        return err(ingester.error);
      }
      return ingester.value.collectDailyRates({ baseCurrency: options.currency });
    });

    if (result.isErr()) {
      spinner?.stop('Ingestion failed');
      output.error('ingest', result.error);
      return;
    }

    spinner?.stop('Rates fetched');
    output.note(formatIngestionSummary(result.value), 'Raw snapshot');
    output.outro('Ingestion complete');
    output.json('ingest', result.value);
  } catch (error) {
    spinner?.stop('Ingestion failed');
    output.error('ingest', toError(error));
  }
}
