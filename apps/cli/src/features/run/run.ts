import type { Command } from 'commander';

import { formatAggregationSummary } from '../aggregate/aggregate-utils.js';
import { formatIngestionSummary } from '../ingest/ingest-utils.js';
import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { RunCommandOptionsSchema } from '../shared/schemas.js';
import { isJsonFlagSet, todayUtc, toError } from '../shared/utils.js';
import { formatValidationSummary } from '../validate/validate-utils.js';

import { checkRunDate, PipelineRunHandler, stageRunnersFor, type PipelineRunResult } from './run-handler.js';

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the pipeline stages for one date: ingest, validate, aggregate')
    .option('--stage <stage>', 'Stage to run: all, ingest, validate or aggregate (default: all)')
    .option('--date <YYYY-MM-DD>', 'Target date (default: today, UTC); other dates need --stage validate or aggregate')
    .option('--currency <code>', 'Base currency to ingest (default: USD)')
    .option('--days-back <days>', 'Aggregation window in days (default: 7)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeRunCommand(rawOptions);
    });
}

async function executeRunCommand(rawOptions: unknown): Promise<void> {
  const validationResult = RunCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonFlagSet(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('run', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const today = todayUtc();
  const date = options.date ?? today;
  const output = new OutputManager(options.json ? 'json' : 'text');

  const dateCheck = checkRunDate({ date, stage: options.stage }, today);
  if (dateCheck.isErr()) {
    output.error('run', dateCheck.error, ExitCodes.INVALID_ARGS);
    return;
  }
  output.intro(`fxlake run (${options.stage})`);
  const spinner = output.spinner();
  spinner?.start(`Running pipeline for ${date}...`);

  try {
    const result = await runCommand((ctx) =>
      new PipelineRunHandler(stageRunnersFor(ctx)).execute({
        stage: options.stage,
        date,
        baseCurrency: options.currency,
        daysBack: options.daysBack,
      })
    );

    if (result.isErr()) {
      spinner?.stop('Pipeline failed');
      showCompletedStages(output, result.error.completed);
      output.error('run', result.error);
      return;
    }

    spinner?.stop(`Stages completed: ${result.value.stagesRun.join(', ')}`);
    showCompletedStages(output, result.value);
    output.outro('Pipeline complete');
    output.json('run', result.value);
  } catch (error) {
    spinner?.stop('Pipeline failed');
    output.error('run', toError(error));
  }
}

function showCompletedStages(output: OutputManager, result: PipelineRunResult): void {
  if (result.ingestion) {
    output.note(formatIngestionSummary(result.ingestion), 'Raw snapshot');
  }
  if (result.validation) {
    output.note(formatValidationSummary(result.validation), 'Silver layer');
  }
  if (result.aggregation) {
    output.note(formatAggregationSummary(result.aggregation), 'Gold layer');
  }
}
