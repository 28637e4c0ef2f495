import type { Command } from 'commander';

import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { AggregateCommandOptionsSchema } from '../shared/schemas.js';
import { isJsonFlagSet, ReportedFailure, todayUtc, toError } from '../shared/utils.js';

import { formatAggregationSummary } from './aggregate-utils.js';

export function registerAggregateCommand(program: Command): void {
  program
    .command('aggregate')
    .description('Build gold analytics from the silver days ending at a date')
    .option('--date <YYYY-MM-DD>', 'Last day of the window (default: today, UTC)')
    .option('--days-back <days>', 'Window length in days (default: 7)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeAggregateCommand(rawOptions);
    });
}

async function executeAggregateCommand(rawOptions: unknown): Promise<void> {
  const validationResult = AggregateCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonFlagSet(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('aggregate', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const date = options.date ?? todayUtc();
  const output = new OutputManager(options.json ? 'json' : 'text');
  output.intro('fxlake aggregate');
  const spinner = output.spinner();
  spinner?.start(`Aggregating ${options.daysBack} day(s) ending ${date}...`);

  try {
    const report = await runCommand((ctx) =>
      ctx.aggregationService().processDate(date, { daysBack: options.daysBack })
    );

    if (report.status === 'error') {
      spinner?.stop('Aggregation failed');
      output.error('aggregate', new ReportedFailure(report));
      return;
    }

    spinner?.stop('Gold layer written');
    if (report.processing.daysSkipped.length > 0) {
      output.warn(`No silver data for: ${report.processing.daysSkipped.join(', ')}`);
    }
    output.note(formatAggregationSummary(report), 'Gold layer');
    output.outro('Aggregation complete');
    output.json('aggregate', report);
  } catch (error) {
    spinner?.stop('Aggregation failed');
    output.error('aggregate', toError(error));
  }
}
