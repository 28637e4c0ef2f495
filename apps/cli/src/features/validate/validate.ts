import type { Command } from 'commander';

import { runCommand } from '../shared/command-runtime.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { OutputManager } from '../shared/output.js';
import { ValidateCommandOptionsSchema } from '../shared/schemas.js';
import { isJsonFlagSet, ReportedFailure, todayUtc, toError } from '../shared/utils.js';

import { formatValidationSummary } from './validate-utils.js';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate the raw snapshot of a date into the silver layer')
    .option('--date <YYYY-MM-DD>', 'Snapshot date (default: today, UTC)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeValidateCommand(rawOptions);
    });
}

async function executeValidateCommand(rawOptions: unknown): Promise<void> {
  const validationResult = ValidateCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonFlagSet(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    output.error('validate', new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
    return;
  }

  const options = validationResult.data;
  const date = options.date ?? todayUtc();
  const output = new OutputManager(options.json ? 'json' : 'text');
  output.intro('fxlake validate');
  const spinner = output.spinner();
  spinner?.start(`Validating snapshot for ${date}...`);

  try {
    const report = await runCommand((ctx) => ctx.validationService().processDate(date));

    if (report.status === 'error') {
      spinner?.stop('Validation failed');
      output.error('validate', new ReportedFailure(report));
      return;
    }

    spinner?.stop('Snapshot validated');
    output.note(formatValidationSummary(report), 'Silver layer');
    output.outro('Validation complete');
    output.json('validate', report);
  } catch (error) {
    spinner?.stop('Validation failed');
    output.error('validate', toError(error));
  }
}
