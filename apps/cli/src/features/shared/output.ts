import * as p from '@clack/prompts';
import { isPipelineError } from '@fxlake/core';
import { flushLoggers, getLogger, setLoggerTransports } from '@fxlake/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { exitCodeForCategory, ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again.\nRun with --help for usage information.',
  CONFIG_ERROR: 'Set EXCHANGE_API_KEY in your .env file or environment.',
  NOT_FOUND: 'Run `fxlake ingest` (and `fxlake validate`) for the date first, or pick another --date.',
  NETWORK_ERROR: 'The rates provider could not be reached. Check your connection and API key, then retry.',
};

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {
    if (format === 'json') {
      // stdout carries the JSON response only
      setLoggerTransports({ console: false });
    }
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const duration_ms = Date.now() - this.startTime;
      const response = createSuccessResponse(command, data, {
        duration_ms,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit. Pipeline errors pick their exit code from
   * their category unless one is given.
   */
  error(command: string, error: Error, exitCode?: ExitCode): never {
    const category = isPipelineError(error) ? error.category : undefined;
    const resolvedExitCode = exitCode ?? (category ? exitCodeForCategory(category) : ExitCodes.GENERAL_ERROR);
    const errorCode = exitCodeToErrorCode(resolvedExitCode);

    if (this.format === 'json') {
      // In JSON mode, write to stdout (not stderr) so callers can parse the response
      console.log(JSON.stringify(createErrorResponse(command, error, errorCode, category), undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    flushLoggers();
    process.exit(resolvedExitCode);
  }

  /**
   * Display a spinner (only in text mode).
   */
  spinner(): ReturnType<typeof p.spinner> | undefined {
    if (this.format === 'json') {
      return undefined;
    }
    return p.spinner();
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      p.note(tip, 'Tip');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
