/**
 * Error hierarchy for pipeline runs.
 *
 * Every fatal condition of a run is one of these classes. The `category` is what
 * processing reports and the CLI expose; the class carries the details.
 */

export type PipelineErrorCategory =
  | 'input'
  | 'not-found'
  | 'empty-batch'
  | 'no-data-for-period'
  | 'storage'
  | 'network'
  | 'config'
  | 'unexpected';

export abstract class PipelineError extends Error {
  abstract readonly category: PipelineErrorCategory;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
  }

  toJSON() {
    return {
      category: this.category,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * No raw snapshot exists for the requested date
 */
export class SnapshotNotFoundError extends PipelineError {
  readonly category = 'not-found' as const;

  constructor(
    public readonly date: string,
    public readonly path: string
  ) {
    super(`No snapshot found for ${date} (looked in ${path})`, { date, path });
  }
}

/**
 * Raw snapshot exists but is structurally invalid (missing fields, bad JSON)
 */
export class MalformedSnapshotError extends PipelineError {
  readonly category = 'input' as const;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, { issues });
  }
}

/**
 * A caller passed an argument the pipeline cannot work with (bad date, empty window)
 */
export class InvalidInputError extends PipelineError {
  readonly category = 'input' as const;
}

/**
 * Validation left nothing to aggregate
 */
export class EmptyBatchError extends PipelineError {
  readonly category = 'empty-batch' as const;
}

/**
 * None of the dates in an aggregation window had silver data
 */
export class NoDataForPeriodError extends PipelineError {
  readonly category = 'no-data-for-period' as const;

  constructor(
    public readonly startDate: string,
    public readonly endDate: string
  ) {
    super(`No data found for period ${startDate} to ${endDate}`, { endDate, startDate });
  }
}

export class StorageError extends PipelineError {
  readonly category = 'storage' as const;
}

export class ConfigError extends PipelineError {
  readonly category = 'config' as const;
}

/**
 * Anything that escaped the typed paths above
 */
export class UnexpectedError extends PipelineError {
  readonly category = 'unexpected' as const;
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Category of any error, treating non-pipeline errors as unexpected
 */
export function getErrorCategory(error: unknown): PipelineErrorCategory {
  return isPipelineError(error) ? error.category : 'unexpected';
}

/**
 * Message of a thrown value, whatever was thrown
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
