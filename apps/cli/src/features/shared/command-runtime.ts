import { AggregationService } from '@fxlake/analytics';
import type { ConfigError } from '@fxlake/core';
import { GoldRepository, LakePaths, RawSnapshotRepository, SilverRepository } from '@fxlake/data';
import { getDataDirectory, getExchangeApiConfig, getPipelineVersion } from '@fxlake/env';
import { createExchangeRateApiClient, SnapshotIngester } from '@fxlake/ingestion';
import { getLogger } from '@fxlake/logger';
import { ValidationService } from '@fxlake/validation';
import type { Result } from 'neverthrow';

const logger = getLogger('command-runtime');

/**
 * Wires lake storage and pipeline services for one CLI command, and owns their cleanup.
 *
 * - services are built on first use; the rates client only when a command ingests
 * - `onCleanup()` - LIFO stack, runs during dispose
 * - `dispose()` - run the stack. Idempotent. Throws on cleanup failures.
 */
export class CommandContext {
  private _paths?: LakePaths | undefined;
  private _disposed = false;
  private cleanupStack: (() => Promise<void>)[] = [];

  get paths(): LakePaths {
    if (!this._paths) {
      this._paths = new LakePaths(getDataDirectory());
      logger.debug({ dataDir: this._paths.dataDir }, 'Resolved lake directory');
    }
    return this._paths;
  }

  /**
   * Ingester backed by the live rates API. Fails with a ConfigError when no API key is configured.
   */
  snapshotIngester(): Result<SnapshotIngester, ConfigError> {
    return getExchangeApiConfig().map((config) => {
      const client = createExchangeRateApiClient(config);
      this.onCleanup(() => client.close());
      return new SnapshotIngester(client, new RawSnapshotRepository(this.paths), {
        pipelineVersion: getPipelineVersion(),
      });
    });
  }

  validationService(): ValidationService {
    return new ValidationService(new RawSnapshotRepository(this.paths), new SilverRepository(this.paths));
  }

  aggregationService(): AggregationService {
    return new AggregationService(new SilverRepository(this.paths), new GoldRepository(this.paths));
  }

  /**
   * Register a cleanup function. Runs in LIFO order during dispose().
   */
  onCleanup(fn: () => Promise<void>): void {
    this.cleanupStack.push(fn);
  }

  /**
   * Run cleanup stack (LIFO). Idempotent.
   */
  async dispose(): Promise<void> {
    if (this._disposed) return;
    this._disposed = true;

    // Continue on failure, collect errors
    const errors: Error[] = [];
    for (let fn = this.cleanupStack.pop(); fn; fn = this.cleanupStack.pop()) {
      try {
        await fn();
      } catch (error) {
        logger.error({ error }, 'Cleanup function failed');
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    const [first] = errors;
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Multiple cleanup failures');
    }
    if (first) {
      throw first;
    }
  }
}

/**
 * Run a CLI command body with automatic resource cleanup and return its value.
 *
 * Does NOT catch fn errors: they propagate to the caller once dispose has run.
 * If both fn and dispose fail, the fn error takes priority (dispose error is logged).
 * If only dispose fails, that error propagates.
 */
export async function runCommand<T>(fn: (ctx: CommandContext) => Promise<T>): Promise<T> {
  const ctx = new CommandContext();
  let value: T;

  try {
    value = await fn(ctx);
  } catch (error) {
    try {
      await ctx.dispose();
    } catch (disposeError) {
      logger.error({ error: disposeError }, 'Cleanup failed after command error');
    }
    throw error;
  }

  await ctx.dispose();
  return value;
}
