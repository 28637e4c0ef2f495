import {
  addDays,
  buildErrorReport,
  elapsedSeconds,
  getErrorMessage,
  InvalidInputError,
  isIsoDate,
  isoDateRange,
  NoDataForPeriodError,
  UnexpectedError,
  type AggregationReport,
  type AggregationSuccessReport,
  type IsoDate,
  type PipelineError,
  type RateObservation,
} from '@fxlake/core';
import type { IGoldRepository, ISilverRepository } from '@fxlake/data';
import { getLogger, type Logger } from '@fxlake/logger';
import { err, ok, type Result } from 'neverthrow';

import { summarizeCurrencies } from './currency-summarizer.js';
import { aggregateDaily } from './daily-aggregator.js';
import { buildMarketOverview } from './market-overview.js';
import { calculateTrends } from './trend-calculator.js';

export const DEFAULT_DAYS_BACK = 7;
const TOP_CURRENCY_COUNT = 5;

type CompletedAggregation = Omit<AggregationSuccessReport, 'executionTimeSeconds'>;

export interface AggregationOptions {
  /** Window length in days, ending at (and including) the target date */
  daysBack?: number;
}

export interface AggregationServiceOptions {
  now?: () => number;
}

interface SilverWindow {
  observations: RateObservation[];
  daysIncluded: IsoDate[];
  daysSkipped: IsoDate[];
}

/**
 * Gold stage: silver observations of a trailing window -> daily metrics, trends,
 * currency summaries and the market overview, written together.
 */
export class AggregationService {
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(
    private readonly silverRepository: ISilverRepository,
    private readonly goldRepository: IGoldRepository,
    options: AggregationServiceOptions = {}
  ) {
    this.logger = getLogger('AggregationService');
    this.now = options.now ?? Date.now;
  }

  async processDate(date: IsoDate, options: AggregationOptions = {}): Promise<AggregationReport> {
    const daysBack = options.daysBack ?? DEFAULT_DAYS_BACK;
    const startedAt = this.now();
    this.logger.info({ daysBack, targetDate: date }, 'Starting gold aggregation');

    let result: Result<CompletedAggregation, PipelineError>;
    try {
      result = await this.run(date, daysBack);
    } catch (error) {
      result = err(new UnexpectedError(`Unexpected error aggregating ${date}: ${getErrorMessage(error)}`));
    }

    const executionTimeSeconds = elapsedSeconds(startedAt, this.now());

    if (result.isErr()) {
      this.logger.error(
        { category: result.error.category, executionTimeSeconds, targetDate: date },
        `Gold aggregation failed: ${result.error.message}`
      );
      return buildErrorReport(date, executionTimeSeconds, result.error);
    }

    const report: AggregationSuccessReport = { ...result.value, executionTimeSeconds };
    this.logger.info(
      {
        currenciesAnalyzed: report.processing.currenciesAnalyzed,
        executionTimeSeconds,
        targetDate: date,
        totalFiles: report.output.totalFiles,
      },
      'Gold aggregation completed'
    );
    return report;
  }

  private async run(date: IsoDate, daysBack: number): Promise<Result<CompletedAggregation, PipelineError>> {
    if (!isIsoDate(date)) {
      return err(new InvalidInputError(`Invalid date '${date}': expected YYYY-MM-DD`));
    }
    if (!Number.isInteger(daysBack) || daysBack < 1) {
      return err(new InvalidInputError(`daysBack must be a positive integer, got ${daysBack}`));
    }

    const periodStart = addDays(date, -(daysBack - 1));
    const windowResult = await this.loadWindow(periodStart, date);
    if (windowResult.isErr()) {
      return err(windowResult.error);
    }

    const { daysIncluded, daysSkipped, observations } = windowResult.value;
    if (daysIncluded.length === 0) {
      return err(new NoDataForPeriodError(periodStart, date));
    }

    const dailyMetrics = aggregateDaily(observations);
    const trends = calculateTrends(dailyMetrics);
    const summaries = summarizeCurrencies(trends);
    this.logger.info(
      { currencies: summaries.length, dailyMetrics: dailyMetrics.length, observations: observations.length },
      'Calculated gold metrics'
    );

    const overviewResult = buildMarketOverview(summaries, new Date(this.now()));
    if (overviewResult.isErr()) {
      return err(overviewResult.error);
    }
    const overview = overviewResult.value;

    const savedResult = await this.goldRepository.save(date, { dailyMetrics, overview, summaries, trends });
    if (savedResult.isErr()) {
      return err(savedResult.error);
    }
    const { filesCreated, totalSizeKb } = savedResult.value;

    const report: CompletedAggregation = {
      status: 'success',
      targetDate: date,
      processing: {
        periodStart,
        periodEnd: date,
        daysIncluded: daysIncluded.length,
        daysSkipped,
        silverRecordsProcessed: observations.length,
        dailyMetricsCalculated: dailyMetrics.length,
        currenciesAnalyzed: summaries.length,
      },
      output: {
        filesCreated,
        totalFiles: Object.keys(filesCreated).length,
        totalSizeKb,
      },
      insights: {
        marketOverview: overview,
        topCurrencies: summaries.slice(0, TOP_CURRENCY_COUNT).map((summary) => ({
          currency: summary.currency,
          currentRate: summary.currentRate,
          trendClass: summary.trendClass,
        })),
      },
    };
    return ok(report);
  }

  /**
   * Load every silver day in [start, end]. Missing days are skipped with a warning.
   */
  private async loadWindow(start: IsoDate, end: IsoDate): Promise<Result<SilverWindow, PipelineError>> {
    const window: SilverWindow = { daysIncluded: [], daysSkipped: [], observations: [] };

    for (const day of isoDateRange(start, end)) {
      const loaded = await this.silverRepository.load(day);
      if (loaded.isErr()) {
        return err(loaded.error);
      }
      if (loaded.value === undefined) {
        this.logger.warn(
          { date: day, filePath: this.silverRepository.pathFor(day) },
          'No silver data for date, skipping'
        );
        window.daysSkipped.push(day);
        continue;
      }
      window.daysIncluded.push(day);
      window.observations.push(...loaded.value);
    }

    this.logger.info(
      {
        daysIncluded: window.daysIncluded.length,
        daysSkipped: window.daysSkipped.length,
        records: window.observations.length,
      },
      'Loaded silver window'
    );
    return ok(window);
  }
}
