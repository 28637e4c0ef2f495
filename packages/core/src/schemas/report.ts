import type { PipelineErrorCategory } from '../errors.js';
import type { IsoDate } from '../utils/date-utils.js';

import type { MajorCurrencyRow, MarketOverview } from './overview.js';
import type { QualityReport } from './quality.js';

interface ReportBase {
  targetDate: IsoDate;
  executionTimeSeconds: number;
}

export interface ErrorReport extends ReportBase {
  status: 'error';
  errorCategory: PipelineErrorCategory;
  errorMessage: string;
}

export interface RejectionSample {
  index: number;
  targetCurrency: string;
  violations: string[];
}

export interface ValidationSuccessReport extends ReportBase {
  status: 'success';
  input: {
    rawFile: string;
    totalRawRecords: number;
  };
  processing: {
    validatedRecords: number;
    invalidRecords: number;
    validationSuccessRate: number;
    /** First few rejected records, for diagnosis */
    rejectionSamples: RejectionSample[];
  };
  output: {
    silverFile: string;
    finalRecords: number;
  };
  quality: QualityReport;
}

export interface AggregationSuccessReport extends ReportBase {
  status: 'success';
  processing: {
    periodStart: IsoDate;
    periodEnd: IsoDate;
    daysIncluded: number;
    daysSkipped: IsoDate[];
    silverRecordsProcessed: number;
    dailyMetricsCalculated: number;
    currenciesAnalyzed: number;
  };
  output: {
    filesCreated: Record<string, string>;
    totalFiles: number;
    totalSizeKb: number;
  };
  insights: {
    marketOverview: MarketOverview;
    topCurrencies: Pick<MajorCurrencyRow, 'currency' | 'currentRate' | 'trendClass'>[];
  };
}

export type ValidationReport = ValidationSuccessReport | ErrorReport;
export type AggregationReport = AggregationSuccessReport | ErrorReport;
export type ProcessingReport = ValidationReport | AggregationReport;
