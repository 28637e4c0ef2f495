import type { AggregationSuccessReport } from '@fxlake/core';

export function formatAggregationSummary(report: AggregationSuccessReport): string {
  const { insights, output, processing } = report;
  const skipped = processing.daysSkipped.length;
  const topCurrencies = insights.topCurrencies
    .map((row) => `${row.currency} ${row.currentRate.toFixed(4)} (${row.trendClass})`)
    .join(', ');

  return [
    `Period:          ${processing.periodStart} to ${processing.periodEnd} (${processing.daysIncluded} with data, ${skipped} skipped)`,
    `Records:         ${processing.silverRecordsProcessed} silver rows -> ${processing.dailyMetricsCalculated} daily metrics`,
    `Currencies:      ${processing.currenciesAnalyzed}`,
    `Files written:   ${output.totalFiles} (${output.totalSizeKb.toFixed(1)} KB)`,
    `Top currencies:  ${topCurrencies}`,
  ].join('\n');
}
