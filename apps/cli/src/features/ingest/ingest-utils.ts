import type { IngestionResult } from '@fxlake/ingestion';

export function formatIngestionSummary(result: IngestionResult): string {
  return [
    `Base currency:   ${result.baseCurrency}`,
    `Collection date: ${result.collectionDate}`,
    `Rates saved:     ${result.totalRates}`,
    `Raw file:        ${result.filePath}`,
  ].join('\n');
}
