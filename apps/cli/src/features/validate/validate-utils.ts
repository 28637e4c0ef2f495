import type { ValidationSuccessReport } from '@fxlake/core';

function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export function formatValidationSummary(report: ValidationSuccessReport): string {
  const { input, output, processing, quality } = report;
  const lines = [
    `Target date:     ${report.targetDate}`,
    `Records:         ${processing.validatedRecords} validated, ${processing.invalidRecords} rejected of ${input.totalRawRecords} (${formatPercent(processing.validationSuccessRate)})`,
    `Quality score:   ${quality.overallScore.toFixed(2)}`,
    `Silver file:     ${output.silverFile}`,
  ];

  for (const sample of processing.rejectionSamples) {
    lines.push(`Rejected #${sample.index} ${sample.targetCurrency}: ${sample.violations.join(', ')}`);
  }
  for (const issue of quality.issues) {
    lines.push(`Quality issue:   ${issue}`);
  }
  return lines.join('\n');
}
