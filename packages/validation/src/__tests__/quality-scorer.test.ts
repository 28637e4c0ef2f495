import { describe, expect, it } from 'vitest';

import { scoreQuality } from '../quality-scorer.js';

import { makeObservation } from './test-utils.js';

const generatedAt = new Date('2024-03-01T13:00:00.000Z');

describe('scoreQuality', () => {
  it('scores a clean batch 1.0 with no issues', () => {
    const report = scoreQuality(
      [makeObservation({ targetCurrency: 'BRL', rate: 5.5 }), makeObservation({ targetCurrency: 'EUR', rate: 0.9 })],
      generatedAt
    );

    expect(report.overallScore).toBe(1);
    expect(report.issues).toEqual([]);
    expect(report.generatedAt).toBe('2024-03-01T13:00:00.000Z');
    expect(report.completeness.completenessScore).toBe(1);
    expect(report.currencyConsistency).toEqual({
      uniqueBaseCurrencies: 1,
      uniqueTargetCurrencies: 2,
      invalidCodes: [],
      unknownCodes: [],
      totalCurrencyPairs: 2,
    });
    expect(report.rateDistribution.min).toBe(0.9);
    expect(report.rateDistribution.max).toBe(5.5);
    expect(report.rateDistribution.median).toBeCloseTo(3.2);
    expect(report.rateDistribution.std).toBeCloseTo(Math.sqrt(((5.5 - 3.2) ** 2 + (0.9 - 3.2) ** 2) / 1));
  });

  it('penalizes invalid rates with weight 0.4', () => {
    const report = scoreQuality(
      [makeObservation({ targetCurrency: 'BRL', rate: 5.5 }), makeObservation({ targetCurrency: 'EUR', rate: -5 })],
      generatedAt
    );

    expect(report.overallScore).toBeCloseTo(0.8);
    expect(report.rateDistribution.negativeCount).toBe(1);
    expect(report.issues).toEqual(['Found 1 negative rates']);
  });

  it('penalizes missing cells with weight 0.3 over all seven columns', () => {
    const report = scoreQuality([{ ...makeObservation(), rate: null }], generatedAt);

    expect(report.completeness.missingValues.rate).toBe(1);
    expect(report.completeness.completenessScore).toBeCloseTo(6 / 7);
    expect(report.overallScore).toBeCloseTo(1 - 0.3 / 7);
    expect(report.issues).toEqual(['Missing values found: rate=1']);
  });

  it('penalizes malformed code slots with weight 0.3 over both slots', () => {
    const report = scoreQuality([makeObservation({ targetCurrency: 'BR' })], generatedAt);

    expect(report.currencyConsistency.invalidCodes).toEqual(['BR']);
    expect(report.overallScore).toBeCloseTo(0.85);
    expect(report.issues).toEqual(['Invalid currency codes: BR']);
  });

  it('reports well-formed codes outside ISO 4217 without penalizing them', () => {
    const report = scoreQuality([makeObservation({ targetCurrency: 'ZZZ' })], generatedAt);

    expect(report.currencyConsistency.unknownCodes).toEqual(['ZZZ']);
    expect(report.overallScore).toBe(1);
    expect(report.issues).toEqual(['Currency codes not in ISO 4217: ZZZ']);
  });

  it('flags zero and extreme rates', () => {
    const report = scoreQuality(
      [
        makeObservation({ targetCurrency: 'BRL', rate: 0 }),
        makeObservation({ targetCurrency: 'KRW', rate: 1330.5 }),
      ],
      generatedAt
    );

    expect(report.rateDistribution.zeroCount).toBe(1);
    expect(report.rateDistribution.extremeCount).toBe(1);
    expect(report.issues).toEqual(['Found 1 zero rates', 'Found 1 extreme rates (>1000)']);
  });

  it('never rises as more rows become invalid', () => {
    const rows = ['BRL', 'EUR', 'JPY', 'GBP'].map((targetCurrency) => makeObservation({ targetCurrency }));
    const scores = [0, 1, 2, 3, 4].map((invalid) =>
      scoreQuality(
        rows.map((row, index) => (index < invalid ? { ...row, rate: -1 } : row)),
        generatedAt
      ).overallScore
    );

    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeLessThanOrEqual(scores[i - 1] ?? 1);
    }
    expect(scores[0]).toBe(1);
    expect(scores[4]).toBeCloseTo(0.6);
  });

  it('scores an empty batch 0', () => {
    const report = scoreQuality([], generatedAt);

    expect(report.overallScore).toBe(0);
    expect(report.totalRecords).toBe(0);
    expect(report.issues).toEqual(['No records to score']);
  });
});
