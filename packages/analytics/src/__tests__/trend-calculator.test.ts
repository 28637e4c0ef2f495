import { describe, expect, it } from 'vitest';

import { calculateCurrencyTrend, calculateTrends } from '../trend-calculator.js';

import { makeDailyMetric, makeSeries } from './test-utils.js';

describe('calculateCurrencyTrend', () => {
  it('defaults every derived field for a single point', () => {
    const [point] = calculateCurrencyTrend([makeDailyMetric({ rateMean: 5.5 })]);

    expect(point).toMatchObject({
      dailyChangePct: 0,
      cumulativeChangePct: 0,
      volatility7d: 0,
      movingAvg7d: 5.5,
      max30d: 5.5,
      min30d: 5.5,
      relativePositionPct: 50,
    });
  });

  it('computes daily and cumulative change in percent', () => {
    const points = calculateCurrencyTrend(makeSeries('BRL', [1.0, 1.1, 1.21]));

    const daily = points.map((point) => point.dailyChangePct);
    const cumulative = points.map((point) => point.cumulativeChangePct);
    expect(daily[0]).toBe(0);
    expect(daily[1]).toBeCloseTo(10, 9);
    expect(daily[2]).toBeCloseTo(10, 9);
    expect(cumulative[0]).toBe(0);
    expect(cumulative[1]).toBeCloseTo(10, 9);
    expect(cumulative[2]).toBeCloseTo(21, 9);
  });

  it('uses trailing inclusive windows that shrink at the start', () => {
    const points = calculateCurrencyTrend(makeSeries('EUR', [1, 2, 3, 4, 5, 6, 7, 8, 9]));

    expect(points.map((point) => point.movingAvg7d)).toEqual([1, 1.5, 2, 2.5, 3, 3.5, 4, 5, 6]);
    expect(points.map((point) => point.max30d)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(points.every((point) => point.min30d === 1)).toBe(true);
  });

  it('takes volatility as the sample std of daily change over up to seven points', () => {
    const points = calculateCurrencyTrend(makeSeries('EUR', [100, 110, 99]));

    // daily changes: 0, 10, -10
    expect(points[0]?.volatility7d).toBe(0);
    expect(points[1]?.volatility7d).toBeCloseTo(Math.sqrt(50), 9);
    expect(points[2]?.volatility7d).toBeCloseTo(10, 9);
  });

  it('positions each point within its 30-point range, 50 when the range is flat', () => {
    const points = calculateCurrencyTrend(makeSeries('EUR', [2, 2, 4, 3]));

    expect(points.map((point) => point.relativePositionPct)).toEqual([50, 50, 100, 50]);
  });

  it('reports zero change against a zero base', () => {
    const points = calculateCurrencyTrend(makeSeries('XAU', [0, 5]));

    expect(points[1]?.dailyChangePct).toBe(0);
    expect(points[1]?.cumulativeChangePct).toBe(0);
  });
});

describe('calculateTrends', () => {
  it('keeps currencies independent and concatenates them in currency order', () => {
    const eur = makeSeries('EUR', [0.9, 0.99]);
    const brl = makeSeries('BRL', [5.0, 5.5, 6.05]);

    const trends = calculateTrends([...eur, ...brl].reverse());

    expect(trends.map((point) => `${point.currency} ${point.date}`)).toEqual([
      'BRL 2024-03-01',
      'BRL 2024-03-02',
      'BRL 2024-03-03',
      'EUR 2024-03-01',
      'EUR 2024-03-02',
    ]);
    expect(trends[3]?.dailyChangePct).toBe(0);
    expect(trends[4]?.cumulativeChangePct).toBeCloseTo(10, 9);
  });
});
