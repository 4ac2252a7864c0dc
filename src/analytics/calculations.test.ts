import { describe, it, expect } from 'vitest';
import { movingAverageForecast, seasonalIndices, withGrowth, zScoreAnomalies } from './calculations';

describe('movingAverageForecast', () => {
  it('projects the last window forward and detects an upward trend', () => {
    const result = movingAverageForecast([10, 10, 10, 10, 20, 20, 20, 20], 4, 30);
    expect(result).toEqual({
      window: 4,
      movingAverage: 20,
      trend: 'increasing',
      horizonDays: 30,
      projectedTotal: 600,
      historicalDays: 8,
    });
  });

  it('detects a downward trend', () => {
    expect(movingAverageForecast([20, 20, 10, 10], 2, 7).trend).toBe('decreasing');
  });

  it('stays stable within 10% of the prior window', () => {
    // 10.5 vs 10 -> ratio 1.05
    expect(movingAverageForecast([10, 10, 10.5, 10.5], 2, 7).trend).toBe('stable');
  });

  it('shrinks the window to the history and reports stable without two windows', () => {
    const result = movingAverageForecast([5, 7], 7, 30);
    expect(result.window).toBe(2);
    expect(result.movingAverage).toBe(6);
    expect(result.trend).toBe('stable');
    expect(result.projectedTotal).toBe(180);
  });
});

describe('zScoreAnomalies', () => {
  it('flags values beyond the threshold using the population deviation', () => {
    // mean 19, variance (9 x 81 + 6561) / 10 = 729, sd 27, z(100) = 81 / 27 = 3
    const values = [10, 10, 10, 10, 10, 10, 10, 10, 10, 100];
    const result = zScoreAnomalies(values, 2);
    expect(result.mean).toBe(19);
    expect(result.stdDev).toBe(27);
    expect(result.flagged).toEqual([{ index: 9, value: 100, zScore: 3 }]);
  });

  it('skips nulls and flags nothing on a flat series', () => {
    const result = zScoreAnomalies([null, 5, 5], 2);
    expect(result.mean).toBe(5);
    expect(result.stdDev).toBe(0);
    expect(result.flagged).toEqual([]);
  });
});

describe('withGrowth', () => {
  it('compares each period with the one before', () => {
    const result = withGrowth([
      { period: '2024-01', revenue: 100, units: 1, skus: 1 },
      { period: '2024-02', revenue: 150, units: 1, skus: 1 },
      { period: '2024-03', revenue: 0, units: 0, skus: 0 },
      { period: '2024-04', revenue: 50, units: 1, skus: 1 },
    ]);
    expect(result.map((p) => p.growthPct)).toEqual([null, 50, -100, 0]);
  });
});

describe('seasonalIndices', () => {
  it('divides each month by the average month', () => {
    const result = seasonalIndices([
      { month: 1, qty: 10, revenue: 100 },
      { month: 2, qty: 30, revenue: 300 },
    ]);
    expect(result.map((m) => m.seasonalIndex)).toEqual([0.5, 1.5]);
  });

  it('gives 0 when no units sold', () => {
    expect(seasonalIndices([{ month: 3, qty: 0, revenue: 0 }])[0].seasonalIndex).toBe(0);
  });
});
