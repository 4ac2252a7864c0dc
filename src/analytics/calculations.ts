/**
 * Demand Analytics Calculations
 */

import { round, round1, round2 } from '../db/values';
import { mean, populationStdDev } from '../utils/stats';
import type { MonthIndex, MovingAverageForecast, RevenuePeriod, Trend, ZScoreScan } from './types';

/**
 * Moving-average forecast over a daily series (oldest first). The window
 * shrinks to the history length; the trend compares the last window with the
 * one before it and needs 2 x window days.
 */
export function movingAverageForecast(series: number[], window: number, horizonDays: number): MovingAverageForecast {
  const effective = Math.max(1, Math.min(window, series.length));
  const current = mean(series.slice(-effective));

  let trend: Trend = 'stable';
  if (series.length >= effective * 2) {
    const prior = mean(series.slice(-effective * 2, -effective));
    if (current > prior * 1.1) trend = 'increasing';
    else if (current < prior * 0.9) trend = 'decreasing';
  }

  return {
    window: effective,
    movingAverage: round2(current),
    trend,
    horizonDays,
    projectedTotal: round(current * horizonDays),
    historicalDays: series.length,
  };
}

/**
 * Population z-scores over the non-null values. Flags |z| above the
 * threshold; a zero deviation flags nothing.
 */
export function zScoreAnomalies(values: Array<number | null>, threshold: number): ZScoreScan {
  const present = values.filter((v): v is number => v !== null);
  const m = mean(present);
  const sd = populationStdDev(present);
  const flagged: ZScoreScan['flagged'] = [];
  if (sd > 0) {
    values.forEach((value, index) => {
      if (value === null) return;
      const z = (value - m) / sd;
      if (Math.abs(z) > threshold) flagged.push({ index, value, zScore: z });
    });
  }
  return { mean: m, stdDev: sd, flagged };
}

/** Growth % against the previous period; 0 when the previous revenue is 0 */
export function withGrowth(periods: Array<Omit<RevenuePeriod, 'growthPct'>>): RevenuePeriod[] {
  return periods.map((p, i) => {
    if (i === 0) return { ...p, growthPct: null };
    const prev = periods[i - 1].revenue;
    return { ...p, growthPct: prev > 0 ? round1(((p.revenue - prev) / prev) * 100) : 0 };
  });
}

/** Seasonal index per month against the average over the months present */
export function seasonalIndices(months: Array<Omit<MonthIndex, 'seasonalIndex'>>): MonthIndex[] {
  const avg = mean(months.map((m) => m.qty));
  return months.map((m) => ({ ...m, seasonalIndex: avg > 0 ? round2(m.qty / avg) : 0 }));
}
