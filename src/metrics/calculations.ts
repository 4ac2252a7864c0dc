/**
 * Metrics Calculations
 *
 * Pure formulas behind the cash-cycle and classification analyses. Every
 * division is guarded: a zero denominator yields 0 or null, never NaN.
 */

import { round1 } from '../db/values';
import { compareIds, mean, sampleStdDev } from '../utils/stats';
import type { AbcClass, ConcentrationRisk, LedgerEntry, ParetoEntry, ParetoInput, XyzClass } from './types';

// ---------------------------------------------------------------------------
// ABC / Pareto
// ---------------------------------------------------------------------------

export function abcClassFor(cumulativePct: number): AbcClass {
  if (cumulativePct <= 80) return 'A';
  if (cumulativePct <= 95) return 'B';
  return 'C';
}

/**
 * Rank by value descending (ties by product id) and classify by the running
 * cumulative share. A zero total gives every item share 0.
 */
export function classifyPareto(items: ParetoInput[]): ParetoEntry[] {
  const sorted = [...items].sort((a, b) => b.value - a.value || compareIds(a.productId, b.productId));
  let total = 0;
  for (const item of sorted) total += item.value;

  let running = 0;
  return sorted.map((item) => {
    running += item.value;
    const cumulativePct = total > 0 ? (running * 100) / total : 0;
    return {
      productId: item.productId,
      value: item.value,
      sharePct: total > 0 ? (item.value * 100) / total : 0,
      cumulativePct,
      abcClass: abcClassFor(cumulativePct),
    };
  });
}

// ---------------------------------------------------------------------------
// XYZ
// ---------------------------------------------------------------------------

/** CV of a demand series; a zero mean (or a single observation) gives 0 */
export function coefficientOfVariation(values: number[]): number {
  const m = mean(values);
  if (m === 0) return 0;
  const sd = sampleStdDev(values) ?? 0;
  return sd / m;
}

export function xyzClassFor(cv: number): XyzClass {
  if (cv < 0.5) return 'X';
  if (cv < 1.0) return 'Y';
  return 'Z';
}

// ---------------------------------------------------------------------------
// Cash conversion cycle
// ---------------------------------------------------------------------------

export function cashConversionCycle(dio: number, dso: number, dpo: number): number {
  return round1(dio + dso - dpo);
}

/**
 * Amount-weighted average days. Entries without a days value are left out of
 * both sums; null when the remaining amounts sum to 0.
 */
export function weightedDays(entries: LedgerEntry[]): number | null {
  let numerator = 0;
  let denominator = 0;
  for (const entry of entries) {
    if (entry.days === null) continue;
    numerator += entry.days * entry.amount;
    denominator += entry.amount;
  }
  return denominator === 0 ? null : numerator / denominator;
}

/** Inventory value over average daily COGS; 0 when daily COGS is 0 */
export function daysInventoryOutstanding(inventoryValue: number, totalCogs: number, salesDays: number): number {
  const dailyCogs = salesDays > 0 ? totalCogs / salesDays : 0;
  return dailyCogs > 0 ? round1(inventoryValue / dailyCogs) : 0;
}

/** Cash freed by shortening the cycle: days x annual revenue / 365 */
export function cashFreed(days: number, annualRevenue: number): number {
  return (days * annualRevenue) / 365;
}

// ---------------------------------------------------------------------------
// Concentration
// ---------------------------------------------------------------------------

export function concentrationRisk(sharePct: number): ConcentrationRisk {
  if (sharePct > 80) return 'high';
  if (sharePct > 50) return 'medium';
  return 'low';
}

// ---------------------------------------------------------------------------
// AR aging
// ---------------------------------------------------------------------------

const BUCKET_ORDER: Array<[RegExp, number]> = [
  [/^current/i, 0],
  [/^1\s*-\s*30/, 1],
  [/^31\s*-\s*60/, 2],
  [/^61\s*-\s*90/, 3],
  [/^(90\+|>\s*90|91)/, 4],
];

/** Sort key for aging bucket labels; unrecognized labels go last */
export function agingBucketRank(label: string): number {
  for (const [pattern, rank] of BUCKET_ORDER) {
    if (pattern.test(label.trim())) return rank;
  }
  return BUCKET_ORDER.length;
}
