/**
 * Inventory Policy Calculations
 *
 * Safety stock, EOQ and reorder rules.
 *
 * Safety Stock = Z * sigma_d * sqrt(LT)
 * EOQ = sqrt(2 * D * S / H)  (Wilson formula)
 */

import type { AgingBucketLabel, ReorderSeverity } from './types';

// ---------------------------------------------------------------------------
// Z-scores for the supported service levels
// ---------------------------------------------------------------------------

const Z_SCORES: ReadonlyArray<[number, number]> = [
  [0.9, 1.28],
  [0.95, 1.65],
  [0.99, 2.33],
];

export const DEFAULT_Z = 1.65;

/** Z for a service level; levels outside the table use 1.65 */
export function zScoreFor(serviceLevel: number): number {
  for (const [level, z] of Z_SCORES) {
    if (Math.abs(level - serviceLevel) < 1e-9) return z;
  }
  return DEFAULT_Z;
}

export function safetyStock(z: number, demandStdDev: number, leadTimeDays: number): number {
  return Math.round(z * demandStdDev * Math.sqrt(Math.max(leadTimeDays, 0)));
}

/** 0 when the holding cost is not positive */
export function economicOrderQuantity(annualDemand: number, orderCost: number, holdingCostPerUnit: number): number {
  if (holdingCostPerUnit <= 0) return 0;
  return Math.round(Math.sqrt((2 * annualDemand * orderCost) / holdingCostPerUnit));
}

// ---------------------------------------------------------------------------
// Reorder rules
// ---------------------------------------------------------------------------

export function reorderSeverity(qtyOnHand: number, reorderPoint: number, warningFactor: number): ReorderSeverity {
  if (qtyOnHand < reorderPoint) return 'critical';
  if (qtyOnHand < warningFactor * reorderPoint) return 'warning';
  return 'ok';
}

/** stockout before low_stock before anything else */
export function reorderPriority(stockStatus: string | null): 1 | 2 | 3 {
  const status = stockStatus?.trim().toLowerCase();
  if (status === 'stockout') return 1;
  if (status === 'low_stock') return 2;
  return 3;
}

// ---------------------------------------------------------------------------
// Dates & aging
// ---------------------------------------------------------------------------

const DAY_MS = 86_400_000;
const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})/;

/**
 * Whole UTC days from a YYYY-MM-DD date to the calendar day of `now`;
 * null when the text is not a date.
 */
export function daysSince(dateText: string, now: Date): number | null {
  const match = DATE_RE.exec(dateText.trim());
  if (!match) return null;
  const then = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  if (Number.isNaN(then)) return null;
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.round((today - then) / DAY_MS);
}

export function agingBucketFor(daysIdle: number): AgingBucketLabel {
  if (daysIdle <= 30) return '0-30d';
  if (daysIdle <= 60) return '31-60d';
  if (daysIdle <= 90) return '61-90d';
  return '90+d';
}

export const AGING_BUCKETS: readonly AgingBucketLabel[] = ['0-30d', '31-60d', '61-90d', '90+d'];
