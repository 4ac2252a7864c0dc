/**
 * Supply Chain Calculations
 *
 * Supplier risk scoring and ranking rules.
 *
 * risk = 0.3 x LT + 0.4 x OTD + 0.3 x QRR
 *   LT  = clamp((lead_time - 5) x 3, 0, 100)
 *   OTD = max(0, (1 - otd_rate) x 200)
 *   QRR = rejection_rate x 1000
 */

import { round1, round2 } from '../db/values';
import type { SupplierNode } from '../graph/types';
import { compareIds, mean, sampleStdDev } from '../utils/stats';
import type { LeadTimeStats, RiskComponents, RiskLevel } from './types';

export const RISK_DEFAULTS = {
  leadTimeDays: 14,
  onTimeDeliveryRate: 0.9,
  qualityRejectionRate: 0.01,
} as const;

export interface RiskInput {
  leadTimeDays: number | null;
  onTimeDeliveryRate: number | null;
  qualityRejectionRate: number | null;
}

export function riskComponents(input: RiskInput): RiskComponents {
  const lead = input.leadTimeDays ?? RISK_DEFAULTS.leadTimeDays;
  const otd = input.onTimeDeliveryRate ?? RISK_DEFAULTS.onTimeDeliveryRate;
  const qrr = input.qualityRejectionRate ?? RISK_DEFAULTS.qualityRejectionRate;
  return {
    leadTime: Math.min(100, Math.max(0, (lead - 5) * 3)),
    onTimeDelivery: Math.max(0, (1 - otd) * 200),
    quality: qrr * 1000,
  };
}

export function supplierRiskScore(input: RiskInput): number {
  const c = riskComponents(input);
  return round1(0.3 * c.leadTime + 0.4 * c.onTimeDelivery + 0.3 * c.quality);
}

export function riskLevel(score: number): RiskLevel {
  if (score > 60) return 'high';
  if (score > 30) return 'medium';
  return 'low';
}

/** Severity of losing a supplier by the number of products it supplies */
export function rippleSeverity(impacted: number): RiskLevel {
  if (impacted > 10) return 'high';
  if (impacted > 3) return 'medium';
  return 'low';
}

function descNullsLast(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

function ascNullsLast(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

/**
 * Suppliers not already supplying the product, by rating descending then
 * lead time ascending (unknown values last), capped at `limit`.
 */
export function rankAlternatives(candidates: SupplierNode[], currentIds: ReadonlySet<string>, limit: number): SupplierNode[] {
  return candidates
    .filter((s) => !currentIds.has(s.supplierId))
    .sort(
      (a, b) =>
        descNullsLast(a.rating, b.rating) ||
        ascNullsLast(a.leadTime, b.leadTime) ||
        compareIds(a.supplierId, b.supplierId),
    )
    .slice(0, limit);
}

/** Longest lead time first, unknown last */
export function byLeadTimeDesc(a: { leadTimeDays: number | null; supplierId: string }, b: { leadTimeDays: number | null; supplierId: string }): number {
  return descNullsLast(a.leadTimeDays, b.leadTimeDays) || compareIds(a.supplierId, b.supplierId);
}

export function byOtdDesc(a: { onTimeDeliveryRate: number | null; supplierId: string }, b: { onTimeDeliveryRate: number | null; supplierId: string }): number {
  return descNullsLast(a.onTimeDeliveryRate, b.onTimeDeliveryRate) || compareIds(a.supplierId, b.supplierId);
}

export function leadTimeStats(values: number[]): LeadTimeStats | null {
  if (values.length === 0) return null;
  const m = mean(values);
  const sd = sampleStdDev(values);
  return {
    orders: values.length,
    mean: round2(m),
    stdDev: sd === null ? null : round2(sd),
    min: Math.min(...values),
    max: Math.max(...values),
    cv: sd === null || m === 0 ? null : round2(sd / m),
  };
}
