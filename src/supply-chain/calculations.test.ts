import { describe, it, expect } from 'vitest';
import type { SupplierNode } from '../graph/types';
import {
  leadTimeStats,
  rankAlternatives,
  riskComponents,
  riskLevel,
  rippleSeverity,
  supplierRiskScore,
} from './calculations';

// =============================================================================
// Risk scoring
// =============================================================================

describe('supplierRiskScore', () => {
  it('weights lead time, delivery and quality 30/40/30', () => {
    // LT = (20 - 5) x 3 = 45, OTD = 0.25 x 200 = 50, QRR = 0.02 x 1000 = 20
    // 0.3 x 45 + 0.4 x 50 + 0.3 x 20 = 13.5 + 20 + 6 = 39.5
    const input = { leadTimeDays: 20, onTimeDeliveryRate: 0.75, qualityRejectionRate: 0.02 };
    expect(supplierRiskScore(input)).toBe(39.5);
    expect(riskLevel(supplierRiskScore(input))).toBe('medium');
  });

  it('fills missing metrics with 14 days, 90% and 1%', () => {
    // 0.3 x 27 + 0.4 x 20 + 0.3 x 10 = 8.1 + 8 + 3 = 19.1
    const score = supplierRiskScore({ leadTimeDays: null, onTimeDeliveryRate: null, qualityRejectionRate: null });
    expect(score).toBe(19.1);
    expect(riskLevel(score)).toBe('low');
  });

  it('clamps the lead-time component to 0..100', () => {
    const none = { onTimeDeliveryRate: 1, qualityRejectionRate: 0 };
    expect(riskComponents({ ...none, leadTimeDays: 3 }).leadTime).toBe(0);
    expect(riskComponents({ ...none, leadTimeDays: 50 }).leadTime).toBe(100);
  });

  it('never lets a perfect delivery rate go negative', () => {
    expect(riskComponents({ leadTimeDays: 5, onTimeDeliveryRate: 1.2, qualityRejectionRate: 0 }).onTimeDelivery).toBe(0);
  });

  it('uses strict level thresholds', () => {
    expect(riskLevel(60)).toBe('medium');
    expect(riskLevel(60.1)).toBe('high');
    expect(riskLevel(30)).toBe('low');
  });
});

describe('rippleSeverity', () => {
  it('grades by the number of impacted products', () => {
    expect(rippleSeverity(11)).toBe('high');
    expect(rippleSeverity(10)).toBe('medium');
    expect(rippleSeverity(4)).toBe('medium');
    expect(rippleSeverity(3)).toBe('low');
  });
});

// =============================================================================
// Alternatives
// =============================================================================

function supplier(supplierId: string, rating: number | null, leadTime: number | null): SupplierNode {
  return { supplierId, supplierName: null, leadTime, rating, otdRate: null, country: null };
}

describe('rankAlternatives', () => {
  it('excludes current suppliers and ranks by rating, then lead time', () => {
    const ranked = rankAlternatives(
      [supplier('S1', 4, 10), supplier('S2', 5, 20), supplier('S3', 5, 7), supplier('S4', null, 1), supplier('S5', 4.5, 3)],
      new Set(['S5']),
      3,
    );
    expect(ranked.map((s) => s.supplierId)).toEqual(['S3', 'S2', 'S1']);
  });
});

describe('leadTimeStats', () => {
  it('summarizes observed lead times', () => {
    // mean 14, sd sqrt((16 + 0 + 16) / 2) = 4, cv 4 / 14 = 0.29
    expect(leadTimeStats([10, 14, 18])).toEqual({ orders: 3, mean: 14, stdDev: 4, min: 10, max: 18, cv: 0.29 });
  });

  it('has no deviation for a single order and nothing for none', () => {
    expect(leadTimeStats([7])).toEqual({ orders: 1, mean: 7, stdDev: null, min: 7, max: 7, cv: null });
    expect(leadTimeStats([])).toBeNull();
  });
});
