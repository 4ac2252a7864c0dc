import { describe, it, expect } from 'vitest';
import {
  abcClassFor,
  agingBucketRank,
  cashConversionCycle,
  cashFreed,
  classifyPareto,
  coefficientOfVariation,
  concentrationRisk,
  daysInventoryOutstanding,
  weightedDays,
  xyzClassFor,
} from './calculations';

// =============================================================================
// ABC / Pareto
// =============================================================================

describe('classifyPareto', () => {
  it('classifies by cumulative share: 50/30/15/5 -> A, A, B, C', () => {
    const result = classifyPareto([
      { productId: 'P3', value: 15 },
      { productId: 'P1', value: 50 },
      { productId: 'P4', value: 5 },
      { productId: 'P2', value: 30 },
    ]);

    // cumulative: 50, 80, 95, 100
    expect(result.map((e) => e.productId)).toEqual(['P1', 'P2', 'P3', 'P4']);
    expect(result.map((e) => e.cumulativePct)).toEqual([50, 80, 95, 100]);
    expect(result.map((e) => e.abcClass)).toEqual(['A', 'A', 'B', 'C']);
    expect(result[0].sharePct).toBe(50);
  });

  it('breaks value ties by product id', () => {
    const result = classifyPareto([
      { productId: 'B', value: 10 },
      { productId: 'A', value: 10 },
    ]);
    expect(result.map((e) => e.productId)).toEqual(['A', 'B']);
  });

  it('gives every item share 0 when the total is 0', () => {
    const result = classifyPareto([
      { productId: 'A', value: 0 },
      { productId: 'B', value: 0 },
    ]);
    expect(result.map((e) => e.sharePct)).toEqual([0, 0]);
    expect(result.map((e) => e.abcClass)).toEqual(['A', 'A']);
  });

  it('uses inclusive class boundaries', () => {
    expect(abcClassFor(80)).toBe('A');
    expect(abcClassFor(80.01)).toBe('B');
    expect(abcClassFor(95)).toBe('B');
    expect(abcClassFor(95.01)).toBe('C');
  });
});

// =============================================================================
// XYZ
// =============================================================================

describe('coefficientOfVariation', () => {
  it('divides the sample deviation by the mean', () => {
    // [2, 4]: mean 3, sd sqrt(2) = 1.414 -> 0.471
    expect(coefficientOfVariation([2, 4])).toBeCloseTo(0.4714, 4);
  });

  it('returns 0 for a zero mean or a single observation', () => {
    expect(coefficientOfVariation([0, 0, 0])).toBe(0);
    expect(coefficientOfVariation([5])).toBe(0);
  });

  it('maps CV to X, Y and Z', () => {
    expect(xyzClassFor(coefficientOfVariation([2, 4]))).toBe('X');
    // [1, 3]: mean 2, sd 1.414 -> 0.707
    expect(xyzClassFor(coefficientOfVariation([1, 3]))).toBe('Y');
    // [0, 4]: mean 2, sd 2.828 -> 1.414
    expect(xyzClassFor(coefficientOfVariation([0, 4]))).toBe('Z');
    expect(xyzClassFor(0.5)).toBe('Y');
    expect(xyzClassFor(1)).toBe('Z');
  });
});

// =============================================================================
// Cash conversion cycle
// =============================================================================

describe('cashConversionCycle', () => {
  it('adds DIO and DSO and subtracts DPO', () => {
    expect(cashConversionCycle(45.2, 32.1, 28.5)).toBe(48.8);
  });

  it('can go negative', () => {
    expect(cashConversionCycle(10, 5, 30)).toBe(-15);
  });
});

describe('weightedDays', () => {
  it('weights days by amount and skips rows without days', () => {
    // (30 x 100 + 60 x 300) / 400 = 52.5
    const result = weightedDays([
      { days: 30, amount: 100 },
      { days: 60, amount: 300 },
      { days: null, amount: 1000 },
    ]);
    expect(result).toBe(52.5);
  });

  it('returns null when no amount remains', () => {
    expect(weightedDays([])).toBeNull();
    expect(weightedDays([{ days: null, amount: 50 }])).toBeNull();
  });
});

describe('daysInventoryOutstanding', () => {
  it('divides inventory value by average daily COGS', () => {
    // daily COGS = 3000 / 30 = 100
    expect(daysInventoryOutstanding(1000, 3000, 30)).toBe(10);
  });

  it('returns 0 without COGS or sales days', () => {
    expect(daysInventoryOutstanding(1000, 0, 30)).toBe(0);
    expect(daysInventoryOutstanding(1000, 3000, 0)).toBe(0);
  });
});

describe('cashFreed', () => {
  it('is days x annual revenue / 365', () => {
    expect(cashFreed(10, 365_000)).toBe(10_000);
  });
});

// =============================================================================
// Concentration & aging
// =============================================================================

describe('concentrationRisk', () => {
  it('uses strict thresholds at 80 and 50', () => {
    expect(concentrationRisk(81)).toBe('high');
    expect(concentrationRisk(80)).toBe('medium');
    expect(concentrationRisk(51)).toBe('medium');
    expect(concentrationRisk(50)).toBe('low');
  });
});

describe('agingBucketRank', () => {
  it('orders the usual bucket labels and puts unknown ones last', () => {
    const labels = ['90+', 'unknown', '31-60', 'Current', '61-90', '1-30'];
    const sorted = [...labels].sort((a, b) => agingBucketRank(a) - agingBucketRank(b));
    expect(sorted).toEqual(['Current', '1-30', '31-60', '61-90', '90+', 'unknown']);
  });
});
