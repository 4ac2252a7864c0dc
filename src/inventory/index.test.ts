import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runAnalysis } from '../analyses/runner';
import { shutdownRuntime, type EngineRuntime } from '../runtime';
import { createTestRuntime, upload } from '../test-helpers';

describe('inventory analyses', () => {
  let runtime: EngineRuntime;

  beforeEach(() => {
    ({ runtime } = createTestRuntime());
  });

  afterEach(async () => {
    await shutdownRuntime(runtime);
  });

  // ===========================================================================
  // Reorder alerts
  // ===========================================================================

  it('flags current stock below and near the reorder point', async () => {
    await upload(runtime, 'inventory_snapshot', [
      'snapshot_date,product_id,qty_on_hand,reorder_point',
      '2024-06-01,P4,0,100',
      '2024-06-30,P1,80,100',
      '2024-06-30,P2,110,100',
      '2024-06-30,P3,130,100',
    ]);

    expect(await runAnalysis(runtime, 'get_reorder_alerts')).toEqual({
      status: 'ok',
      analysis: 'get_reorder_alerts',
      data: {
        totalAlerts: 2,
        critical: 1,
        warning: 1,
        alerts: [
          { productId: 'P1', locationId: null, qtyOnHand: 80, reorderPoint: 100, safetyStockTarget: null, severity: 'critical', stockRatio: 0.8 },
          { productId: 'P2', locationId: null, qtyOnHand: 110, reorderPoint: 100, safetyStockTarget: null, severity: 'warning', stockRatio: 1.1 },
        ],
      },
    });
  });

  // ===========================================================================
  // Dead stock
  // ===========================================================================

  it('finds stock without a sale in more than 90 days', async () => {
    await upload(runtime, 'inventory_snapshot', [
      'snapshot_date,product_id,qty_on_hand,reorder_point,unit_cost',
      '2024-06-30,P1,10,1,2',
      '2024-06-30,P2,20,1,3',
      '2024-06-30,P3,5,1,4',
      '2024-06-30,P4,50,1,9',
    ]);
    await upload(runtime, 'sales_transactions', [
      'transaction_date,product_id,qty_sold,total_revenue',
      '2024-04-01,P1,1,5',
      '2024-03-31,P2,1,5',
      '2024-06-20,P4,1,5',
    ]);

    // Today is 2024-06-30: P1 idle 90 days (kept), P2 idle 91 days, P3 never sold
    expect(await runAnalysis(runtime, 'get_dead_stock')).toEqual({
      status: 'ok',
      analysis: 'get_dead_stock',
      data: {
        daysThreshold: 90,
        basis: 'sales_history',
        deadStockCount: 2,
        totalValueAtRisk: 80,
        items: [
          { productId: 'P2', qtyOnHand: 20, valueAtRisk: 60, lastSaleDate: '2024-03-31', daysIdle: 91, neverSold: false },
          { productId: 'P3', qtyOnHand: 5, valueAtRisk: 20, lastSaleDate: null, daysIdle: null, neverSold: true },
        ],
      },
    });
  });

  it('falls back to snapshot movement without sales history', async () => {
    await upload(runtime, 'inventory_snapshot', [
      'snapshot_date,product_id,qty_on_hand,reorder_point,unit_cost,days_since_last_movement',
      '2024-06-30,P1,10,1,2,120',
      '2024-06-30,P2,10,1,2,30',
    ]);

    const outcome = await runAnalysis(runtime, 'get_dead_stock', { days: 60 });
    expect(outcome).toMatchObject({
      status: 'ok',
      data: {
        daysThreshold: 60,
        basis: 'snapshot_movement',
        deadStockCount: 1,
        items: [{ productId: 'P1', valueAtRisk: 20, daysIdle: 120, neverSold: false }],
      },
    });
  });

  // ===========================================================================
  // Safety stock & EOQ
  // ===========================================================================

  it('uses default sigma and lead time when nothing is known', async () => {
    // 1.65 x 50 x sqrt(14) = 308.7
    expect(await runAnalysis(runtime, 'calculate_safety_stock', { skus: ['P9'] })).toEqual({
      status: 'ok',
      analysis: 'calculate_safety_stock',
      data: {
        formula: 'SS = Z x sigma_d x sqrt(LT)',
        serviceLevel: 0.95,
        zScore: 1.65,
        truncated: false,
        results: [
          {
            productId: 'P9',
            safetyStock: 309,
            demandStdDev: 50,
            leadTimeDays: 14,
            sigmaSource: 'default',
            leadTimeSource: 'default',
          },
        ],
      },
    });
  });

  it('annualizes observed demand for EOQ', async () => {
    await upload(runtime, 'products', ['product_id,product_name,unit_cost', 'P1,Bracket,10']);
    await upload(runtime, 'sales_transactions', [
      'transaction_date,product_id,qty_sold,total_revenue',
      '2024-06-01,P1,10,100',
      '2024-06-02,P1,10,100',
    ]);

    // D = 10/day x 365 = 3650; H = 10 x 0.25 = 2.5; EOQ = sqrt(2 x 3650 x 50 / 2.5) = 382.1
    expect(await runAnalysis(runtime, 'calculate_eoq', { skus: ['P1'] })).toEqual({
      status: 'ok',
      analysis: 'calculate_eoq',
      data: {
        formula: 'EOQ = sqrt(2 x D x S / H)',
        orderCost: 50,
        holdingCostPct: 0.25,
        truncated: false,
        results: [
          {
            productId: 'P1',
            annualDemand: 3650,
            unitCost: 10,
            unitCostSource: 'product_master',
            holdingCostPerUnit: 2.5,
            eoq: 382,
            ordersPerYear: 9.6,
          },
        ],
      },
    });
  });
});
