import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runAnalysis } from '../analyses/runner';
import { shutdownRuntime, type EngineRuntime } from '../runtime';
import { createTestRuntime, upload } from '../test-helpers';

describe('metrics analyses', () => {
  let runtime: EngineRuntime;

  beforeEach(() => {
    ({ runtime } = createTestRuntime());
  });

  afterEach(async () => {
    await shutdownRuntime(runtime);
  });

  // ===========================================================================
  // get_kpi_summary
  // ===========================================================================

  it('computes the cash conversion cycle from all four datasets', async () => {
    await upload(runtime, 'inventory_snapshot', [
      'snapshot_date,product_id,qty_on_hand,reorder_point,inventory_value',
      '2024-06-30,P1,100,50,4520',
    ]);
    await upload(runtime, 'sales_transactions', [
      'transaction_date,product_id,qty_sold,total_revenue,total_cost',
      '2024-06-01,P1,10,200,100',
      '2024-06-02,P1,10,200,100',
    ]);
    await upload(runtime, 'ar_ledger', ['invoice_id,customer_id,invoice_amount,days_to_pay', 'A1,C1,100,32.1']);
    await upload(runtime, 'ap_ledger', ['invoice_id,supplier_id,invoice_amount,actual_days_to_pay', 'B1,S1,100,28.5']);

    // DIO = 4520 / (200 / 2) = 45.2; CCC = 45.2 + 32.1 - 28.5 = 48.8
    expect(await runAnalysis(runtime, 'get_kpi_summary')).toEqual({
      status: 'ok',
      analysis: 'get_kpi_summary',
      data: { formula: 'CCC = DIO + DSO - DPO', unit: 'days', dio: 45.2, dso: 32.1, dpo: 28.5, ccc: 48.8 },
    });
  });

  it('counts each missing metric as 0 with a note', async () => {
    const outcome = await runAnalysis(runtime, 'get_kpi_summary');
    expect(outcome).toEqual({
      status: 'ok',
      analysis: 'get_kpi_summary',
      data: {
        formula: 'CCC = DIO + DSO - DPO',
        unit: 'days',
        dio: 0,
        dso: 0,
        dpo: 0,
        ccc: 0,
        dioNote: 'Upload inventory_snapshot and sales_transactions to compute DIO; counted as 0.',
        dsoNote: 'Upload ar_ledger to compute DSO; counted as 0.',
        dpoNote: 'Upload ap_ledger to compute DPO; counted as 0.',
      },
    });
  });

  // ===========================================================================
  // Working capital & Pareto
  // ===========================================================================

  it('ranks cash trapped in the current snapshot', async () => {
    await upload(runtime, 'inventory_snapshot', [
      'snapshot_date,product_id,qty_on_hand,reorder_point,unit_cost',
      '2024-06-01,P1,999,5,2',
      '2024-06-30,P1,10,5,2',
      '2024-06-30,P2,5,5,10',
    ]);

    expect(await runAnalysis(runtime, 'get_working_capital_summary')).toEqual({
      status: 'ok',
      analysis: 'get_working_capital_summary',
      data: {
        totalCashTrapped: 70,
        productCount: 2,
        topProducts: [
          { productId: 'P2', units: 5, cashTrapped: 50 },
          { productId: 'P1', units: 10, cashTrapped: 20 },
        ],
      },
    });
  });

  it('classifies products by revenue share', async () => {
    await upload(runtime, 'sales_transactions', [
      'transaction_date,product_id,qty_sold,total_revenue',
      '2024-06-01,P1,1,50',
      '2024-06-01,P2,1,30',
      '2024-06-01,P3,1,15',
      '2024-06-01,P4,1,5',
    ]);

    const outcome = await runAnalysis(runtime, 'get_pareto_analysis');
    expect(outcome).toMatchObject({
      status: 'ok',
      data: {
        dimension: 'revenue',
        totalSkus: 4,
        totalValue: 100,
        skusDriving80Pct: 2,
        pctOfSkus: 50,
        paretoData: [
          { productId: 'P1', abcClass: 'A', cumulativePct: 50 },
          { productId: 'P2', abcClass: 'A', cumulativePct: 80 },
          { productId: 'P3', abcClass: 'B', cumulativePct: 95 },
          { productId: 'P4', abcClass: 'C', cumulativePct: 100 },
        ],
      },
    });
  });

  // ===========================================================================
  // simulate_ccc_improvement
  // ===========================================================================

  it('prices each lever at annual revenue / 365 per day', async () => {
    const outcome = await runAnalysis(runtime, 'simulate_ccc_improvement', {
      dio_reduction: 5,
      dso_reduction: 3,
      dpo_increase: 2,
      annual_revenue: 365_000,
    });

    expect(outcome).toEqual({
      status: 'ok',
      analysis: 'simulate_ccc_improvement',
      data: {
        annualRevenue: 365000,
        revenueSource: 'parameter',
        dailyRevenue: 1000,
        totalDaysSaved: 10,
        totalCashFreed: 10000,
        breakdown: [
          { lever: 'dio', action: 'Reduce days inventory outstanding', days: 5, cashFreed: 5000 },
          { lever: 'dso', action: 'Collect receivables faster', days: 3, cashFreed: 3000 },
          { lever: 'dpo', action: 'Extend supplier payment terms', days: 2, cashFreed: 2000 },
        ],
        currentCcc: 0,
        projectedCcc: -10,
      },
    });
  });

  it('needs sales history when no revenue is given', async () => {
    expect(await runAnalysis(runtime, 'simulate_ccc_improvement', { dio_reduction: 5 })).toEqual({
      status: 'insufficient_data',
      analysis: 'simulate_ccc_improvement',
      message: 'Upload sales_transactions to enable this analysis. Or pass annual_revenue.',
      missing: ['sales_transactions'],
    });
  });

  // ===========================================================================
  // get_dso_analysis / get_dpo_analysis
  // ===========================================================================

  it('weights DSO by invoice amount', async () => {
    await upload(runtime, 'ar_ledger', ['invoice_id,customer_id,invoice_amount,days_to_pay', 'A1,C1,100,30', 'A2,C2,300,50']);

    // (100 x 30 + 300 x 50) / 400 = 45
    expect(await runAnalysis(runtime, 'get_dso_analysis')).toMatchObject({
      status: 'ok',
      data: { overallDso: 45, byCustomer: [{ id: 'C2', weightedDays: 50 }, { id: 'C1', weightedDays: 30 }] },
    });
  });

  it('reports DSO as no data when every invoice amount is 0', async () => {
    await upload(runtime, 'ar_ledger', ['invoice_id,customer_id,invoice_amount,days_to_pay', 'A1,C1,0,30']);

    expect(await runAnalysis(runtime, 'get_dso_analysis')).toEqual({
      status: 'insufficient_data',
      analysis: 'get_dso_analysis',
      message: 'No ar_ledger entries with a known days_to_pay and a non-zero amount to compute DSO.',
      missing: [],
    });
  });

  it('reports DPO as no data when no invoice has payment days', async () => {
    await upload(runtime, 'ap_ledger', ['invoice_id,supplier_id,invoice_amount,actual_days_to_pay', 'B1,S1,100,', 'B2,S1,50,']);

    expect(await runAnalysis(runtime, 'get_dpo_analysis')).toEqual({
      status: 'insufficient_data',
      analysis: 'get_dpo_analysis',
      message: 'No ap_ledger entries with a known actual_days_to_pay and a non-zero amount to compute DPO.',
      missing: [],
    });
  });

  it('still counts an undefined DSO as 0 in the KPI summary', async () => {
    await upload(runtime, 'ar_ledger', ['invoice_id,customer_id,invoice_amount,days_to_pay', 'A1,C1,0,30']);

    expect(await runAnalysis(runtime, 'get_kpi_summary')).toMatchObject({
      status: 'ok',
      data: {
        dso: 0,
        dsoNote: 'No ar_ledger entries with a known days_to_pay and a non-zero amount to compute DSO; counted as 0.',
      },
    });
  });
});
