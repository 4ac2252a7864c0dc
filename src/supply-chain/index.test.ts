import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runAnalysis } from '../analyses/runner';
import type { MemoryGraphStore } from '../graph/memory';
import { shutdownRuntime, type EngineRuntime } from '../runtime';
import { createTestRuntime, upload } from '../test-helpers';

const SUPPLIERS = [
  'supplier_id,supplier_name,avg_lead_time_days,on_time_delivery_rate,quality_rejection_rate',
  'S1,Acme,20,0.75,0.02',
  'S2,Beta,,,',
];

const PURCHASE_ORDERS = [
  'po_number,supplier_id,product_id,qty_ordered',
  'PO1,S1,P1,10',
  'PO2,S1,P2,5',
  'PO3,S2,P2,5',
];

describe('supply chain analyses', () => {
  let runtime: EngineRuntime;
  let graph: MemoryGraphStore;

  beforeEach(() => {
    ({ runtime, graph } = createTestRuntime());
  });

  afterEach(async () => {
    await shutdownRuntime(runtime);
  });

  // ===========================================================================
  // Risk scores
  // ===========================================================================

  it('scores suppliers and fills gaps with defaults', async () => {
    await upload(runtime, 'suppliers', SUPPLIERS);

    // S1: 0.3 x 45 + 0.4 x 50 + 0.3 x 20 = 39.5
    // S2: 0.3 x 27 + 0.4 x 20 + 0.3 x 10 = 19.1 (lead 14, OTD 0.9, QRR 0.01)
    expect(await runAnalysis(runtime, 'get_supplier_risk_scores')).toEqual({
      status: 'ok',
      analysis: 'get_supplier_risk_scores',
      data: {
        suppliers: [
          {
            supplierId: 'S1',
            supplierName: 'Acme',
            riskScore: 39.5,
            riskLevel: 'medium',
            leadTimeDays: 20,
            onTimeDeliveryRate: 0.75,
            qualityRejectionRate: 0.02,
            components: { leadTime: 45, onTimeDelivery: 50, quality: 20 },
          },
          {
            supplierId: 'S2',
            supplierName: 'Beta',
            riskScore: 19.1,
            riskLevel: 'low',
            leadTimeDays: null,
            onTimeDeliveryRate: null,
            qualityRejectionRate: null,
            components: { leadTime: 27, onTimeDelivery: 20, quality: 10 },
          },
        ],
      },
    });
  });

  // ===========================================================================
  // Single-source risks
  // ===========================================================================

  it('answers single-source risks from the graph', async () => {
    await upload(runtime, 'suppliers', SUPPLIERS);
    await upload(runtime, 'purchase_orders', PURCHASE_ORDERS);

    expect(await runAnalysis(runtime, 'find_single_source_risks')).toEqual({
      status: 'ok',
      analysis: 'find_single_source_risks',
      data: {
        source: 'graph',
        total: 1,
        risks: [{ productId: 'P1', supplierId: 'S1', supplierName: 'Acme', risk: 'high' }],
      },
    });
  });

  it('falls back to purchase orders when the graph is down', async () => {
    await upload(runtime, 'suppliers', SUPPLIERS);
    await upload(runtime, 'purchase_orders', PURCHASE_ORDERS);
    graph.setAvailable(false);

    expect(await runAnalysis(runtime, 'find_single_source_risks')).toEqual({
      status: 'ok',
      analysis: 'find_single_source_risks',
      data: {
        source: 'tabular',
        note: 'Graph store unavailable (Graph store is unavailable); derived from purchase_orders.',
        total: 1,
        risks: [{ productId: 'P1', supplierId: 'S1', supplierName: 'Acme', risk: 'high' }],
      },
    });
  });

  // ===========================================================================
  // Ripple effect
  // ===========================================================================

  it('lists the products a supplier failure would hit', async () => {
    await upload(runtime, 'suppliers', SUPPLIERS);
    await upload(runtime, 'purchase_orders', PURCHASE_ORDERS);

    expect(await runAnalysis(runtime, 'ripple_effect_analysis', { supplier_id: 'S1' })).toEqual({
      status: 'ok',
      analysis: 'ripple_effect_analysis',
      data: {
        source: 'graph',
        supplierId: 'S1',
        supplierName: 'Acme',
        impactedProducts: ['P1', 'P2'],
        count: 2,
        severity: 'low',
      },
    });
  });

  it('reports an unknown supplier as not found', async () => {
    await upload(runtime, 'purchase_orders', PURCHASE_ORDERS);

    expect(await runAnalysis(runtime, 'ripple_effect_analysis', { supplier_id: 'S9' })).toEqual({
      status: 'not_found',
      analysis: 'ripple_effect_analysis',
      message: "Supplier 'S9' not found.",
    });
  });
});
