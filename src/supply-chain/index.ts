/**
 * Supply Chain Module - supplier risk, performance and the supplier network
 *
 * Network questions go to the graph store first. A graph that is unreachable
 * or holds nothing for the question is answered from suppliers and
 * purchase_orders instead, annotated source: 'tabular' with a note.
 */

import type { TabularHandle } from '../db';
import { col, columnSet, lookupRows } from '../db/sql';
import { num, numOrNull, round1, round2, str, strOrNull } from '../db/values';
import { isAvailable } from '../availability';
import { withGraph, type GraphSession, type SupplierNode, type SuppliesEdge } from '../graph';
import { supplierNodeFromRow } from '../graph/sync';
import { defineAnalysis, type RegisteredAnalysis } from '../analyses/registry';
import { readLimit, readString } from '../analyses/params';
import { notFound, ok, type AnalysisContext } from '../analyses/types';
import { concentrationRisk } from '../metrics/calculations';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../infra/errors';
import { compareIds } from '../utils/stats';
import {
  byLeadTimeDesc,
  byOtdDesc,
  leadTimeStats,
  rankAlternatives,
  riskComponents,
  riskLevel,
  rippleSeverity,
  supplierRiskScore,
} from './calculations';
import type {
  AlternativeSuppliers,
  LeadTimeLine,
  LeadTimeVariability,
  RippleEffect,
  SingleSourceReport,
  SupplierConcentration,
  SupplierNetwork,
  SupplierPerformance,
  SupplierRisk,
  SupplierShare,
} from './types';

export * from './types';
export {
  supplierRiskScore,
  riskComponents,
  riskLevel,
  rippleSeverity,
  rankAlternatives,
  leadTimeStats,
  RISK_DEFAULTS,
} from './calculations';

const logger = createLogger('supply-chain');

// ---------------------------------------------------------------------------
// Graph access with fallback
// ---------------------------------------------------------------------------

type GraphAttempt<T> = { ok: true; value: T } | { ok: false; error: string };

async function tryGraph<T>(ctx: AnalysisContext, fn: (session: GraphSession) => Promise<T>): Promise<GraphAttempt<T>> {
  try {
    return { ok: true, value: await withGraph(ctx.graph, fn) };
  } catch (err) {
    const error = errorMessage(err);
    logger.warn({ err: error }, 'Graph query failed; using tabular fallback');
    return { ok: false, error };
  }
}

function fallbackNote(attempt: GraphAttempt<unknown>, emptyReason: string, derivedFrom: string): string {
  return attempt.ok
    ? `${emptyReason}; derived from ${derivedFrom}.`
    : `Graph store unavailable (${attempt.error}); derived from ${derivedFrom}.`;
}

// ---------------------------------------------------------------------------
// Tabular readers
// ---------------------------------------------------------------------------

const SUPPLIER_FIELDS = ['supplier_name', 'avg_lead_time_days', 'rating', 'on_time_delivery_rate', 'country'];

/** Supplier master rows as graph-shaped nodes, by supplier id */
function tabularSuppliers(db: TabularHandle): Map<string, SupplierNode> {
  const nodes = new Map<string, SupplierNode>();
  for (const [id, row] of lookupRows(db, 'suppliers', 'supplier_id', SUPPLIER_FIELDS)) {
    const node = supplierNodeFromRow({ ...row, supplier_id: id });
    if (node) nodes.set(node.supplierId, node);
  }
  return nodes;
}

interface SupplyPair {
  supplierId: string;
  productId: string;
}

function purchaseOrderPairs(db: TabularHandle): SupplyPair[] {
  if (!isAvailable(db, 'purchase_orders')) return [];
  return db
    .query(
      `SELECT DISTINCT CAST(supplier_id AS TEXT) AS supplier_id, CAST(product_id AS TEXT) AS product_id
       FROM purchase_orders WHERE supplier_id IS NOT NULL AND product_id IS NOT NULL`,
    )
    .map((row) => ({ supplierId: str(row.supplier_id).trim(), productId: str(row.product_id).trim() }))
    .filter((p) => p.supplierId !== '' && p.productId !== '');
}

// ---------------------------------------------------------------------------
// Catalogue: tabular analyses
// ---------------------------------------------------------------------------

const riskScores = defineAnalysis<Record<string, never>, { suppliers: SupplierRisk[] }>({
  name: 'get_supplier_risk_scores',
  category: 'supplier',
  description: 'Supplier risk score (0-100) from lead time, on-time delivery and quality rejections, highest risk first.',
  tags: ['supplier', 'risk', 'score', 'otd', 'quality'],
  requires: { all: ['suppliers'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const suppliers = lookupRows(db, 'suppliers', 'supplier_id', [
      'supplier_name',
      'avg_lead_time_days',
      'on_time_delivery_rate',
      'quality_rejection_rate',
    ]);
    const scored = Array.from(suppliers.entries())
      .map(([supplierId, row]): SupplierRisk => {
        const input = {
          leadTimeDays: numOrNull(row.avg_lead_time_days),
          onTimeDeliveryRate: numOrNull(row.on_time_delivery_rate),
          qualityRejectionRate: numOrNull(row.quality_rejection_rate),
        };
        const c = riskComponents(input);
        const score = supplierRiskScore(input);
        return {
          supplierId,
          supplierName: strOrNull(row.supplier_name),
          riskScore: score,
          riskLevel: riskLevel(score),
          ...input,
          components: { leadTime: round1(c.leadTime), onTimeDelivery: round1(c.onTimeDelivery), quality: round1(c.quality) },
        };
      })
      .sort((a, b) => b.riskScore - a.riskScore || compareIds(a.supplierId, b.supplierId));
    return ok({ suppliers: scored });
  },
});

const performance = defineAnalysis<Record<string, never>, { suppliers: SupplierPerformance[] }>({
  name: 'get_supplier_performance',
  category: 'supplier',
  description: 'Supplier scorecard: lead time, on-time delivery, quality and rating, with PO volume and shipment delays when uploaded.',
  tags: ['supplier', 'performance', 'scorecard', 'otd'],
  requires: { all: ['suppliers'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const suppliers = lookupRows(db, 'suppliers', 'supplier_id', [
      'supplier_name',
      'avg_lead_time_days',
      'on_time_delivery_rate',
      'quality_rejection_rate',
      'rating',
      'country',
    ]);

    const orders = new Map<string, { count: number; value: number | null }>();
    if (isAvailable(db, 'purchase_orders')) {
      const cols = columnSet(db, 'purchase_orders');
      for (const row of db.query(
        `SELECT supplier_id, COUNT(*) AS orders, SUM(${col(cols, 'total_po_value')}) AS value
         FROM purchase_orders WHERE supplier_id IS NOT NULL GROUP BY supplier_id`,
      )) {
        orders.set(str(row.supplier_id), { count: num(row.orders), value: numOrNull(row.value) });
      }
    }

    const delays = new Map<string, number | null>();
    if (isAvailable(db, 'shipments')) {
      const cols = columnSet(db, 'shipments');
      if (cols.has('supplier_id')) {
        for (const row of db.query(
          `SELECT supplier_id, AVG(${col(cols, 'delay_days')}) AS delay
           FROM shipments WHERE supplier_id IS NOT NULL GROUP BY supplier_id`,
        )) {
          delays.set(str(row.supplier_id), numOrNull(row.delay));
        }
      }
    }

    const lines = Array.from(suppliers.entries())
      .map(([supplierId, row]): SupplierPerformance => {
        const po = orders.get(supplierId);
        const poValue = po?.value ?? null;
        const delay = delays.get(supplierId) ?? null;
        return {
          supplierId,
          supplierName: strOrNull(row.supplier_name),
          avgLeadTimeDays: numOrNull(row.avg_lead_time_days),
          onTimeDeliveryRate: numOrNull(row.on_time_delivery_rate),
          qualityRejectionRate: numOrNull(row.quality_rejection_rate),
          rating: numOrNull(row.rating),
          country: strOrNull(row.country),
          purchaseOrders: orders.size > 0 ? po?.count ?? 0 : null,
          totalPoValue: poValue === null ? null : round2(poValue),
          avgDelayDays: delay === null ? null : round1(delay),
        };
      })
      .sort(byOtdDesc);
    return ok({ suppliers: lines });
  },
});

const concentration = defineAnalysis<Record<string, never>, SupplierConcentration>({
  name: 'get_supplier_concentration',
  category: 'supplier',
  description: 'Purchase volume per supplier and the share held by the top three, labelled high above 80% and medium above 50%.',
  tags: ['supplier', 'concentration', 'spend', 'risk'],
  requires: { all: ['purchase_orders'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const cols = columnSet(db, 'purchase_orders');
    const measure = cols.has('total_po_value') ? 'total_po_value' : 'qty_ordered';
    const names = lookupRows(db, 'suppliers', 'supplier_id', ['supplier_name']);

    const rows = db
      .query(
        `SELECT supplier_id, COUNT(*) AS orders, COALESCE(SUM(${col(cols, measure)}), 0) AS value
         FROM purchase_orders WHERE supplier_id IS NOT NULL GROUP BY supplier_id`,
      )
      .map((row) => ({ supplierId: str(row.supplier_id), orders: num(row.orders), value: num(row.value) }))
      .sort((a, b) => b.value - a.value || compareIds(a.supplierId, b.supplierId));

    let total = 0;
    for (const r of rows) total += r.value;
    const share = (value: number) => (total > 0 ? (value * 100) / total : 0);

    let top3 = 0;
    for (const r of rows.slice(0, 3)) top3 += share(r.value);

    return ok({
      measure,
      totalValue: round2(total),
      top3SharePct: round1(top3),
      concentrationRisk: concentrationRisk(top3),
      suppliers: rows.map(
        (r): SupplierShare => ({
          supplierId: r.supplierId,
          supplierName: strOrNull(names.get(r.supplierId)?.supplier_name),
          orders: r.orders,
          value: round2(r.value),
          valuePct: round1(share(r.value)),
        }),
      ),
    });
  },
});

// ---------------------------------------------------------------------------
// Catalogue: graph-backed analyses
// ---------------------------------------------------------------------------

function summarizeNetwork(edges: SuppliesEdge[]): Pick<SupplierNetwork, 'supplierCount' | 'productCount' | 'relationships'> {
  return {
    supplierCount: new Set(edges.map((e) => e.supplierId)).size,
    productCount: new Set(edges.map((e) => e.productId)).size,
    relationships: edges.length,
  };
}

const network = defineAnalysis<Record<string, never>, SupplierNetwork>({
  name: 'get_supplier_network',
  category: 'supplier',
  description: 'Every supplier-to-product relationship with supplier name and lead time.',
  tags: ['supplier', 'network', 'graph', 'relationships'],
  requires: { all: ['purchase_orders'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: async (ctx) => {
    const attempt = await tryGraph(ctx, (s) => s.edges());
    if (attempt.ok && attempt.value.length > 0) {
      return ok({ source: 'graph', ...summarizeNetwork(attempt.value), network: attempt.value });
    }

    const suppliers = tabularSuppliers(ctx.db);
    const edges = purchaseOrderPairs(ctx.db)
      .map((p): SuppliesEdge => {
        const s = suppliers.get(p.supplierId);
        return { supplierId: p.supplierId, supplierName: s?.supplierName ?? null, leadTime: s?.leadTime ?? null, productId: p.productId };
      })
      .sort((a, b) => compareIds(a.supplierName ?? '', b.supplierName ?? '') || compareIds(a.productId, b.productId));

    return ok({
      source: 'tabular',
      note: fallbackNote(attempt, 'Graph store has no SUPPLIES relationships', 'purchase_orders'),
      ...summarizeNetwork(edges),
      network: edges,
    });
  },
});

const singleSource = defineAnalysis<{ limit: number }, SingleSourceReport>({
  name: 'find_single_source_risks',
  category: 'supplier',
  description: 'Products that depend on exactly one supplier.',
  tags: ['single-source', 'supplier', 'risk', 'dependency'],
  requires: { all: ['purchase_orders'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 50, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 50) }),
  run: async (ctx, { limit }) => {
    const attempt = await tryGraph(ctx, (s) => s.singleSourceProducts(limit));
    if (attempt.ok && attempt.value.length > 0) {
      const risks = attempt.value.map((r) => ({ ...r, risk: 'high' as const }));
      return ok({ source: 'graph', total: risks.length, risks });
    }

    const suppliers = tabularSuppliers(ctx.db);
    const bySupplierSet = new Map<string, Set<string>>();
    for (const pair of purchaseOrderPairs(ctx.db)) {
      const set = bySupplierSet.get(pair.productId) ?? new Set<string>();
      set.add(pair.supplierId);
      bySupplierSet.set(pair.productId, set);
    }
    const risks = Array.from(bySupplierSet.entries())
      .filter(([, set]) => set.size === 1)
      .map(([productId, set]) => {
        const [supplierId] = [...set];
        return {
          productId,
          supplierId,
          supplierName: suppliers.get(supplierId)?.supplierName ?? null,
          risk: 'high' as const,
        };
      })
      .sort((a, b) => compareIds(a.productId, b.productId))
      .slice(0, limit);

    return ok({
      source: 'tabular',
      note: fallbackNote(attempt, 'Graph store has no single-source products', 'purchase_orders'),
      total: risks.length,
      risks,
    });
  },
});

const ripple = defineAnalysis<{ supplierId: string }, RippleEffect>({
  name: 'ripple_effect_analysis',
  category: 'supplier',
  description: 'Products affected if a supplier fails, with a severity by how many depend on it.',
  tags: ['ripple', 'supplier', 'disruption', 'impact'],
  requires: { all: ['purchase_orders'] },
  input_schema: {
    type: 'object',
    properties: { supplier_id: { type: 'string', description: 'Supplier id' } },
    required: ['supplier_id'],
  },
  parse: (input) => ({ supplierId: readString(input, 'supplier_id') }),
  run: async (ctx, { supplierId }) => {
    const suppliers = tabularSuppliers(ctx.db);
    const supplierName = suppliers.get(supplierId)?.supplierName ?? null;

    const attempt = await tryGraph(ctx, async (s) => ({
      exists: await s.supplierExists(supplierId),
      products: await s.productsSuppliedBy(supplierId),
    }));
    if (attempt.ok && attempt.value.products.length > 0) {
      const products = attempt.value.products;
      return ok({
        source: 'graph',
        supplierId,
        supplierName,
        impactedProducts: products,
        count: products.length,
        severity: rippleSeverity(products.length),
      });
    }

    const ordered = ctx.db.query(
      'SELECT COUNT(*) AS orders FROM purchase_orders WHERE CAST(supplier_id AS TEXT) = ?',
      [supplierId],
    );
    const known = (attempt.ok && attempt.value.exists) || suppliers.has(supplierId) || num(ordered[0]?.orders) > 0;
    if (!known) {
      return notFound(`Supplier '${supplierId}' not found.`);
    }

    const products = purchaseOrderPairs(ctx.db)
      .filter((p) => p.supplierId === supplierId)
      .map((p) => p.productId)
      .sort(compareIds);
    return ok({
      source: 'tabular',
      note: fallbackNote(attempt, 'Graph store has no products for this supplier', 'purchase_orders'),
      supplierId,
      supplierName,
      impactedProducts: products,
      count: products.length,
      severity: rippleSeverity(products.length),
    });
  },
});

const alternatives = defineAnalysis<{ sku: string; limit: number }, AlternativeSuppliers>({
  name: 'find_alternative_suppliers',
  category: 'supplier',
  description: 'Suppliers not yet supplying a product, best rated first then shortest lead time, with its current suppliers.',
  tags: ['alternative', 'supplier', 'sourcing', 'backup'],
  requires: { all: ['suppliers'] },
  input_schema: {
    type: 'object',
    properties: {
      sku: { type: 'string', description: 'Product id' },
      max_results: { type: 'integer', description: 'Alternatives to return', default: 5, minimum: 1 },
    },
    required: ['sku'],
  },
  parse: (input, policy) => ({
    sku: readString(input, 'sku'),
    limit: readLimit(input, policy.alternativeSupplierLimit, 'max_results'),
  }),
  run: async (ctx, { sku, limit }) => {
    const attempt = await tryGraph(ctx, async (s) => ({
      current: await s.suppliersOf(sku),
      all: await s.allSuppliers(),
    }));
    if (attempt.ok && attempt.value.all.length > 0) {
      const { current, all } = attempt.value;
      return ok({
        source: 'graph',
        productId: sku,
        currentSuppliers: current,
        alternatives: rankAlternatives(all, new Set(current.map((s) => s.supplierId)), limit),
      });
    }

    const suppliers = tabularSuppliers(ctx.db);
    const currentIds = new Set(
      purchaseOrderPairs(ctx.db)
        .filter((p) => p.productId === sku)
        .map((p) => p.supplierId),
    );
    const current = [...currentIds].sort(compareIds).map(
      (id): SupplierNode =>
        suppliers.get(id) ?? { supplierId: id, supplierName: null, leadTime: null, rating: null, otdRate: null, country: null },
    );

    return ok({
      source: 'tabular',
      note: fallbackNote(attempt, 'Graph store has no suppliers', 'suppliers and purchase_orders'),
      productId: sku,
      currentSuppliers: current,
      alternatives: rankAlternatives([...suppliers.values()], currentIds, limit),
    });
  },
});

/** Observed order-to-expected-delivery days per supplier */
function observedLeadTimes(db: TabularHandle): Map<string, number[]> {
  const observed = new Map<string, number[]>();
  if (!isAvailable(db, 'purchase_orders')) return observed;
  const cols = columnSet(db, 'purchase_orders');
  if (!cols.has('order_date') || !cols.has('expected_delivery_date')) return observed;

  for (const row of db.query(
    `SELECT supplier_id, julianday(expected_delivery_date) - julianday(order_date) AS days
     FROM purchase_orders
     WHERE supplier_id IS NOT NULL AND order_date IS NOT NULL AND expected_delivery_date IS NOT NULL`,
  )) {
    const days = numOrNull(row.days);
    if (days === null) continue;
    const id = str(row.supplier_id);
    const list = observed.get(id) ?? [];
    list.push(days);
    observed.set(id, list);
  }
  return observed;
}

const leadTimeVariability = defineAnalysis<Record<string, never>, LeadTimeVariability>({
  name: 'get_lead_time_variability',
  category: 'supplier',
  description: 'Supplier lead times, longest first, with the spread observed across purchase orders.',
  tags: ['lead', 'time', 'variability', 'supplier'],
  requires: { all: ['suppliers'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: async (ctx) => {
    const attempt = await tryGraph(ctx, (s) => s.allSuppliers());
    const fromGraph = attempt.ok && attempt.value.length > 0;
    const nodes = attempt.ok && fromGraph ? attempt.value : [...tabularSuppliers(ctx.db).values()];
    const observed = observedLeadTimes(ctx.db);

    const lines = nodes
      .map(
        (n): LeadTimeLine => ({
          supplierId: n.supplierId,
          supplierName: n.supplierName,
          leadTimeDays: n.leadTime,
          observed: leadTimeStats(observed.get(n.supplierId) ?? []),
        }),
      )
      .sort(byLeadTimeDesc);

    const known = lines.map((l) => l.leadTimeDays).filter((v): v is number => v !== null);
    let totalLead = 0;
    for (const v of known) totalLead += v;

    const report: LeadTimeVariability = {
      source: fromGraph ? 'graph' : 'tabular',
      averageLeadTime: known.length > 0 ? round1(totalLead / known.length) : null,
      minLeadTime: known.length > 0 ? Math.min(...known) : null,
      maxLeadTime: known.length > 0 ? Math.max(...known) : null,
      suppliers: lines,
    };
    if (!fromGraph) report.note = fallbackNote(attempt, 'Graph store has no suppliers', 'suppliers');
    return ok(report);
  },
});

export const supplyChainAnalyses: RegisteredAnalysis[] = [
  riskScores,
  performance,
  concentration,
  network,
  singleSource,
  ripple,
  alternatives,
  leadTimeVariability,
];
