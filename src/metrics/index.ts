/**
 * Metrics Module - cash-cycle KPIs, working capital and classifications
 */

import type { TabularHandle } from '../db';
import { CURRENT_SNAPSHOT, col, columnSet, inventoryValueSql, lookupRows, truthySql } from '../db/sql';
import { num, numOrNull, round1, round2, str, strOrNull } from '../db/values';
import { insufficientData, isAvailable } from '../availability';
import { defineAnalysis, type RegisteredAnalysis } from '../analyses/registry';
import { readEnum, readLimit, readNumber, readOptionalNumber } from '../analyses/params';
import { ok, type InsufficientData } from '../analyses/types';
import type { DatasetCategory } from '../db/datasets';
import { compareIds } from '../utils/stats';
import {
  agingBucketRank,
  cashConversionCycle,
  cashFreed,
  classifyPareto,
  coefficientOfVariation,
  daysInventoryOutstanding,
  weightedDays,
  xyzClassFor,
} from './calculations';
import type {
  AbcClass,
  AbcXyzEntry,
  AbcXyzReport,
  AgingBucket,
  ArAgingReport,
  CarryingCost,
  CccLever,
  CccSimulation,
  DpoReport,
  DsoReport,
  KpiSummary,
  ParetoDimension,
  ParetoReport,
  PartyDays,
  TurnoverLine,
  WorkingCapitalLine,
  WorkingCapitalSummary,
  XyzClass,
} from './types';

export * from './types';
export {
  abcClassFor,
  classifyPareto,
  coefficientOfVariation,
  xyzClassFor,
  cashConversionCycle,
  weightedDays,
  daysInventoryOutstanding,
  concentrationRisk,
} from './calculations';

// ---------------------------------------------------------------------------
// Shared readers
// ---------------------------------------------------------------------------

/** Total value of the current inventory snapshot */
export function currentInventoryValue(db: TabularHandle): number {
  const cols = columnSet(db, 'inventory_snapshot');
  const rows = db.query(
    `SELECT COALESCE(SUM(${inventoryValueSql(cols)}), 0) AS value FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT}`,
  );
  return num(rows[0]?.value);
}

function listMissing(categories: DatasetCategory[]): string {
  return categories.join(' and ');
}

/** A weighted days figure, or the reason it is undefined */
type LedgerMetric = { value: number } | { value: null; reason: string };

function ledgerMetric(
  db: TabularHandle,
  table: 'ar_ledger' | 'ap_ledger',
  daysColumn: string,
  label: string,
): LedgerMetric {
  if (!isAvailable(db, table)) {
    return { value: null, reason: `Upload ${table} to compute ${label}` };
  }
  const cols = columnSet(db, table);
  if (!cols.has(daysColumn)) {
    return { value: null, reason: `${table} has no ${daysColumn} column to compute ${label}` };
  }
  const entries = db
    .query(`SELECT ${col(cols, daysColumn)} AS days, invoice_amount AS amount FROM ${table}`)
    .map((row) => ({ days: numOrNull(row.days), amount: num(row.amount) }));
  const weighted = weightedDays(entries);
  if (weighted === null) {
    return {
      value: null,
      reason: `No ${table} entries with a known ${daysColumn} and a non-zero amount to compute ${label}`,
    };
  }
  return { value: round1(weighted) };
}

/** Gate passed but the weighted metric is undefined */
function undefinedMetric(reason: string): InsufficientData {
  return { status: 'insufficient_data', message: `${reason}.`, missing: [] };
}

/**
 * DIO, DSO, DPO and CCC. Each metric degrades to 0 with a note when its
 * inputs are missing; CCC is computed from whatever was produced.
 */
export function computeKpis(db: TabularHandle): KpiSummary {
  const summary: KpiSummary = {
    formula: 'CCC = DIO + DSO - DPO',
    unit: 'days',
    dio: 0,
    dso: 0,
    dpo: 0,
    ccc: 0,
  };

  const dioMissing = (['inventory_snapshot', 'sales_transactions'] as const).filter((c) => !isAvailable(db, c));
  if (dioMissing.length > 0) {
    summary.dioNote = `Upload ${listMissing(dioMissing)} to compute DIO; counted as 0.`;
  } else if (!columnSet(db, 'sales_transactions').has('total_cost')) {
    summary.dioNote = 'sales_transactions has no total_cost column; DIO counted as 0.';
  } else {
    const cogs = db.query(
      'SELECT COALESCE(SUM(total_cost), 0) AS cogs, COUNT(DISTINCT transaction_date) AS days FROM sales_transactions',
    )[0];
    const totalCogs = num(cogs?.cogs);
    summary.dio = daysInventoryOutstanding(currentInventoryValue(db), totalCogs, num(cogs?.days));
    if (totalCogs <= 0) summary.dioNote = 'Average daily COGS is 0; DIO counted as 0.';
  }

  const dso = ledgerMetric(db, 'ar_ledger', 'days_to_pay', 'DSO');
  if (dso.value === null) summary.dsoNote = `${dso.reason}; counted as 0.`;
  else summary.dso = dso.value;

  const dpo = ledgerMetric(db, 'ap_ledger', 'actual_days_to_pay', 'DPO');
  if (dpo.value === null) summary.dpoNote = `${dpo.reason}; counted as 0.`;
  else summary.dpo = dpo.value;

  summary.ccc = cashConversionCycle(summary.dio, summary.dso, summary.dpo);
  return summary;
}

function asAbc(value: string | null): AbcClass | null {
  const s = value?.trim().toUpperCase();
  return s === 'A' || s === 'B' || s === 'C' ? s : null;
}

function asXyz(value: string | null): XyzClass | null {
  const s = value?.trim().toUpperCase();
  return s === 'X' || s === 'Y' || s === 'Z' ? s : null;
}

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

const kpiSummary = defineAnalysis<Record<string, never>, KpiSummary>({
  name: 'get_kpi_summary',
  category: 'kpi',
  description: 'Cash conversion cycle KPIs: DIO, DSO, DPO and CCC. Each metric degrades to 0 with a note when its data is missing.',
  tags: ['ccc', 'dio', 'dso', 'dpo', 'kpi', 'cash'],
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => ok(computeKpis(db)),
});

const workingCapital = defineAnalysis<{ limit: number }, WorkingCapitalSummary>({
  name: 'get_working_capital_summary',
  category: 'kpi',
  description: 'Cash trapped in current inventory per product (top 50) with the overall total and a per-category split.',
  tags: ['working', 'capital', 'cash', 'inventory'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 50, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 50) }),
  run: ({ db }, { limit }) => {
    const cols = columnSet(db, 'inventory_snapshot');
    const lines: WorkingCapitalLine[] = db
      .query(
        `SELECT product_id, COALESCE(SUM(qty_on_hand), 0) AS units, COALESCE(SUM(${inventoryValueSql(cols)}), 0) AS cash
         FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT}
         GROUP BY product_id`,
      )
      .map((row) => ({ productId: str(row.product_id), units: num(row.units), cashTrapped: num(row.cash) }))
      .sort((a, b) => b.cashTrapped - a.cashTrapped || compareIds(a.productId, b.productId));

    let total = 0;
    for (const line of lines) total += line.cashTrapped;

    const summary: WorkingCapitalSummary = {
      totalCashTrapped: round2(total),
      productCount: lines.length,
      topProducts: lines.slice(0, limit).map((l) => ({ ...l, cashTrapped: round2(l.cashTrapped) })),
    };

    const categories = lookupRows(db, 'products', 'product_id', ['category']);
    if (categories.size > 0) {
      const byCategory = new Map<string | null, { cashTrapped: number; products: number }>();
      for (const line of lines) {
        const category = strOrNull(categories.get(line.productId)?.category);
        const entry = byCategory.get(category) ?? { cashTrapped: 0, products: 0 };
        entry.cashTrapped += line.cashTrapped;
        entry.products++;
        byCategory.set(category, entry);
      }
      summary.byCategory = Array.from(byCategory.entries())
        .map(([category, e]) => ({ category, cashTrapped: round2(e.cashTrapped), products: e.products }))
        .sort((a, b) => b.cashTrapped - a.cashTrapped);
    }
    return ok(summary);
  },
});

const carryingCost = defineAnalysis<{ holdingCostPct: number }, CarryingCost>({
  name: 'get_carrying_cost_analysis',
  category: 'kpi',
  description: 'Annual and monthly cost of holding the current inventory at a given holding-cost rate.',
  tags: ['carrying', 'holding', 'cost', 'inventory'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: {
    type: 'object',
    properties: {
      holding_cost_pct: { type: 'number', description: 'Annual holding cost as a fraction of value', default: 0.25, minimum: 0 },
    },
  },
  parse: (input, policy) => ({
    holdingCostPct: readNumber(input, 'holding_cost_pct', policy.holdingCostPct, { min: 0, max: 1 }),
  }),
  run: ({ db }, { holdingCostPct }) => {
    const value = currentInventoryValue(db);
    const annual = value * holdingCostPct;
    return ok({
      totalInventoryValue: round2(value),
      holdingRatePct: round2(holdingCostPct * 100),
      annualCarryingCost: round2(annual),
      monthlyCarryingCost: round2(annual / 12),
    });
  },
});

const PARETO_DIMENSIONS = ['revenue', 'inventory_value', 'quantity'] as const;

const pareto = defineAnalysis<{ dimension: ParetoDimension; limit: number }, ParetoReport>({
  name: 'get_pareto_analysis',
  category: 'kpi',
  description: 'Pareto (80/20) ranking of products by revenue, inventory value or units sold with ABC classes.',
  tags: ['pareto', 'abc', '80/20', 'revenue'],
  requires: ({ dimension }) => ({
    all: [dimension === 'inventory_value' ? 'inventory_snapshot' : 'sales_transactions'],
  }),
  input_schema: {
    type: 'object',
    properties: {
      dimension: { type: 'string', description: 'Value to rank by', enum: PARETO_DIMENSIONS, default: 'revenue' },
      limit: { type: 'integer', description: 'Ranked rows to return', default: 50, minimum: 1 },
    },
  },
  parse: (input) => ({
    dimension: readEnum(input, 'dimension', PARETO_DIMENSIONS, 'revenue'),
    limit: readLimit(input, 50),
  }),
  run: ({ db }, { dimension, limit }) => {
    let sql: string;
    if (dimension === 'inventory_value') {
      const cols = columnSet(db, 'inventory_snapshot');
      sql = `SELECT product_id, COALESCE(SUM(${inventoryValueSql(cols)}), 0) AS value
             FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT} AND product_id IS NOT NULL GROUP BY product_id`;
    } else {
      const measure = dimension === 'revenue' ? 'total_revenue' : 'qty_sold';
      sql = `SELECT product_id, COALESCE(SUM(${measure}), 0) AS value
             FROM sales_transactions WHERE product_id IS NOT NULL GROUP BY product_id`;
    }
    const entries = classifyPareto(db.query(sql).map((row) => ({ productId: str(row.product_id), value: num(row.value) })));

    let totalValue = 0;
    for (const e of entries) totalValue += e.value;
    const driving = entries.filter((e) => e.abcClass === 'A').length;

    return ok({
      dimension,
      totalSkus: entries.length,
      totalValue: round2(totalValue),
      skusDriving80Pct: driving,
      pctOfSkus: entries.length > 0 ? round1((driving * 100) / entries.length) : 0,
      paretoData: entries.slice(0, limit).map((e) => ({
        ...e,
        value: round2(e.value),
        sharePct: round2(e.sharePct),
        cumulativePct: round2(e.cumulativePct),
      })),
    });
  },
});

const ABC_XYZ_LEGEND: Record<string, string> = {
  A: 'Top 80% of revenue',
  B: 'Next 15% of revenue',
  C: 'Remaining 5% of revenue',
  X: 'Steady demand (CV < 0.5)',
  Y: 'Variable demand (0.5 <= CV < 1.0)',
  Z: 'Erratic demand (CV >= 1.0)',
};

function matrixOf(entries: AbcXyzEntry[]): Record<string, number> {
  const matrix: Record<string, number> = {};
  for (const e of entries) {
    if (!e.abcClass || !e.xyzClass) continue;
    const key = `${e.abcClass}${e.xyzClass}`;
    matrix[key] = (matrix[key] ?? 0) + 1;
  }
  return matrix;
}

const abcXyz = defineAnalysis<{ limit: number }, AbcXyzReport>({
  name: 'get_abc_xyz_classification',
  category: 'kpi',
  description: 'ABC (revenue share) x XYZ (demand variability) classification. Classes set on the product master take precedence.',
  tags: ['abc', 'xyz', 'classification', 'segmentation'],
  requires: { all: [], any: ['products', 'sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 100, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 100) }),
  run: ({ db }, { limit }) => {
    const master = lookupRows(db, 'products', 'product_id', ['product_name', 'abc_class', 'xyz_class']);

    if (!isAvailable(db, 'sales_transactions')) {
      const entries: AbcXyzEntry[] = Array.from(master.entries())
        .sort((a, b) => compareIds(a[0], b[0]))
        .map(([productId, row]): AbcXyzEntry => ({
          productId,
          productName: strOrNull(row.product_name),
          revenue: null,
          cumulativePct: null,
          cv: null,
          abcClass: asAbc(strOrNull(row.abc_class)),
          xyzClass: asXyz(strOrNull(row.xyz_class)),
          source: 'products',
        }));
      return ok({
        basis: 'product_master',
        totalProducts: entries.length,
        matrix: matrixOf(entries),
        products: entries.slice(0, limit),
        legend: ABC_XYZ_LEGEND,
      });
    }

    const revenue = classifyPareto(
      db
        .query(
          `SELECT product_id, COALESCE(SUM(total_revenue), 0) AS value
           FROM sales_transactions WHERE product_id IS NOT NULL GROUP BY product_id`,
        )
        .map((row) => ({ productId: str(row.product_id), value: num(row.value) })),
    );

    const series = new Map<string, number[]>();
    for (const row of db.query(
      `SELECT product_id, transaction_date, COALESCE(SUM(qty_sold), 0) AS qty
       FROM sales_transactions WHERE product_id IS NOT NULL
       GROUP BY product_id, transaction_date`,
    )) {
      const id = str(row.product_id);
      const values = series.get(id) ?? [];
      values.push(num(row.qty));
      series.set(id, values);
    }

    const entries = revenue.map((r): AbcXyzEntry => {
      const cv = coefficientOfVariation(series.get(r.productId) ?? []);
      const row = master.get(r.productId);
      const presetAbc = asAbc(strOrNull(row?.abc_class));
      const presetXyz = asXyz(strOrNull(row?.xyz_class));
      const presets = Number(presetAbc !== null) + Number(presetXyz !== null);
      return {
        productId: r.productId,
        productName: strOrNull(row?.product_name),
        revenue: round2(r.value),
        cumulativePct: round2(r.cumulativePct),
        cv: round2(cv),
        abcClass: presetAbc ?? r.abcClass,
        xyzClass: presetXyz ?? xyzClassFor(cv),
        source: presets === 2 ? 'products' : presets === 0 ? 'computed' : 'mixed',
      };
    });

    return ok({
      basis: 'sales_history',
      totalProducts: entries.length,
      matrix: matrixOf(entries),
      products: entries.slice(0, limit),
      legend: ABC_XYZ_LEGEND,
    });
  },
});

interface CccParams {
  dioReduction: number;
  dsoReduction: number;
  dpoIncrease: number;
  annualRevenue?: number;
}

const simulateCcc = defineAnalysis<CccParams, CccSimulation>({
  name: 'simulate_ccc_improvement',
  category: 'kpi',
  description: 'What-if: cash freed by cutting DIO or DSO and stretching DPO by a number of days.',
  tags: ['ccc', 'simulation', 'what-if', 'cash'],
  input_schema: {
    type: 'object',
    properties: {
      dio_reduction: { type: 'number', description: 'Days cut from DIO', default: 0, minimum: 0 },
      dso_reduction: { type: 'number', description: 'Days cut from DSO', default: 0, minimum: 0 },
      dpo_increase: { type: 'number', description: 'Days added to DPO', default: 0, minimum: 0 },
      annual_revenue: { type: 'number', description: 'Annual revenue; defaults to observed sales annualized', minimum: 0 },
    },
  },
  parse: (input) => ({
    dioReduction: readNumber(input, 'dio_reduction', 0, { min: 0 }),
    dsoReduction: readNumber(input, 'dso_reduction', 0, { min: 0 }),
    dpoIncrease: readNumber(input, 'dpo_increase', 0, { min: 0 }),
    annualRevenue: readOptionalNumber(input, 'annual_revenue', { min: 0 }),
  }),
  run: ({ db }, params) => {
    let annualRevenue = params.annualRevenue;
    let revenueSource: CccSimulation['revenueSource'] = 'parameter';
    if (annualRevenue === undefined) {
      if (!isAvailable(db, 'sales_transactions')) {
        return insufficientData(['sales_transactions'], { hint: 'Or pass annual_revenue.' });
      }
      const row = db.query(
        'SELECT COALESCE(SUM(total_revenue), 0) AS revenue, COUNT(DISTINCT transaction_date) AS days FROM sales_transactions',
      )[0];
      const days = num(row?.days);
      annualRevenue = days > 0 ? (num(row?.revenue) / days) * 365 : 0;
      revenueSource = 'observed';
    }

    const revenue = annualRevenue;
    const lever = (name: CccLever['lever'], action: string, days: number): CccLever => ({
      lever: name,
      action,
      days,
      cashFreed: round2(cashFreed(days, revenue)),
    });
    const breakdown = [
      lever('dio', 'Reduce days inventory outstanding', params.dioReduction),
      lever('dso', 'Collect receivables faster', params.dsoReduction),
      lever('dpo', 'Extend supplier payment terms', params.dpoIncrease),
    ];
    const totalDays = params.dioReduction + params.dsoReduction + params.dpoIncrease;
    const currentCcc = computeKpis(db).ccc;

    return ok({
      annualRevenue: round2(revenue),
      revenueSource,
      dailyRevenue: round2(revenue / 365),
      totalDaysSaved: totalDays,
      totalCashFreed: round2(cashFreed(totalDays, revenue)),
      breakdown,
      currentCcc,
      projectedCcc: round1(currentCcc - totalDays),
    });
  },
});

const arAging = defineAnalysis<Record<string, never>, ArAgingReport>({
  name: 'get_ar_aging',
  category: 'kpi',
  description: 'Accounts receivable by aging bucket with the outstanding total, disputes and write-offs.',
  tags: ['ar', 'aging', 'receivables', 'overdue'],
  requires: { all: ['ar_ledger'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const cols = columnSet(db, 'ar_ledger');
    const unpaid = `${col(cols, 'paid_date')} IS NULL`;
    const buckets: AgingBucket[] = db
      .query(
        `SELECT COALESCE(CAST(${col(cols, 'aging_bucket')} AS TEXT), 'Unknown') AS bucket,
                COUNT(*) AS invoices,
                COALESCE(SUM(invoice_amount), 0) AS total,
                COALESCE(SUM(CASE WHEN ${unpaid} THEN invoice_amount ELSE 0 END), 0) AS outstanding
         FROM ar_ledger GROUP BY 1`,
      )
      .map((row) => ({
        bucket: str(row.bucket),
        invoices: num(row.invoices),
        totalAmount: round2(num(row.total)),
        outstanding: round2(num(row.outstanding)),
      }))
      .sort((a, b) => agingBucketRank(a.bucket) - agingBucketRank(b.bucket) || compareIds(a.bucket, b.bucket));

    const flags = db.query(
      `SELECT COALESCE(SUM(CASE WHEN ${unpaid} THEN invoice_amount ELSE 0 END), 0) AS outstanding,
              COALESCE(SUM(CASE WHEN ${truthySql(col(cols, 'dispute_flag'))} THEN 1 ELSE 0 END), 0) AS disputes,
              COALESCE(SUM(CASE WHEN ${truthySql(col(cols, 'write_off_flag'))} THEN 1 ELSE 0 END), 0) AS write_offs
       FROM ar_ledger`,
    )[0];

    return ok({
      buckets,
      totalOutstanding: round2(num(flags?.outstanding)),
      disputedInvoices: num(flags?.disputes),
      writeOffs: num(flags?.write_offs),
    });
  },
});

function partyBreakdown(db: TabularHandle, table: 'ar_ledger' | 'ap_ledger', partyColumn: string, daysColumn: string): PartyDays[] {
  const cols = columnSet(db, table);
  const groups = new Map<string, { entries: Array<{ days: number | null; amount: number }>; total: number }>();
  for (const row of db.query(
    `SELECT ${col(cols, partyColumn)} AS party, ${col(cols, daysColumn)} AS days, invoice_amount AS amount FROM ${table}`,
  )) {
    const id = str(row.party);
    if (!id) continue;
    const group = groups.get(id) ?? { entries: [], total: 0 };
    const amount = num(row.amount);
    group.entries.push({ days: numOrNull(row.days), amount });
    group.total += amount;
    groups.set(id, group);
  }
  return Array.from(groups.entries())
    .map(([id, g]) => {
      const weighted = weightedDays(g.entries);
      return {
        id,
        name: null,
        invoices: g.entries.length,
        totalAmount: round2(g.total),
        weightedDays: weighted === null ? null : round1(weighted),
      };
    })
    .sort(
      (a, b) =>
        (b.weightedDays ?? Number.NEGATIVE_INFINITY) - (a.weightedDays ?? Number.NEGATIVE_INFINITY) ||
        compareIds(a.id, b.id),
    );
}

const dsoAnalysis = defineAnalysis<{ limit: number }, DsoReport>({
  name: 'get_dso_analysis',
  category: 'kpi',
  description: 'Days sales outstanding overall and per customer, weighted by invoice amount.',
  tags: ['dso', 'receivables', 'customers'],
  requires: { all: ['ar_ledger'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Customers to list', default: 20, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 20) }),
  run: ({ db }, { limit }) => {
    const overall = ledgerMetric(db, 'ar_ledger', 'days_to_pay', 'DSO');
    if (overall.value === null) return undefinedMetric(overall.reason);
    const customers = lookupRows(db, 'customers', 'customer_id', ['customer_name', 'segment']);
    const report: DsoReport = {
      overallDso: overall.value,
      byCustomer: partyBreakdown(db, 'ar_ledger', 'customer_id', 'days_to_pay')
        .slice(0, limit)
        .map((p) => ({
          ...p,
          name: strOrNull(customers.get(p.id)?.customer_name),
          segment: strOrNull(customers.get(p.id)?.segment),
        })),
    };
    return ok(report);
  },
});

const dpoAnalysis = defineAnalysis<{ limit: number }, DpoReport>({
  name: 'get_dpo_analysis',
  category: 'kpi',
  description: 'Days payables outstanding overall and per supplier, with early-payment discounts captured.',
  tags: ['dpo', 'payables', 'suppliers'],
  requires: { all: ['ap_ledger'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Suppliers to list', default: 20, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 20) }),
  run: ({ db }, { limit }) => {
    const overall = ledgerMetric(db, 'ap_ledger', 'actual_days_to_pay', 'DPO');
    if (overall.value === null) return undefinedMetric(overall.reason);
    const cols = columnSet(db, 'ap_ledger');
    const discounts = db.query(
      `SELECT COALESCE(SUM(${col(cols, 'early_payment_discount')}), 0) AS discounts FROM ap_ledger`,
    )[0];
    const suppliers = lookupRows(db, 'suppliers', 'supplier_id', ['supplier_name', 'contracted_payment_days']);
    const report: DpoReport = {
      overallDpo: overall.value,
      totalDiscountsCaptured: round2(num(discounts?.discounts)),
      bySupplier: partyBreakdown(db, 'ap_ledger', 'supplier_id', 'actual_days_to_pay')
        .slice(0, limit)
        .map((p) => ({
          ...p,
          name: strOrNull(suppliers.get(p.id)?.supplier_name),
          contractedDays: numOrNull(suppliers.get(p.id)?.contracted_payment_days),
        })),
    };
    return ok(report);
  },
});

const inventoryTurnover = defineAnalysis<{ limit: number }, { products: TurnoverLine[] }>({
  name: 'get_inventory_turnover',
  category: 'kpi',
  description: 'Inventory turnover per product: sales revenue over current inventory value.',
  tags: ['turnover', 'inventory', 'efficiency'],
  requires: { all: ['inventory_snapshot', 'sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 50, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 50) }),
  run: ({ db }, { limit }) => {
    const cols = columnSet(db, 'inventory_snapshot');
    const values = new Map<string, number>();
    for (const row of db.query(
      `SELECT product_id, COALESCE(SUM(${inventoryValueSql(cols)}), 0) AS value
       FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT} GROUP BY product_id`,
    )) {
      values.set(str(row.product_id), num(row.value));
    }

    const lines: TurnoverLine[] = db
      .query(
        `SELECT product_id, COALESCE(SUM(total_revenue), 0) AS revenue
         FROM sales_transactions WHERE product_id IS NOT NULL GROUP BY product_id`,
      )
      .map((row) => {
        const productId = str(row.product_id);
        const revenue = num(row.revenue);
        const inventoryValue = values.get(productId) ?? 0;
        return {
          productId,
          revenue: round2(revenue),
          inventoryValue: round2(inventoryValue),
          turnoverRatio: inventoryValue > 0 ? round2(revenue / inventoryValue) : 0,
        };
      })
      .sort((a, b) => b.turnoverRatio - a.turnoverRatio || compareIds(a.productId, b.productId));

    return ok({ products: lines.slice(0, limit) });
  },
});

export const metricsAnalyses: RegisteredAnalysis[] = [
  kpiSummary,
  workingCapital,
  carryingCost,
  pareto,
  abcXyz,
  simulateCcc,
  arAging,
  dsoAnalysis,
  dpoAnalysis,
  inventoryTurnover,
];
