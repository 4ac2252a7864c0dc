/**
 * Inventory Module - safety stock, EOQ, reorder alerts and stock health
 *
 * Every point-in-time figure reads the current snapshot only (rows on the
 * latest snapshot_date).
 */

import type { TabularHandle } from '../db';
import { CURRENT_SNAPSHOT, col, columnSet, inventoryValueSql, lookupRows } from '../db/sql';
import { num, numOrNull, round, round1, round2, str, strOrNull } from '../db/values';
import { isAvailable } from '../availability';
import { defineAnalysis, type RegisteredAnalysis } from '../analyses/registry';
import { readLimit, readNumber, readStringList } from '../analyses/params';
import { ok } from '../analyses/types';
import { compareIds, sampleStdDev } from '../utils/stats';
import {
  AGING_BUCKETS,
  agingBucketFor,
  daysSince,
  economicOrderQuantity,
  reorderPriority,
  reorderSeverity,
  safetyStock,
  zScoreFor,
} from './calculations';
import type {
  DeadStockItem,
  DeadStockReport,
  EoqLine,
  EoqReport,
  InventoryAgingReport,
  OverstockReport,
  ReorderAlert,
  ReorderAlertReport,
  ReorderRecommendation,
  SafetyStockLine,
  SafetyStockReport,
  SnapshotLine,
  StockoutRiskReport,
} from './types';

export * from './types';
export {
  zScoreFor,
  safetyStock,
  economicOrderQuantity,
  reorderSeverity,
  reorderPriority,
  daysSince,
  agingBucketFor,
} from './calculations';

const MAX_SKUS = 20;

// ---------------------------------------------------------------------------
// Current snapshot
// ---------------------------------------------------------------------------

export interface CurrentStockRow extends SnapshotLine {
  safetyStockTarget: number | null;
  daysSinceMovement: number | null;
  unitCost: number | null;
}

export function currentSnapshot(db: TabularHandle): CurrentStockRow[] {
  const cols = columnSet(db, 'inventory_snapshot');
  return db
    .query(
      `SELECT product_id, ${col(cols, 'location_id')} AS location_id, qty_on_hand, reorder_point,
              ${col(cols, 'safety_stock_target')} AS safety_stock_target,
              ${col(cols, 'stock_status')} AS stock_status,
              ${col(cols, 'days_of_supply')} AS days_of_supply,
              ${col(cols, 'days_since_last_movement')} AS days_since_last_movement,
              ${col(cols, 'unit_cost')} AS unit_cost,
              ${inventoryValueSql(cols)} AS inventory_value
       FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT}`,
    )
    .map((row) => ({
      productId: str(row.product_id),
      locationId: strOrNull(row.location_id),
      qtyOnHand: num(row.qty_on_hand),
      reorderPoint: num(row.reorder_point),
      safetyStockTarget: numOrNull(row.safety_stock_target),
      stockStatus: strOrNull(row.stock_status),
      daysOfSupply: numOrNull(row.days_of_supply),
      daysSinceMovement: numOrNull(row.days_since_last_movement),
      unitCost: numOrNull(row.unit_cost),
      inventoryValue: num(row.inventory_value),
    }));
}

function toSnapshotLine(row: CurrentStockRow): SnapshotLine {
  return {
    productId: row.productId,
    locationId: row.locationId,
    qtyOnHand: row.qtyOnHand,
    reorderPoint: row.reorderPoint,
    daysOfSupply: row.daysOfSupply,
    stockStatus: row.stockStatus,
    inventoryValue: round2(row.inventoryValue),
  };
}

function byLocation(a: { productId: string; locationId: string | null }, b: { productId: string; locationId: string | null }): number {
  return compareIds(a.productId, b.productId) || compareIds(a.locationId ?? '', b.locationId ?? '');
}

/** Ascending with nulls last */
function nullsLast(a: number | null, b: number | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

function negate(value: number | null): number | null {
  return value === null ? null : -value;
}

function positive(value: number | null): number | null {
  return value !== null && value > 0 ? value : null;
}

// ---------------------------------------------------------------------------
// Catalogue
// ---------------------------------------------------------------------------

const skuList = {
  type: 'array',
  items: { type: 'string' },
  description: `Product ids (at most ${MAX_SKUS})`,
} as const;

const safetyStockAnalysis = defineAnalysis<{ skus: string[]; serviceLevel: number }, SafetyStockReport>({
  name: 'calculate_safety_stock',
  category: 'inventory',
  description: 'Safety stock per SKU from demand variability, lead time and a service level (SS = Z x sigma x sqrt(LT)).',
  tags: ['safety', 'stock', 'buffer', 'service'],
  input_schema: {
    type: 'object',
    properties: {
      skus: skuList,
      service_level: { type: 'number', description: 'Target service level (0.90, 0.95 or 0.99)', default: 0.95 },
    },
    required: ['skus'],
  },
  parse: (input, policy) => ({
    skus: readStringList(input, 'skus', true),
    serviceLevel: readNumber(input, 'service_level', policy.serviceLevel, { min: 0, exclusiveMin: true, max: 1 }),
  }),
  run: ({ db, policy }, { skus, serviceLevel }) => {
    const z = zScoreFor(serviceLevel);
    const hasSales = isAvailable(db, 'sales_transactions');
    const master = lookupRows(db, 'products', 'product_id', ['lead_time_days']);

    const results = skus.slice(0, MAX_SKUS).map((productId): SafetyStockLine => {
      const daily = hasSales
        ? db
            .query(
              'SELECT SUM(qty_sold) AS qty FROM sales_transactions WHERE product_id = ? GROUP BY transaction_date',
              [productId],
            )
            .map((row) => num(row.qty))
        : [];
      const observed = sampleStdDev(daily);
      const sigma = observed ?? policy.defaultDemandStdDev;
      const masterLead = positive(numOrNull(master.get(productId)?.lead_time_days));
      const leadTime = masterLead ?? policy.defaultLeadTimeDays;
      return {
        productId,
        safetyStock: safetyStock(z, sigma, leadTime),
        demandStdDev: round2(sigma),
        leadTimeDays: leadTime,
        sigmaSource: observed === null ? 'default' : 'history',
        leadTimeSource: masterLead === null ? 'default' : 'product_master',
      };
    });

    return ok({
      formula: 'SS = Z x sigma_d x sqrt(LT)',
      serviceLevel,
      zScore: z,
      truncated: skus.length > MAX_SKUS,
      results,
    });
  },
});

const eoqAnalysis = defineAnalysis<{ skus: string[]; orderCost: number; holdingCostPct: number }, EoqReport>({
  name: 'calculate_eoq',
  category: 'inventory',
  description: 'Economic order quantity per SKU from annualized demand, order cost and holding cost (EOQ = sqrt(2DS/H)).',
  tags: ['eoq', 'order', 'quantity', 'wilson'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: {
      skus: skuList,
      order_cost: { type: 'number', description: 'Fixed cost per order', default: 50, minimum: 0 },
      holding_cost_pct: { type: 'number', description: 'Annual holding cost as a fraction of unit cost', default: 0.25, minimum: 0 },
    },
    required: ['skus'],
  },
  parse: (input, policy) => ({
    skus: readStringList(input, 'skus', true),
    orderCost: readNumber(input, 'order_cost', policy.orderCost, { min: 0 }),
    holdingCostPct: readNumber(input, 'holding_cost_pct', policy.holdingCostPct, { min: 0, max: 1 }),
  }),
  run: ({ db, policy }, { skus, orderCost, holdingCostPct }) => {
    const master = lookupRows(db, 'products', 'product_id', ['unit_cost']);

    const results = skus.slice(0, MAX_SKUS).map((productId): EoqLine => {
      const row = db.query(
        `SELECT COALESCE(SUM(qty_sold), 0) AS qty, COUNT(DISTINCT transaction_date) AS days
         FROM sales_transactions WHERE product_id = ?`,
        [productId],
      )[0];
      const days = num(row?.days);
      const annualDemand = days > 0 ? (num(row?.qty) / days) * 365 : 0;
      const masterCost = positive(numOrNull(master.get(productId)?.unit_cost));
      const unitCost = masterCost ?? policy.defaultUnitCost;
      const holding = unitCost * holdingCostPct;
      const eoq = economicOrderQuantity(annualDemand, orderCost, holding);
      return {
        productId,
        annualDemand: Math.round(annualDemand),
        unitCost,
        unitCostSource: masterCost === null ? 'default' : 'product_master',
        holdingCostPerUnit: round2(holding),
        eoq,
        ordersPerYear: eoq > 0 ? round1(annualDemand / eoq) : 0,
      };
    });

    return ok({
      formula: 'EOQ = sqrt(2 x D x S / H)',
      orderCost,
      holdingCostPct,
      truncated: skus.length > MAX_SKUS,
      results,
    });
  },
});

const reorderAlerts = defineAnalysis<Record<string, never>, ReorderAlertReport>({
  name: 'get_reorder_alerts',
  category: 'inventory',
  description: 'Current stock at or near its reorder point: critical below ROP, warning below 1.2 x ROP.',
  tags: ['reorder', 'alerts', 'stock', 'rop'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db, policy }) => {
    const alerts: Array<ReorderAlert & { ratio: number | null }> = [];
    for (const row of currentSnapshot(db)) {
      const severity = reorderSeverity(row.qtyOnHand, row.reorderPoint, policy.reorderWarningFactor);
      if (severity === 'ok') continue;
      const ratio = row.reorderPoint > 0 ? row.qtyOnHand / row.reorderPoint : null;
      alerts.push({
        productId: row.productId,
        locationId: row.locationId,
        qtyOnHand: row.qtyOnHand,
        reorderPoint: row.reorderPoint,
        safetyStockTarget: row.safetyStockTarget,
        severity,
        stockRatio: ratio === null ? null : round2(ratio),
        ratio,
      });
    }
    alerts.sort((a, b) => nullsLast(a.ratio, b.ratio) || byLocation(a, b));

    return ok({
      totalAlerts: alerts.length,
      critical: alerts.filter((a) => a.severity === 'critical').length,
      warning: alerts.filter((a) => a.severity === 'warning').length,
      alerts: alerts.map(({ ratio: _ratio, ...alert }) => alert),
    });
  },
});

const smartReorder = defineAnalysis<{ limit: number }, { candidates: number; recommendations: ReorderRecommendation[] }>({
  name: 'get_smart_reorder_recommendations',
  category: 'inventory',
  description: 'Prioritized purchase recommendations for stock below its reorder point, with order quantity and lead time.',
  tags: ['reorder', 'purchase', 'recommendations', 'replenishment'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Recommendations to return', default: 20, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 20) }),
  run: ({ db, policy }, { limit }) => {
    const master = lookupRows(db, 'products', 'product_id', ['product_name', 'economic_order_qty', 'lead_time_days', 'unit_cost']);

    const candidates = currentSnapshot(db)
      .filter((row) => row.qtyOnHand < row.reorderPoint)
      .map((row): ReorderRecommendation => {
        const product = master.get(row.productId);
        const eoq = positive(numOrNull(product?.economic_order_qty));
        const qty = eoq ?? policy.defaultEoq;
        const unitCost = positive(numOrNull(product?.unit_cost)) ?? row.unitCost;
        return {
          productId: row.productId,
          productName: strOrNull(product?.product_name),
          locationId: row.locationId,
          qtyOnHand: row.qtyOnHand,
          reorderPoint: row.reorderPoint,
          stockStatus: row.stockStatus,
          daysOfSupply: row.daysOfSupply,
          priority: reorderPriority(row.stockStatus),
          recommendedQty: qty,
          quantitySource: eoq === null ? 'default' : 'product_master',
          leadTimeDays: positive(numOrNull(product?.lead_time_days)) ?? policy.defaultLeadTimeDays,
          estimatedCost: unitCost === null ? null : round2(unitCost * qty),
        };
      })
      .sort((a, b) => a.priority - b.priority || nullsLast(a.daysOfSupply, b.daysOfSupply) || byLocation(a, b));

    return ok({ candidates: candidates.length, recommendations: candidates.slice(0, limit) });
  },
});

const deadStock = defineAnalysis<{ days: number }, DeadStockReport>({
  name: 'get_dead_stock',
  category: 'inventory',
  description: 'Stock with no sale in more than N days (or never sold), ranked by value at risk.',
  tags: ['dead', 'stock', 'obsolete', 'slow'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: {
    type: 'object',
    properties: { days: { type: 'integer', description: 'Days without a sale', default: 90, minimum: 0 } },
  },
  parse: (input, policy) => ({ days: readNumber(input, 'days', policy.deadStockDays, { min: 0, integer: true }) }),
  run: ({ db, now }, { days }) => {
    const cols = columnSet(db, 'inventory_snapshot');
    const stock = db.query(
      `SELECT product_id, COALESCE(SUM(qty_on_hand), 0) AS qty, AVG(${col(cols, 'unit_cost')}) AS unit_cost,
              COALESCE(SUM(${inventoryValueSql(cols)}), 0) AS value,
              MAX(${col(cols, 'days_since_last_movement')}) AS idle
       FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT} AND product_id IS NOT NULL
       GROUP BY product_id`,
    );

    const useSales = isAvailable(db, 'sales_transactions');
    const lastSale = new Map<string, string>();
    if (useSales) {
      for (const row of db.query(
        'SELECT product_id, MAX(transaction_date) AS last_sale FROM sales_transactions GROUP BY product_id',
      )) {
        const date = strOrNull(row.last_sale);
        if (date) lastSale.set(str(row.product_id), date);
      }
    }

    const today = now();
    const items: DeadStockItem[] = [];
    for (const row of stock) {
      const qty = num(row.qty);
      if (qty <= 0) continue;
      const productId = str(row.product_id);

      let daysIdle: number | null;
      let lastSaleDate: string | null = null;
      let dead: boolean;
      if (useSales) {
        lastSaleDate = lastSale.get(productId) ?? null;
        daysIdle = lastSaleDate === null ? null : daysSince(lastSaleDate, today);
        dead = lastSaleDate === null || (daysIdle !== null && daysIdle > days);
      } else {
        daysIdle = numOrNull(row.idle);
        dead = daysIdle !== null && daysIdle > days;
      }
      if (!dead) continue;

      const unitCost = numOrNull(row.unit_cost);
      items.push({
        productId,
        qtyOnHand: qty,
        valueAtRisk: round2(unitCost === null ? num(row.value) : qty * unitCost),
        lastSaleDate,
        daysIdle,
        neverSold: useSales && lastSaleDate === null,
      });
    }
    items.sort((a, b) => b.valueAtRisk - a.valueAtRisk || compareIds(a.productId, b.productId));

    let total = 0;
    for (const item of items) total += item.valueAtRisk;

    return ok({
      daysThreshold: days,
      basis: useSales ? 'sales_history' : 'snapshot_movement',
      deadStockCount: items.length,
      totalValueAtRisk: round2(total),
      items,
    });
  },
});

const overstock = defineAnalysis<Record<string, never>, OverstockReport>({
  name: 'get_overstock_analysis',
  category: 'inventory',
  description: 'Current stock flagged overstock, ranked by the inventory value tied up.',
  tags: ['overstock', 'excess', 'inventory'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const rows = currentSnapshot(db)
      .filter((row) => row.stockStatus?.trim().toLowerCase() === 'overstock')
      .sort((a, b) => b.inventoryValue - a.inventoryValue || byLocation(a, b));

    let total = 0;
    for (const row of rows) total += row.inventoryValue;

    const report: OverstockReport = {
      overstockedItems: rows.length,
      totalExcessValue: round2(total),
      items: rows.map(toSnapshotLine),
    };
    if (!columnSet(db, 'inventory_snapshot').has('stock_status')) {
      report.note = 'inventory_snapshot has no stock_status column; nothing is flagged overstock.';
    }
    return ok(report);
  },
});

const stockoutRisk = defineAnalysis<{ horizonDays: number }, StockoutRiskReport>({
  name: 'get_stockout_risk',
  category: 'inventory',
  description: 'Current stock whose days of supply run out within the horizon.',
  tags: ['stockout', 'risk', 'supply', 'days'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: {
    type: 'object',
    properties: { horizon_days: { type: 'integer', description: 'Look-ahead window in days', default: 14, minimum: 1 } },
  },
  parse: (input, policy) => ({
    horizonDays: readNumber(input, 'horizon_days', policy.stockoutHorizonDays, { min: 1 }),
  }),
  run: ({ db }, { horizonDays }) => {
    const rows = currentSnapshot(db)
      .filter((row) => row.daysOfSupply !== null && row.daysOfSupply >= 0 && row.daysOfSupply < horizonDays)
      .sort((a, b) => nullsLast(a.daysOfSupply, b.daysOfSupply) || byLocation(a, b));

    const report: StockoutRiskReport = {
      horizonDays,
      atRiskCount: rows.length,
      items: rows.map(toSnapshotLine),
    };
    if (!columnSet(db, 'inventory_snapshot').has('days_of_supply')) {
      report.note = 'inventory_snapshot has no days_of_supply column; stockout risk cannot be assessed.';
    }
    return ok(report);
  },
});

const inventoryAging = defineAnalysis<{ limit: number }, InventoryAgingReport>({
  name: 'get_inventory_aging',
  category: 'inventory',
  description: 'Current inventory bucketed by days since last movement (0-30, 31-60, 61-90, 90+).',
  tags: ['aging', 'inventory', 'movement'],
  requires: { all: ['inventory_snapshot'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 100, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 100) }),
  run: ({ db }, { limit }) => {
    const cols = columnSet(db, 'inventory_snapshot');
    const products = db
      .query(
        `SELECT product_id, COALESCE(SUM(qty_on_hand), 0) AS qty, COALESCE(SUM(${inventoryValueSql(cols)}), 0) AS value,
                MAX(${col(cols, 'days_since_last_movement')}) AS idle
         FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT} AND product_id IS NOT NULL
         GROUP BY product_id`,
      )
      .map((row) => {
        const daysIdle = numOrNull(row.idle);
        return {
          productId: str(row.product_id),
          qty: num(row.qty),
          value: num(row.value),
          daysIdle,
          bucket: daysIdle === null ? null : agingBucketFor(daysIdle),
        };
      });

    const buckets = AGING_BUCKETS.map((bucket) => {
      const members = products.filter((p) => p.bucket === bucket);
      let qty = 0;
      let value = 0;
      for (const m of members) {
        qty += m.qty;
        value += m.value;
      }
      return { bucket, skuCount: members.length, qty, totalValue: round2(value) };
    });

    const detail = [...products]
      .sort((a, b) => nullsLast(negate(a.daysIdle), negate(b.daysIdle)) || compareIds(a.productId, b.productId))
      .slice(0, limit)
      .map((p) => ({ ...p, value: round(p.value, 2) }));

    return ok({
      buckets,
      unclassified: products.filter((p) => p.bucket === null).length,
      products: detail,
    });
  },
});

export const inventoryAnalyses: RegisteredAnalysis[] = [
  safetyStockAnalysis,
  eoqAnalysis,
  reorderAlerts,
  smartReorder,
  deadStock,
  overstock,
  stockoutRisk,
  inventoryAging,
];
