/**
 * Analytics Module - demand forecasting, anomalies and sales trends
 */

import { quoteIdent, type SqlParam } from '../db';
import { DATASET_CATEGORIES, type DatasetCategory } from '../db/datasets';
import { columnSet, lookupRows } from '../db/sql';
import { num, numOrNull, plainRow, round2, str, strOrNull } from '../db/values';
import { defineAnalysis, type RegisteredAnalysis } from '../analyses/registry';
import { readEnum, readLimit, readNumber, readOptionalString, readString } from '../analyses/params';
import { ok, type InsufficientData } from '../analyses/types';
import { concentrationRisk } from '../metrics/calculations';
import { InvalidInputError } from '../infra/errors';
import { compareIds } from '../utils/stats';
import { movingAverageForecast, seasonalIndices, withGrowth, zScoreAnomalies } from './calculations';
import type {
  AnomalyReport,
  CustomerConcentration,
  CustomerShare,
  DemandForecast,
  Granularity,
  RevenueTrends,
  Seasonality,
  TopSku,
  VelocityLine,
} from './types';

export * from './types';
export { movingAverageForecast, zScoreAnomalies, withGrowth, seasonalIndices } from './calculations';

const MAX_ANOMALIES = 50;

/** Gate passed but the filtered history is empty */
function noHistory(message: string): InsufficientData {
  return { status: 'insufficient_data', message, missing: [] };
}

const forecast = defineAnalysis<{ sku: string; horizonDays: number; window: number }, DemandForecast>({
  name: 'forecast_demand',
  category: 'demand',
  description: 'Moving-average demand forecast for one SKU with a trend read against the previous window.',
  tags: ['forecast', 'demand', 'trend', 'moving-average'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: {
      sku: { type: 'string', description: 'Product id' },
      horizon_days: { type: 'integer', description: 'Days to project', default: 30, minimum: 1 },
      window: { type: 'integer', description: 'Moving-average window in days', default: 7, minimum: 1 },
    },
    required: ['sku'],
  },
  parse: (input, policy) => ({
    sku: readString(input, 'sku'),
    horizonDays: readNumber(input, 'horizon_days', policy.forecastHorizonDays, { min: 1, integer: true }),
    window: readNumber(input, 'window', policy.forecastWindow, { min: 1, integer: true }),
  }),
  run: ({ db }, { sku, horizonDays, window }) => {
    const daily = db
      .query(
        `SELECT transaction_date AS date, COALESCE(SUM(qty_sold), 0) AS qty
         FROM sales_transactions WHERE product_id = ?
         GROUP BY transaction_date ORDER BY transaction_date`,
        [sku],
      )
      .map((row) => ({ date: str(row.date), qty: num(row.qty) }));
    if (daily.length === 0) {
      return noHistory(`No sales history for product '${sku}'.`);
    }

    const result = movingAverageForecast(
      daily.map((d) => d.qty),
      window,
      horizonDays,
    );
    return ok({ productId: sku, ...result, recentDaily: daily.slice(-result.window) });
  },
});

interface AnomalyParams {
  table: DatasetCategory;
  column: string;
  zThreshold: number;
}

const anomalies = defineAnalysis<AnomalyParams, AnomalyReport>({
  name: 'detect_anomalies',
  category: 'demand',
  description: 'Z-score outliers in a numeric column of an uploaded dataset.',
  tags: ['anomaly', 'outlier', 'zscore', 'quality'],
  requires: ({ table }) => ({ all: [table] }),
  input_schema: {
    type: 'object',
    properties: {
      table: { type: 'string', description: 'Dataset to scan', enum: DATASET_CATEGORIES, default: 'sales_transactions' },
      column: { type: 'string', description: 'Numeric column to scan', default: 'qty_sold' },
      z_threshold: { type: 'number', description: 'Flag |z| above this', default: 2, minimum: 0 },
    },
  },
  parse: (input, policy) => ({
    table: readEnum(input, 'table', DATASET_CATEGORIES, 'sales_transactions'),
    column: readOptionalString(input, 'column') ?? 'qty_sold',
    zThreshold: readNumber(input, 'z_threshold', policy.anomalyZThreshold, { min: 0, exclusiveMin: true }),
  }),
  run: ({ db }, { table, column, zThreshold }) => {
    if (!columnSet(db, table).has(column)) {
      throw new InvalidInputError(`Column '${column}' does not exist in ${table}`, 'column');
    }
    const rows = db.query(`SELECT * FROM ${quoteIdent(table)}`);
    const scan = zScoreAnomalies(
      rows.map((row) => numOrNull(row[column])),
      zThreshold,
    );
    const flagged = [...scan.flagged]
      .sort((a, b) => Math.abs(b.zScore) - Math.abs(a.zScore) || a.index - b.index)
      .slice(0, MAX_ANOMALIES);

    return ok({
      table,
      column,
      zThreshold,
      mean: round2(scan.mean),
      stdDev: round2(scan.stdDev),
      totalRows: rows.length,
      anomaliesFound: scan.flagged.length,
      anomalies: flagged.map((f) => ({
        rowNumber: f.index + 1,
        value: f.value,
        zScore: round2(f.zScore),
        row: plainRow(rows[f.index]),
      })),
    });
  },
});

const GRANULARITIES = ['daily', 'weekly', 'monthly'] as const;

const PERIOD_SQL: Record<Granularity, string> = {
  daily: 'date(transaction_date)',
  // Monday of the ISO week
  weekly: "date(transaction_date, 'weekday 0', '-6 days')",
  monthly: "strftime('%Y-%m', transaction_date)",
};

const revenueTrends = defineAnalysis<{ granularity: Granularity }, RevenueTrends>({
  name: 'get_revenue_trends',
  category: 'demand',
  description: 'Revenue, units and active SKUs per day, ISO week or month with period-over-period growth.',
  tags: ['revenue', 'trend', 'growth', 'sales'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: {
      granularity: { type: 'string', description: 'Period size', enum: GRANULARITIES, default: 'monthly' },
    },
  },
  parse: (input) => ({ granularity: readEnum(input, 'granularity', GRANULARITIES, 'monthly') }),
  run: ({ db }, { granularity }) => {
    const periods = db
      .query(
        `SELECT ${PERIOD_SQL[granularity]} AS period,
                COALESCE(SUM(total_revenue), 0) AS revenue,
                COALESCE(SUM(qty_sold), 0) AS units,
                COUNT(DISTINCT product_id) AS skus
         FROM sales_transactions
         GROUP BY period HAVING period IS NOT NULL ORDER BY period`,
      )
      .map((row) => ({
        period: str(row.period),
        revenue: round2(num(row.revenue)),
        units: num(row.units),
        skus: num(row.skus),
      }));
    return ok({ granularity, periods: withGrowth(periods) });
  },
});

const velocity = defineAnalysis<{ limit: number }, { products: VelocityLine[] }>({
  name: 'get_sales_velocity',
  category: 'demand',
  description: 'Units sold per selling day for each product, fastest first.',
  tags: ['velocity', 'sales', 'units', 'fast-movers'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 30, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 30) }),
  run: ({ db }, { limit }) => {
    const lines = db
      .query(
        `SELECT product_id, COALESCE(SUM(qty_sold), 0) AS total, COUNT(DISTINCT transaction_date) AS days,
                COALESCE(SUM(total_revenue), 0) AS revenue
         FROM sales_transactions WHERE product_id IS NOT NULL GROUP BY product_id`,
      )
      .map((row): VelocityLine => {
        const total = num(row.total);
        const days = num(row.days);
        return {
          productId: str(row.product_id),
          totalSold: total,
          saleDays: days,
          dailyVelocity: days > 0 ? round2(total / days) : 0,
          totalRevenue: round2(num(row.revenue)),
        };
      })
      .sort((a, b) => b.dailyVelocity - a.dailyVelocity || compareIds(a.productId, b.productId));
    return ok({ products: lines.slice(0, limit) });
  },
});

const topSkus = defineAnalysis<{ limit: number }, { products: TopSku[] }>({
  name: 'get_top_skus',
  category: 'demand',
  description: 'Best-selling products by revenue with units and gross profit.',
  tags: ['top', 'sku', 'revenue', 'bestsellers'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Products to list', default: 20, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 20) }),
  run: ({ db }, { limit }) => {
    const cols = columnSet(db, 'sales_transactions');
    const profit = cols.has('gross_profit')
      ? 'SUM(gross_profit)'
      : cols.has('total_cost')
        ? 'SUM(total_revenue - total_cost)'
        : 'NULL';
    const names = lookupRows(db, 'products', 'product_id', ['product_name']);
    const products = db
      .query(
        `SELECT product_id, COALESCE(SUM(total_revenue), 0) AS revenue, COALESCE(SUM(qty_sold), 0) AS units,
                ${profit} AS profit
         FROM sales_transactions WHERE product_id IS NOT NULL GROUP BY product_id`,
      )
      .map((row): TopSku => {
        const productId = str(row.product_id);
        const grossProfit = numOrNull(row.profit);
        return {
          productId,
          productName: strOrNull(names.get(productId)?.product_name),
          revenue: round2(num(row.revenue)),
          units: num(row.units),
          grossProfit: grossProfit === null ? null : round2(grossProfit),
        };
      })
      .sort((a, b) => b.revenue - a.revenue || compareIds(a.productId, b.productId));
    return ok({ products: products.slice(0, limit) });
  },
});

const customerConcentration = defineAnalysis<{ limit: number }, CustomerConcentration>({
  name: 'get_customer_concentration',
  category: 'demand',
  description: 'Share of revenue held by the top customers, labelled high above 80% and medium above 50%.',
  tags: ['customers', 'concentration', 'revenue', 'risk'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Top customers to include', default: 10, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 10) }),
  run: ({ db }, { limit }) => {
    const total = num(db.query('SELECT COALESCE(SUM(total_revenue), 0) AS total FROM sales_transactions')[0]?.total);
    if (!columnSet(db, 'sales_transactions').has('customer_id')) {
      return ok({
        totalRevenue: round2(total),
        topCustomers: [],
        topSharePct: 0,
        concentrationRisk: 'low',
        note: 'sales_transactions has no customer_id column.',
      });
    }

    const names = lookupRows(db, 'customers', 'customer_id', ['customer_name']);
    const ranked = db
      .query(
        `SELECT customer_id, COALESCE(SUM(total_revenue), 0) AS revenue
         FROM sales_transactions WHERE customer_id IS NOT NULL GROUP BY customer_id`,
      )
      .map((row) => ({ customerId: str(row.customer_id), revenue: num(row.revenue) }))
      .sort((a, b) => b.revenue - a.revenue || compareIds(a.customerId, b.customerId))
      .slice(0, limit);

    let topShare = 0;
    const topCustomers = ranked.map((c): CustomerShare => {
      const share = total > 0 ? (c.revenue * 100) / total : 0;
      topShare += share;
      return {
        customerId: c.customerId,
        customerName: strOrNull(names.get(c.customerId)?.customer_name),
        revenue: round2(c.revenue),
        sharePct: round2(share),
      };
    });

    return ok({
      totalRevenue: round2(total),
      topCustomers,
      topSharePct: round2(topShare),
      concentrationRisk: concentrationRisk(topShare),
    });
  },
});

const seasonality = defineAnalysis<{ sku?: string }, Seasonality>({
  name: 'get_seasonality_analysis',
  category: 'demand',
  description: 'Units and revenue per calendar month with a seasonal index against the monthly average.',
  tags: ['seasonality', 'monthly', 'demand', 'peak'],
  requires: { all: ['sales_transactions'] },
  input_schema: {
    type: 'object',
    properties: { sku: { type: 'string', description: 'Product id; all products when omitted' } },
  },
  parse: (input) => ({ sku: readOptionalString(input, 'sku') }),
  run: ({ db }, { sku }) => {
    const params: SqlParam[] = sku === undefined ? [] : [sku];
    const months = db
      .query(
        `SELECT CAST(strftime('%m', transaction_date) AS INTEGER) AS month,
                COALESCE(SUM(qty_sold), 0) AS qty, COALESCE(SUM(total_revenue), 0) AS revenue
         FROM sales_transactions ${sku === undefined ? '' : 'WHERE product_id = ?'}
         GROUP BY month HAVING month IS NOT NULL ORDER BY month`,
        params,
      )
      .map((row) => ({ month: num(row.month), qty: num(row.qty), revenue: round2(num(row.revenue)) }));

    if (months.length === 0) {
      return noHistory(sku === undefined ? 'No dated sales history to analyse.' : `No sales history for product '${sku}'.`);
    }

    let peak = months[0];
    let low = months[0];
    for (const m of months) {
      if (m.qty > peak.qty) peak = m;
      if (m.qty < low.qty) low = m;
    }

    return ok({
      productId: sku ?? null,
      months: seasonalIndices(months),
      peakMonth: peak.month,
      lowMonth: low.month,
    });
  },
});

export const analyticsAnalyses: RegisteredAnalysis[] = [
  forecast,
  anomalies,
  revenueTrends,
  velocity,
  topSkus,
  customerConcentration,
  seasonality,
];
