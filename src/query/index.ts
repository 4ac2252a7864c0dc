/**
 * Query Module - read-only SQL, store housekeeping and the dashboard
 */

import { quoteIdent, type QueryResult, type TabularHandle } from '../db';
import { CURRENT_SNAPSHOT, col, columnSet } from '../db/sql';
import { DATASET_CATEGORIES, UPLOAD_HISTORY_TABLE, type DatasetCategory } from '../db/datasets';
import { num, numOrNull, plainRow, round1, round2, str, strOrNull } from '../db/values';
import { datasetStatus, isAvailable, probe } from '../availability';
import { withGraph } from '../graph';
import { defineAnalysis, type RegisteredAnalysis } from '../analyses/registry';
import { readEnum, readLimit, readOptionalString, readString } from '../analyses/params';
import { ok } from '../analyses/types';
import { computeKpis, currentInventoryValue } from '../metrics';
import { InvalidInputError, TabularStoreError, errorMessage } from '../infra/errors';
import { createLogger } from '../utils/logger';
import { blockedKeyword } from './gate';
import type {
  Dashboard,
  DataQualityReport,
  DatabaseStatus,
  GraphStatus,
  ProductCatalog,
  SchemaInfo,
  ShipmentStatusSummary,
  ShipmentTracking,
  SqlQueryResult,
  TableQuality,
  UploadRecord,
  UploadStatus,
  VersionHistory,
} from './types';

export * from './types';
export { blockedKeyword, BLOCKED_KEYWORDS } from './gate';

const logger = createLogger('query');

// ---------------------------------------------------------------------------
// Ad-hoc SQL
// ---------------------------------------------------------------------------

/**
 * Execute a read statement. Blocked keywords and SQL errors both surface as
 * InvalidInputError.
 */
export function executeReadQuery(db: TabularHandle, sql: string, rowCap: number): SqlQueryResult {
  const keyword = blockedKeyword(sql);
  if (keyword) {
    logger.warn({ keyword }, 'Rejected write statement');
    throw new InvalidInputError(`Write operations blocked: ${keyword}`, 'sql');
  }

  let result: QueryResult;
  try {
    result = db.select(sql);
  } catch (err) {
    if (err instanceof TabularStoreError) throw new InvalidInputError(err.message, 'sql');
    throw err;
  }

  return {
    columns: result.columns,
    rowCount: result.rows.length,
    truncated: result.rows.length > rowCap,
    rows: result.rows.slice(0, rowCap).map(plainRow),
  };
}

const sqlQuery = defineAnalysis<{ sql: string }, SqlQueryResult>({
  name: 'run_sql_query',
  category: 'data',
  description: 'Run a read-only SQL query against the uploaded tables. Write statements are rejected.',
  tags: ['sql', 'query', 'select', 'custom'],
  input_schema: {
    type: 'object',
    properties: { sql: { type: 'string', description: 'SELECT statement' } },
    required: ['sql'],
  },
  parse: (input) => ({ sql: readString(input, 'sql') }),
  run: ({ db, policy }, { sql }) => ok(executeReadQuery(db, sql, policy.queryRowCap)),
});

// ---------------------------------------------------------------------------
// Schema and upload history
// ---------------------------------------------------------------------------

const schemaInfo = defineAnalysis<{ table: DatasetCategory }, SchemaInfo>({
  name: 'get_schema_info',
  category: 'data',
  description: 'Columns, row count and a five-row sample of one uploaded table.',
  tags: ['schema', 'columns', 'table', 'sample'],
  requires: ({ table }) => ({ all: [table] }),
  input_schema: {
    type: 'object',
    properties: { table: { type: 'string', description: 'Dataset category', enum: DATASET_CATEGORIES } },
    required: ['table'],
  },
  parse: (input) => {
    readString(input, 'table');
    return { table: readEnum(input, 'table', DATASET_CATEGORIES, 'products') };
  },
  run: ({ db }, { table }) =>
    ok({
      table,
      rowCount: db.countRows(table),
      columns: db.tableColumns(table),
      sample: db.query(`SELECT * FROM ${quoteIdent(table)} LIMIT 5`).map(plainRow),
    }),
});

const listUploads = defineAnalysis<Record<string, never>, UploadStatus>({
  name: 'list_uploads',
  category: 'data',
  description: 'Upload status and row count of every dataset category.',
  tags: ['uploads', 'datasets', 'status', 'files'],
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const datasets = datasetStatus(db);
    return ok({ uploaded: datasets.filter((d) => d.status === 'uploaded').length, datasets });
  },
});

export function uploadHistory(db: TabularHandle, limit: number): UploadRecord[] {
  if (!db.tableExists(UPLOAD_HISTORY_TABLE)) return [];
  const cols = columnSet(db, UPLOAD_HISTORY_TABLE);
  return db
    .query(
      `SELECT id, category, filename, uploaded_at, row_count, ${col(cols, 'column_count')} AS column_count, status
       FROM ${quoteIdent(UPLOAD_HISTORY_TABLE)} ORDER BY id DESC LIMIT ?`,
      [limit],
    )
    .map((row) => ({
      id: num(row.id),
      category: str(row.category),
      filename: strOrNull(row.filename),
      uploadedAt: str(row.uploaded_at),
      rowCount: num(row.row_count),
      columnCount: numOrNull(row.column_count),
      status: str(row.status),
    }));
}

const versionHistory = defineAnalysis<{ limit: number }, VersionHistory>({
  name: 'get_version_history',
  category: 'data',
  description: 'Upload history, newest first.',
  tags: ['history', 'uploads', 'versions', 'audit'],
  input_schema: {
    type: 'object',
    properties: { limit: { type: 'integer', description: 'Maximum entries', default: 50, minimum: 1 } },
  },
  parse: (input) => ({ limit: readLimit(input, 50) }),
  run: ({ db }, { limit }) => {
    const history = uploadHistory(db, limit);
    return ok(history.length === 0 ? { history, note: 'No uploads recorded yet.' } : { history });
  },
});

// ---------------------------------------------------------------------------
// Data quality
// ---------------------------------------------------------------------------

export function tableQuality(db: TabularHandle, table: DatasetCategory): TableQuality {
  const columns = db.tableColumns(table).map((c) => c.name);
  const tableId = quoteIdent(table);
  const rows = db.countRows(table);

  const nullCounts: Record<string, number> = {};
  if (columns.length > 0) {
    const select = columns.map((c) => `SUM(CASE WHEN ${quoteIdent(c)} IS NULL THEN 1 ELSE 0 END) AS ${quoteIdent(c)}`);
    const counts = db.query(`SELECT ${select.join(', ')} FROM ${tableId}`)[0] ?? {};
    for (const c of columns) {
      const n = num(counts[c]);
      if (n > 0) nullCounts[c] = n;
    }
  }

  const distinct = num(db.query(`SELECT COUNT(*) AS n FROM (SELECT DISTINCT * FROM ${tableId})`)[0]?.n);
  const duplicateRows = rows - distinct;
  const qualityScore = Math.max(0, 100 - Object.keys(nullCounts).length * 5 - Math.min(duplicateRows, 10) * 2);

  return { table, rows, columns: columns.length, nullCounts, duplicateRows, qualityScore };
}

const dataQuality = defineAnalysis<Record<string, never>, DataQualityReport>({
  name: 'get_data_quality_report',
  category: 'data',
  description: 'Null counts, duplicate rows and a 0-100 quality score for every uploaded table.',
  tags: ['quality', 'nulls', 'duplicates', 'validation'],
  requires: { all: [], any: [...DATASET_CATEGORIES] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => {
    const tables = DATASET_CATEGORIES.filter((c) => isAvailable(db, c)).map((c) => tableQuality(db, c));
    const overall = tables.reduce((acc, t) => acc + t.qualityScore, 0) / tables.length;
    return ok({ overallScore: round1(overall), tables });
  },
});

// ---------------------------------------------------------------------------
// Store status
// ---------------------------------------------------------------------------

const databaseRefresh = defineAnalysis<Record<string, never>, DatabaseStatus>({
  name: 'trigger_database_refresh',
  category: 'data',
  description: 'Re-read the state of both stores: dataset row counts and graph node/edge counts.',
  tags: ['database', 'status', 'refresh', 'graph'],
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: async ({ db, graph }) => {
    const datasets = datasetStatus(db).map((d) => ({ ...d, columns: db.tableColumns(d.category).length }));

    let graphStatus: GraphStatus;
    try {
      const counts = await withGraph(graph, (session) => session.counts());
      graphStatus = { backend: graph.backend, status: 'connected', counts };
    } catch (err) {
      graphStatus = { backend: graph.backend, status: 'unavailable', error: errorMessage(err) };
    }

    return ok({
      tabular: { datasets, totalRows: datasets.reduce((acc, d) => acc + d.rowCount, 0) },
      graph: graphStatus,
    });
  },
});

// ---------------------------------------------------------------------------
// Dashboard
// ---------------------------------------------------------------------------

export function buildDashboard(db: TabularHandle): Dashboard {
  const availableDatasets = DATASET_CATEGORIES.filter((c) => probe(db, c).available);
  const has = (c: DatasetCategory) => availableDatasets.includes(c);
  const dashboard: Dashboard = { availableDatasets, kpis: computeKpis(db) };

  if (has('sales_transactions')) {
    const row = db.query(
      `SELECT COALESCE(SUM(total_revenue), 0) AS revenue, COALESCE(SUM(qty_sold), 0) AS units, COUNT(*) AS txns,
              COUNT(DISTINCT product_id) AS skus, COUNT(DISTINCT transaction_date) AS days
       FROM sales_transactions`,
    )[0] ?? {};
    dashboard.revenue = {
      totalRevenue: round2(num(row.revenue)),
      unitsSold: num(row.units),
      transactions: num(row.txns),
      skus: num(row.skus),
      days: num(row.days),
    };
  }

  if (has('inventory_snapshot')) {
    const row = db.query(
      `SELECT COUNT(DISTINCT product_id) AS skus,
              SUM(CASE WHEN qty_on_hand <= reorder_point THEN 1 ELSE 0 END) AS below,
              SUM(CASE WHEN reorder_point > 0 AND qty_on_hand > 3 * reorder_point THEN 1 ELSE 0 END) AS over
       FROM inventory_snapshot WHERE ${CURRENT_SNAPSHOT}`,
    )[0] ?? {};
    dashboard.inventory = {
      totalValue: round2(currentInventoryValue(db)),
      skus: num(row.skus),
      belowReorderPoint: num(row.below),
      overstocked: num(row.over),
    };
  }

  if (has('suppliers')) {
    const cols = columnSet(db, 'suppliers');
    const row = db.query(
      `SELECT COUNT(*) AS n, AVG(${col(cols, 'avg_lead_time_days')}) AS lead, AVG(${col(cols, 'on_time_delivery_rate')}) AS otd
       FROM suppliers`,
    )[0] ?? {};
    const lead = numOrNull(row.lead);
    const otd = numOrNull(row.otd);
    dashboard.suppliers = {
      count: num(row.n),
      avgLeadTimeDays: lead === null ? null : round1(lead),
      avgOnTimeDeliveryRate: otd === null ? null : round2(otd),
    };
  }

  if (has('customers')) {
    dashboard.customers = { count: db.countRows('customers') };
  }

  if (has('ar_ledger')) {
    const cols = columnSet(db, 'ar_ledger');
    const outstanding = cols.has('paid_date') ? 'paid_date IS NULL' : '1 = 1';
    const row = db.query(
      `SELECT COUNT(*) AS n, COALESCE(SUM(invoice_amount), 0) AS total,
              COALESCE(SUM(CASE WHEN ${outstanding} THEN invoice_amount ELSE 0 END), 0) AS open
       FROM ar_ledger`,
    )[0] ?? {};
    dashboard.receivables = {
      invoices: num(row.n),
      totalInvoiced: round2(num(row.total)),
      outstanding: round2(num(row.open)),
    };
  }

  if (has('ap_ledger')) {
    const row = db.query('SELECT COUNT(*) AS n, COALESCE(SUM(invoice_amount), 0) AS total FROM ap_ledger')[0] ?? {};
    dashboard.payables = { invoices: num(row.n), totalInvoiced: round2(num(row.total)) };
  }

  if (has('purchase_orders')) {
    const cols = columnSet(db, 'purchase_orders');
    const row = db.query(
      `SELECT COUNT(DISTINCT po_number) AS n, SUM(${col(cols, 'total_po_value')}) AS value FROM purchase_orders`,
    )[0] ?? {};
    const value = numOrNull(row.value);
    dashboard.purchaseOrders = { count: num(row.n), totalValue: value === null ? null : round2(value) };
  }

  if (has('shipments')) {
    const row = db.query(
      `SELECT COUNT(*) AS n,
              SUM(CASE WHEN LOWER(status) IN ('in transit', 'in_transit') THEN 1 ELSE 0 END) AS transit
       FROM shipments`,
    )[0] ?? {};
    dashboard.shipments = { count: num(row.n), inTransit: num(row.transit) };
  }

  return dashboard;
}

const fullDashboard = defineAnalysis<Record<string, never>, Dashboard>({
  name: 'get_full_dashboard',
  category: 'kpi',
  description: 'One-call overview: KPIs plus a section per uploaded dataset.',
  tags: ['dashboard', 'overview', 'summary', 'kpi'],
  requires: { all: [], any: [...DATASET_CATEGORIES] },
  input_schema: { type: 'object', properties: {} },
  parse: () => ({}),
  run: ({ db }) => ok(buildDashboard(db)),
});

// ---------------------------------------------------------------------------
// Shipments and catalog
// ---------------------------------------------------------------------------

const IN_TRANSIT = "LOWER(status) IN ('in transit', 'in_transit')";

const shipmentTracking = defineAnalysis<{ status?: string; limit: number }, ShipmentTracking>({
  name: 'get_shipment_tracking',
  category: 'supplier',
  description: 'Shipment counts, quantities and delays by status, with the matching (or in-transit) shipments.',
  tags: ['shipments', 'tracking', 'delay', 'freight', 'logistics'],
  requires: { all: ['shipments'] },
  input_schema: {
    type: 'object',
    properties: {
      status: { type: 'string', description: 'Only shipments with this status (case-insensitive)' },
      limit: { type: 'integer', description: 'Maximum shipments listed', default: 50, minimum: 1 },
    },
  },
  parse: (input) => ({ status: readOptionalString(input, 'status'), limit: readLimit(input, 50) }),
  run: ({ db }, { status, limit }) => {
    const cols = columnSet(db, 'shipments');
    const summary = db
      .query(
        `SELECT status, COUNT(*) AS n, COALESCE(SUM(${col(cols, 'qty_shipped')}), 0) AS qty,
                COALESCE(SUM(${col(cols, 'freight_cost')}), 0) AS freight, AVG(${col(cols, 'delay_days')}) AS delay
         FROM shipments GROUP BY status ORDER BY n DESC, status`,
      )
      .map((row): ShipmentStatusSummary => {
        const delay = numOrNull(row.delay);
        return {
          status: str(row.status),
          shipments: num(row.n),
          totalQty: num(row.qty),
          totalFreight: round2(num(row.freight)),
          avgDelayDays: delay === null ? null : round1(delay),
        };
      });

    const where = status === undefined ? IN_TRANSIT : 'LOWER(status) = LOWER(?)';
    const params = status === undefined ? [limit] : [status, limit];
    const shipments = db
      .query(
        `SELECT * FROM shipments WHERE ${where}
         ORDER BY ${col(cols, 'expected_arrival_date')}, CAST(shipment_id AS TEXT) LIMIT ?`,
        params,
      )
      .map(plainRow);

    return ok({ statusFilter: status ?? null, summary, shipments });
  },
});

const productCatalog = defineAnalysis<{ category?: string; abcClass?: string; limit: number }, ProductCatalog>({
  name: 'get_product_catalog',
  category: 'data',
  description: 'Product master rows, optionally filtered by category and ABC class.',
  tags: ['products', 'catalog', 'category', 'abc'],
  requires: { all: ['products'] },
  input_schema: {
    type: 'object',
    properties: {
      category: { type: 'string', description: 'Product category' },
      abc_class: { type: 'string', description: 'ABC class', enum: ['A', 'B', 'C'] },
      limit: { type: 'integer', description: 'Maximum products', default: 100, minimum: 1 },
    },
  },
  parse: (input) => ({
    category: readOptionalString(input, 'category'),
    abcClass: input.abc_class === undefined || input.abc_class === null ? undefined : readEnum(input, 'abc_class', ['A', 'B', 'C'], 'A'),
    limit: readLimit(input, 100),
  }),
  run: ({ db }, { category, abcClass, limit }) => {
    const cols = columnSet(db, 'products');
    const filters: string[] = [];
    const params: Array<string | number> = [];
    const addFilter = (column: string, value: string | undefined) => {
      if (value === undefined) return;
      if (!cols.has(column)) {
        throw new InvalidInputError(`The products table has no ${column} column`, column);
      }
      filters.push(`${quoteIdent(column)} = ?`);
      params.push(value);
    };
    addFilter('category', category);
    addFilter('abc_class', abcClass);

    const where = filters.length > 0 ? `WHERE ${filters.join(' AND ')}` : '';
    const total = num(db.query(`SELECT COUNT(*) AS n FROM products ${where}`, params)[0]?.n);
    const products = db
      .query(`SELECT * FROM products ${where} ORDER BY CAST(product_id AS TEXT) LIMIT ?`, [...params, limit])
      .map(plainRow);
    return ok({ total, products });
  },
});

export const queryAnalyses: RegisteredAnalysis[] = [
  sqlQuery,
  schemaInfo,
  listUploads,
  versionHistory,
  dataQuality,
  databaseRefresh,
  fullDashboard,
  shipmentTracking,
  productCatalog,
];
