import { describe, it, expect, afterEach } from 'vitest';
import { runAnalysis } from '../analyses/runner';
import { shutdownRuntime, type EngineRuntime } from '../runtime';
import { createTestRuntime, upload } from '../test-helpers';

const PRODUCTS = ['product_id,product_name,unit_cost', 'P1,Bracket,1', 'P2,Bolt,2', 'P3,Nut,3'];

describe('query analyses', () => {
  let runtime: EngineRuntime;

  afterEach(async () => {
    await shutdownRuntime(runtime);
  });

  // ===========================================================================
  // run_sql_query
  // ===========================================================================

  describe('run_sql_query', () => {
    it('caps the rows returned and reports the full count', async () => {
      ({ runtime } = createTestRuntime({ policy: { queryRowCap: 2 } }));
      await upload(runtime, 'products', PRODUCTS);

      expect(await runAnalysis(runtime, 'run_sql_query', { sql: 'SELECT product_id FROM products ORDER BY product_id' })).toEqual({
        status: 'ok',
        analysis: 'run_sql_query',
        data: {
          columns: ['product_id'],
          rowCount: 3,
          truncated: true,
          rows: [{ product_id: 'P1' }, { product_id: 'P2' }],
        },
      });
    });

    it('blocks write statements', async () => {
      ({ runtime } = createTestRuntime());
      expect(await runAnalysis(runtime, 'run_sql_query', { sql: 'drop table products' })).toEqual({
        status: 'invalid_input',
        analysis: 'run_sql_query',
        message: 'Write operations blocked: DROP',
      });
    });

    it('blocks REPLACE INTO and leaves the table unchanged', async () => {
      ({ runtime } = createTestRuntime());
      await upload(runtime, 'products', PRODUCTS);

      expect(
        await runAnalysis(runtime, 'run_sql_query', {
          sql: "REPLACE INTO products (product_id, product_name) VALUES ('P9', 'Ghost')",
        }),
      ).toEqual({ status: 'invalid_input', analysis: 'run_sql_query', message: 'Write operations blocked: REPLACE' });
      expect(await runAnalysis(runtime, 'run_sql_query', { sql: "SELECT product_id FROM products WHERE product_id = 'P9'" })).toMatchObject({
        status: 'ok',
        data: { rowCount: 0, rows: [] },
      });
    });

    it('reports SQL errors as invalid input', async () => {
      ({ runtime } = createTestRuntime());
      const outcome = await runAnalysis(runtime, 'run_sql_query', { sql: 'SELECT * FROM nowhere' });
      expect(outcome).toMatchObject({ status: 'invalid_input', message: expect.stringMatching(/^Query failed: /) });
    });
  });

  // ===========================================================================
  // Schema and history
  // ===========================================================================

  it('describes one table with a sample', async () => {
    ({ runtime } = createTestRuntime());
    await upload(runtime, 'products', PRODUCTS);

    const outcome = await runAnalysis(runtime, 'get_schema_info', { table: 'products' });
    expect(outcome).toMatchObject({
      status: 'ok',
      data: {
        table: 'products',
        rowCount: 3,
        columns: [
          { name: 'product_id', type: 'TEXT' },
          { name: 'product_name', type: 'TEXT' },
          { name: 'unit_cost', type: 'INTEGER' },
        ],
      },
    });
    expect(outcome).toHaveProperty('data.sample.length', 3);
  });

  it('gates schema info on the requested table', async () => {
    ({ runtime } = createTestRuntime());
    expect(await runAnalysis(runtime, 'get_schema_info', { table: 'shipments' })).toEqual({
      status: 'insufficient_data',
      analysis: 'get_schema_info',
      message: 'Upload shipments to enable this analysis.',
      missing: ['shipments'],
    });
  });

  it('lists upload history newest first', async () => {
    ({ runtime } = createTestRuntime());
    expect(await runAnalysis(runtime, 'get_version_history')).toMatchObject({
      data: { history: [], note: 'No uploads recorded yet.' },
    });

    await upload(runtime, 'products', PRODUCTS);
    await upload(runtime, 'customers', ['customer_id,customer_name', 'C1,Northwind']);

    expect(await runAnalysis(runtime, 'get_version_history')).toEqual({
      status: 'ok',
      analysis: 'get_version_history',
      data: {
        history: [
          { id: 2, category: 'customers', filename: 'customers.csv', uploadedAt: '2024-06-30T12:00:00.000Z', rowCount: 1, columnCount: 2, status: 'success' },
          { id: 1, category: 'products', filename: 'products.csv', uploadedAt: '2024-06-30T12:00:00.000Z', rowCount: 3, columnCount: 3, status: 'success' },
        ],
      },
    });
  });

  it('reports the status of every category', async () => {
    ({ runtime } = createTestRuntime());
    await upload(runtime, 'suppliers', ['supplier_id,supplier_name', 'S1,Acme']);

    const outcome = await runAnalysis(runtime, 'list_uploads');
    expect(outcome).toMatchObject({
      status: 'ok',
      data: {
        uploaded: 1,
        datasets: [
          { category: 'products', status: 'not_uploaded', rowCount: 0, destination: 'tabular' },
          { category: 'customers', status: 'not_uploaded', rowCount: 0, destination: 'tabular' },
          { category: 'suppliers', status: 'uploaded', rowCount: 1, destination: 'tabular+graph' },
          { category: 'inventory_snapshot', status: 'not_uploaded' },
          { category: 'sales_transactions', status: 'not_uploaded' },
          { category: 'purchase_orders', status: 'not_uploaded', destination: 'tabular+graph' },
          { category: 'ar_ledger', status: 'not_uploaded' },
          { category: 'ap_ledger', status: 'not_uploaded' },
          { category: 'shipments', status: 'not_uploaded' },
        ],
      },
    });
  });

  // ===========================================================================
  // Data quality
  // ===========================================================================

  it('scores nulls and duplicate rows', async () => {
    ({ runtime } = createTestRuntime());
    await upload(runtime, 'products', ['product_id,product_name,unit_cost', 'P1,A,1', 'P1,A,1', 'P2,B,']);

    // 100 - 5 x 1 column with nulls - 2 x 1 duplicate = 93
    expect(await runAnalysis(runtime, 'get_data_quality_report')).toEqual({
      status: 'ok',
      analysis: 'get_data_quality_report',
      data: {
        overallScore: 93,
        tables: [
          { table: 'products', rows: 3, columns: 3, nullCounts: { unit_cost: 1 }, duplicateRows: 1, qualityScore: 93 },
        ],
      },
    });
  });

  it('needs at least one dataset for a quality report', async () => {
    ({ runtime } = createTestRuntime());
    expect(await runAnalysis(runtime, 'get_data_quality_report')).toMatchObject({
      status: 'insufficient_data',
      message:
        'Upload products, customers, suppliers, inventory_snapshot, sales_transactions, purchase_orders, ar_ledger, ap_ledger or shipments to enable this analysis.',
    });
  });

  // ===========================================================================
  // Store status
  // ===========================================================================

  it('reports both stores on refresh', async () => {
    const test = createTestRuntime();
    runtime = test.runtime;
    await upload(runtime, 'suppliers', ['supplier_id,supplier_name', 'S1,Acme', 'S2,Beta']);

    expect(await runAnalysis(runtime, 'trigger_database_refresh')).toMatchObject({
      status: 'ok',
      data: {
        tabular: { totalRows: 2 },
        graph: { backend: 'memory', status: 'connected', counts: { suppliers: 2, products: 0, relationships: 0 } },
      },
    });

    test.graph.setAvailable(false);
    expect(await runAnalysis(runtime, 'trigger_database_refresh')).toMatchObject({
      data: { graph: { backend: 'memory', status: 'unavailable', error: 'Graph store is unavailable' } },
    });
  });

  it('builds the dashboard from whatever is uploaded', async () => {
    ({ runtime } = createTestRuntime());
    await upload(runtime, 'sales_transactions', [
      'transaction_date,product_id,qty_sold,total_revenue',
      '2024-06-01,P1,2,20',
      '2024-06-02,P2,3,30',
    ]);

    const outcome = await runAnalysis(runtime, 'get_full_dashboard');
    expect(outcome).toMatchObject({
      status: 'ok',
      data: {
        availableDatasets: ['sales_transactions'],
        revenue: { totalRevenue: 50, unitsSold: 5, transactions: 2, skus: 2, days: 2 },
      },
    });
    expect(outcome).not.toHaveProperty('data.inventory');
  });

  // ===========================================================================
  // Shipments and catalog
  // ===========================================================================

  it('lists in-transit shipments by default', async () => {
    ({ runtime } = createTestRuntime());
    await upload(runtime, 'shipments', [
      'shipment_id,status,qty_shipped,delay_days',
      'SH1,In Transit,10,2',
      'SH2,Delivered,5,0',
      'SH3,in_transit,4,4',
    ]);

    expect(await runAnalysis(runtime, 'get_shipment_tracking')).toMatchObject({
      status: 'ok',
      data: {
        statusFilter: null,
        summary: [
          { status: 'Delivered', shipments: 1, totalQty: 5, avgDelayDays: 0 },
          { status: 'In Transit', shipments: 1, totalQty: 10, avgDelayDays: 2 },
          { status: 'in_transit', shipments: 1, totalQty: 4, avgDelayDays: 4 },
        ],
        shipments: [{ shipment_id: 'SH1' }, { shipment_id: 'SH3' }],
      },
    });

    const delivered = await runAnalysis(runtime, 'get_shipment_tracking', { status: 'delivered' });
    expect(delivered).toMatchObject({ data: { statusFilter: 'delivered', shipments: [{ shipment_id: 'SH2' }] } });
  });

  it('rejects a catalog filter on a column the products table lacks', async () => {
    ({ runtime } = createTestRuntime());
    await upload(runtime, 'products', PRODUCTS);

    expect(await runAnalysis(runtime, 'get_product_catalog', { category: 'Hardware' })).toEqual({
      status: 'invalid_input',
      analysis: 'get_product_catalog',
      message: 'The products table has no category column',
    });
    expect(await runAnalysis(runtime, 'get_product_catalog', { limit: 1 })).toMatchObject({
      data: { total: 3, products: [{ product_id: 'P1', product_name: 'Bracket', unit_cost: 1 }] },
    });
  });
});
