import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { withTabular } from '../db';
import { withGraph } from '../graph';
import type { MemoryGraphStore } from '../graph/memory';
import { shutdownRuntime, type EngineRuntime } from '../runtime';
import { createTestRuntime, csv, upload } from '../test-helpers';
import { getTemplate, resetAllData, templateCsv, uploadDataset } from './index';

const SUPPLIERS = [
  'supplier_id,supplier_name,avg_lead_time_days',
  'S1,Acme,14',
  'S2,Beta,20',
  ',Orphan,5',
];

const PURCHASE_ORDERS = [
  'po_number,supplier_id,product_id,qty_ordered',
  'PO1,S1,P1,10',
  'PO2,S1,P1,5',
  'PO3,S1,P2,5',
  'PO4,S2,P2,5',
];

describe('uploadDataset', () => {
  let runtime: EngineRuntime;
  let graph: MemoryGraphStore;

  beforeEach(() => {
    ({ runtime, graph } = createTestRuntime());
  });

  afterEach(async () => {
    await shutdownRuntime(runtime);
  });

  const graphCounts = () => withGraph(graph, (s) => s.counts());

  // ===========================================================================
  // Tabular
  // ===========================================================================

  it('stores a typed table and reports the optional columns left out', async () => {
    const result = await upload(runtime, 'products', ['product_id,product_name,unit_cost', 'P1,Bracket,4.5', 'P2,Bolt,']);

    expect(result).toEqual({
      category: 'products',
      filename: 'products.csv',
      rowCount: 2,
      columns: [
        { name: 'product_id', type: 'TEXT' },
        { name: 'product_name', type: 'TEXT' },
        { name: 'unit_cost', type: 'REAL' },
      ],
      missingOptional: ['category', 'abc_class', 'xyz_class', 'unit_price', 'lead_time_days', 'economic_order_qty'],
      graphSynced: null,
    });

    const rows = await withTabular(runtime.tabular, (db) => db.query('SELECT * FROM products ORDER BY product_id'));
    expect(rows).toEqual([
      { product_id: 'P1', product_name: 'Bracket', unit_cost: 4.5 },
      { product_id: 'P2', product_name: 'Bolt', unit_cost: null },
    ]);
  });

  it('replaces the previous upload of the same category', async () => {
    await upload(runtime, 'products', ['product_id,product_name', 'P1,A', 'P2,B']);
    await upload(runtime, 'products', ['product_id,product_name', 'P3,C']);

    const rows = await withTabular(runtime.tabular, (db) => db.query('SELECT product_id FROM products'));
    expect(rows).toEqual([{ product_id: 'P3' }]);
  });

  it('records each successful upload', async () => {
    await upload(runtime, 'products', ['product_id,product_name', 'P1,A']);
    await upload(runtime, 'customers', ['customer_id,customer_name', 'C1,Northwind', 'C2,Contoso']);

    const history = await withTabular(runtime.tabular, (db) =>
      db.query('SELECT category, filename, uploaded_at, row_count, column_count, status FROM file_uploads ORDER BY id'),
    );
    expect(history).toEqual([
      { category: 'products', filename: 'products.csv', uploaded_at: '2024-06-30T12:00:00.000Z', row_count: 1, column_count: 2, status: 'success' },
      { category: 'customers', filename: 'customers.csv', uploaded_at: '2024-06-30T12:00:00.000Z', row_count: 2, column_count: 2, status: 'success' },
    ]);
  });

  it('rejects an unknown category', async () => {
    await expect(uploadDataset(runtime, 'widgets', null, csv(['a', '1']))).rejects.toThrow(
      'Unknown category: widgets. Expected one of: products, customers, suppliers, inventory_snapshot, sales_transactions, purchase_orders, ar_ledger, ap_ledger, shipments',
    );
  });

  it('rejects files missing required columns', async () => {
    await expect(upload(runtime, 'products', ['product_id', 'P1'])).rejects.toThrow(
      'Missing required columns for products: product_name',
    );
  });

  it('rejects a header without data rows', async () => {
    await expect(upload(runtime, 'products', ['product_id,product_name'])).rejects.toThrow(
      'The file has a header but no data rows',
    );
  });

  it('leaves no history row for a rejected file', async () => {
    await expect(upload(runtime, 'products', ['product_id', 'P1'])).rejects.toThrow();
    const exists = await withTabular(runtime.tabular, (db) => db.tableExists('file_uploads'));
    expect(exists).toBe(false);
  });

  // ===========================================================================
  // Graph mirror
  // ===========================================================================

  it('syncs suppliers into the graph and skips rows without an id', async () => {
    const result = await upload(runtime, 'suppliers', SUPPLIERS);

    expect(result.graphSynced).toBe(true);
    expect(result.graphSync).toEqual({ synced: 2, skipped: 1 });
    expect(await graphCounts()).toEqual({ suppliers: 2, products: 0, relationships: 0 });
  });

  it('is idempotent across re-uploads', async () => {
    await upload(runtime, 'suppliers', SUPPLIERS);
    await upload(runtime, 'purchase_orders', PURCHASE_ORDERS);
    const first = await graphCounts();

    await upload(runtime, 'suppliers', SUPPLIERS);
    await upload(runtime, 'purchase_orders', PURCHASE_ORDERS);

    expect(first).toEqual({ suppliers: 2, products: 2, relationships: 3 });
    expect(await graphCounts()).toEqual(first);
  });

  it('keeps the tabular upload when the graph is unavailable', async () => {
    graph.setAvailable(false);
    const result = await upload(runtime, 'suppliers', SUPPLIERS);

    expect(result.graphSynced).toBe(false);
    expect(result.graphError).toBe('Graph store is unavailable');
    const count = await withTabular(runtime.tabular, (db) => db.countRows('suppliers'));
    expect(count).toBe(3);
  });
});

describe('resetAllData', () => {
  let runtime: EngineRuntime;
  let graph: MemoryGraphStore;

  beforeEach(() => {
    ({ runtime, graph } = createTestRuntime());
  });

  afterEach(async () => {
    await shutdownRuntime(runtime);
  });

  it('drops every dataset table and clears the graph', async () => {
    await upload(runtime, 'products', ['product_id,product_name', 'P1,A']);
    await upload(runtime, 'suppliers', SUPPLIERS);

    const result = await resetAllData(runtime);

    expect(result).toEqual({ droppedTables: ['products', 'suppliers', 'file_uploads'], graphCleared: true });
    expect(await withGraph(graph, (s) => s.counts())).toEqual({ suppliers: 0, products: 0, relationships: 0 });
    expect(await withTabular(runtime.tabular, (db) => db.listTables())).toEqual([]);
  });

  it('reports a graph that could not be cleared', async () => {
    graph.setAvailable(false);
    const result = await resetAllData(runtime);
    expect(result).toEqual({ droppedTables: [], graphCleared: false, graphError: 'Graph store is unavailable' });
  });
});

describe('templates', () => {
  it('describes where a category is stored', () => {
    expect(getTemplate('suppliers').destination).toBe('tabular+graph');
    expect(getTemplate('products').destination).toBe('tabular');
  });

  it('renders a CSV header with an example row', () => {
    expect(templateCsv('customers')).toBe(
      'customer_id,customer_name,segment,ytd_revenue,avg_days_to_pay\nCUST-001,Northwind Retail,Enterprise,125000,38\n',
    );
  });

  it('rejects unknown categories', () => {
    expect(() => getTemplate('widgets')).toThrow(/^Unknown category: widgets/);
  });
});
