import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteTabularStore, withTabular } from '../db';
import { datasetStatus, gate, insufficientData, probe, resolveAvailability } from './index';

describe('insufficientData', () => {
  it('joins categories with "and"', () => {
    expect(insufficientData(['inventory_snapshot']).message).toBe('Upload inventory_snapshot to enable this analysis.');
    expect(insufficientData(['inventory_snapshot', 'sales_transactions']).message).toBe(
      'Upload inventory_snapshot and sales_transactions to enable this analysis.',
    );
    expect(insufficientData(['products', 'suppliers', 'shipments']).message).toBe(
      'Upload products, suppliers and shipments to enable this analysis.',
    );
  });

  it('phrases an any-of group after the required categories', () => {
    expect(
      insufficientData(['inventory_snapshot', 'products', 'sales_transactions'], {
        anyOf: ['products', 'sales_transactions'],
      }),
    ).toEqual({
      status: 'insufficient_data',
      message: 'Upload inventory_snapshot and products or sales_transactions to enable this analysis.',
      missing: ['inventory_snapshot', 'products', 'sales_transactions'],
    });
  });

  it('appends a hint', () => {
    expect(insufficientData(['ar_ledger'], { hint: 'Or pass dso.' }).message).toBe(
      'Upload ar_ledger to enable this analysis. Or pass dso.',
    );
  });
});

describe('resolveAvailability', () => {
  let store: SqliteTabularStore;

  beforeEach(async () => {
    store = new SqliteTabularStore({ path: ':memory:' });
    await withTabular(store, (db) => {
      db.replaceTable('products', [{ name: 'product_id', type: 'TEXT' }], [['P1']]);
      db.replaceTable('suppliers', [{ name: 'supplier_id', type: 'TEXT' }], []);
    });
  });

  afterEach(async () => {
    await store.close();
  });

  it('treats an empty table as missing', async () => {
    await withTabular(store, (db) => {
      expect(probe(db, 'products')).toEqual({ category: 'products', exists: true, rowCount: 1, available: true });
      expect(probe(db, 'suppliers')).toEqual({ category: 'suppliers', exists: true, rowCount: 0, available: false });
      expect(probe(db, 'shipments')).toEqual({ category: 'shipments', exists: false, rowCount: 0, available: false });
    });
  });

  it('passes when every required category and one of the group are present', async () => {
    await withTabular(store, (db) => {
      const report = resolveAvailability(db, { all: ['products'], any: ['suppliers', 'products'] });
      expect(report.ok).toBe(true);
      expect(report.missing).toEqual([]);
      expect(gate(db, { all: ['products'] })).toBeNull();
    });
  });

  it('lists all-of misses before the unsatisfied group', async () => {
    await withTabular(store, (db) => {
      const report = resolveAvailability(db, { all: ['suppliers'], any: ['shipments', 'ar_ledger'] });
      expect(report).toMatchObject({ ok: false, anyUnsatisfied: true, missing: ['suppliers', 'shipments', 'ar_ledger'] });

      expect(gate(db, { all: ['suppliers'], any: ['shipments', 'ar_ledger'] })).toEqual({
        status: 'insufficient_data',
        message: 'Upload suppliers and shipments or ar_ledger to enable this analysis.',
        missing: ['suppliers', 'shipments', 'ar_ledger'],
      });
    });
  });

  it('reports every category with its status', async () => {
    const statuses = await withTabular(store, (db) => datasetStatus(db));
    expect(statuses).toHaveLength(9);
    expect(statuses[0]).toEqual({ category: 'products', status: 'uploaded', rowCount: 1, destination: 'tabular' });
    expect(statuses[2]).toEqual({ category: 'suppliers', status: 'empty', rowCount: 0, destination: 'tabular+graph' });
    expect(statuses[8]).toEqual({ category: 'shipments', status: 'not_uploaded', rowCount: 0, destination: 'tabular' });
  });
});
