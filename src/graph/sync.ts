/**
 * One-way sync from the tabular store into the graph mirror
 *
 * Idempotent: every write is a MERGE, so re-running a sync over the same rows
 * leaves node and edge counts unchanged. Rows missing their ids are skipped
 * and counted.
 */

import { createLogger } from '../utils/logger';
import { numOrNull, strOrNull, type Row } from '../db/values';
import type { GraphSession, SupplierNode } from './types';

const logger = createLogger('graph-sync');

export interface SyncReport {
  synced: number;
  skipped: number;
}

export function supplierNodeFromRow(row: Row): SupplierNode | null {
  const supplierId = strOrNull(row.supplier_id)?.trim();
  if (!supplierId) return null;
  return {
    supplierId,
    supplierName: strOrNull(row.supplier_name),
    leadTime: numOrNull(row.avg_lead_time_days),
    rating: numOrNull(row.rating),
    otdRate: numOrNull(row.on_time_delivery_rate),
    country: strOrNull(row.country),
  };
}

export async function syncSuppliersToGraph(session: GraphSession, rows: Row[]): Promise<SyncReport> {
  await session.ensureIndexes();
  const report: SyncReport = { synced: 0, skipped: 0 };
  for (const row of rows) {
    const node = supplierNodeFromRow(row);
    if (!node) {
      report.skipped++;
      continue;
    }
    await session.upsertSupplier(node);
    report.synced++;
  }
  logger.info(report, 'Suppliers synced to graph');
  return report;
}

export async function syncPurchaseOrdersToGraph(session: GraphSession, rows: Row[]): Promise<SyncReport> {
  await session.ensureIndexes();
  const report: SyncReport = { synced: 0, skipped: 0 };
  const seen = new Set<string>();
  for (const row of rows) {
    const supplierId = strOrNull(row.supplier_id)?.trim();
    const productId = strOrNull(row.product_id)?.trim();
    if (!supplierId || !productId) {
      report.skipped++;
      continue;
    }
    // several POs per pair collapse to one edge
    const key = `${supplierId}\u0000${productId}`;
    if (!seen.has(key)) {
      seen.add(key);
      await session.upsertProduct(productId);
      await session.upsertSupplies(supplierId, productId);
    }
    report.synced++;
  }
  logger.info(report, 'Purchase orders synced to graph');
  return report;
}
