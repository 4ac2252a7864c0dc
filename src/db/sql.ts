/**
 * SQL fragments shared by the analyses
 *
 * Optional dataset columns may be absent from an upload. Analyses build their
 * statements through these helpers so a missing optional column reads as NULL
 * instead of failing the query.
 */

import { quoteIdent, type TabularHandle } from './index';
import { str, type Row } from './values';

/** Current inventory rows: the latest snapshot date only */
export const CURRENT_SNAPSHOT = 'snapshot_date = (SELECT MAX(snapshot_date) FROM inventory_snapshot)';

export function columnSet(handle: TabularHandle, table: string): Set<string> {
  return new Set(handle.tableColumns(table).map((c) => c.name));
}

/** Column reference, or NULL when the table lacks it */
export function col(columns: Set<string>, name: string, alias?: string): string {
  if (!columns.has(name)) return 'NULL';
  return alias ? `${alias}.${quoteIdent(name)}` : quoteIdent(name);
}

/**
 * Per-row inventory value: inventory_value when present, else
 * qty_on_hand x unit_cost, else 0.
 */
export function inventoryValueSql(columns: Set<string>, alias?: string): string {
  const ref = (name: string) => col(columns, name, alias);
  const candidates: string[] = [];
  if (columns.has('inventory_value')) candidates.push(ref('inventory_value'));
  if (columns.has('unit_cost')) candidates.push(`${ref('qty_on_hand')} * ${ref('unit_cost')}`);
  candidates.push('0');
  return candidates.length === 1 ? '0' : `COALESCE(${candidates.join(', ')})`;
}

/** Flag cells arrive as 1/0 or as text such as "true" / "Y" */
export function truthySql(expr: string): string {
  return `(${expr} = 1 OR LOWER(CAST(${expr} AS TEXT)) IN ('true', 'yes', 'y'))`;
}

/** Number of distinct sales days (0 without the table) */
export function distinctSalesDays(handle: TabularHandle): number {
  const rows = handle.query('SELECT COUNT(DISTINCT transaction_date) AS days FROM sales_transactions');
  return Number(rows[0]?.days ?? 0);
}

/**
 * Master-data rows keyed by id, reading only the requested fields (absent
 * ones come back NULL). Empty when the table does not exist.
 */
export function lookupRows(handle: TabularHandle, table: string, idColumn: string, fields: string[]): Map<string, Row> {
  const byId = new Map<string, Row>();
  if (!handle.tableExists(table)) return byId;
  const columns = columnSet(handle, table);
  if (!columns.has(idColumn)) return byId;

  const select = [`${quoteIdent(idColumn)} AS id`, ...fields.map((f) => `${col(columns, f)} AS ${quoteIdent(f)}`)];
  for (const row of handle.query(`SELECT ${select.join(', ')} FROM ${quoteIdent(table)}`)) {
    const id = str(row.id);
    if (id && !byId.has(id)) byId.set(id, row);
  }
  return byId;
}
