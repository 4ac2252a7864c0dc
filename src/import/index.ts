/**
 * Dataset Upload - CSV into the tabular store, mirrored into the graph
 *
 * An upload replaces the category's table whole, appends a file_uploads row
 * and, for suppliers and purchase orders, re-syncs the graph. A graph that
 * cannot be reached does not fail the upload; the result reports
 * graphSynced: false with the error.
 */

import { createLogger } from '../utils/logger';
import { InvalidInputError, errorMessage } from '../infra/errors';
import { quoteIdent, withTabular, type TabularHandle } from '../db';
import {
  DATASET_CATEGORIES,
  GRAPH_CATEGORIES,
  UPLOAD_HISTORY_TABLE,
  getDatasetTemplate,
  isDatasetCategory,
  type DatasetCategory,
  type DatasetTemplate,
  type ExampleValue,
} from '../db/datasets';
import type { Row } from '../db/values';
import { withGraph } from '../graph';
import { syncPurchaseOrdersToGraph, syncSuppliersToGraph, type SyncReport } from '../graph/sync';
import type { EngineRuntime } from '../runtime';
import { parseCsv, toTypedTable } from './csv-parser';
import type { ParseOptions, ResetResult, UploadResult } from './types';

const logger = createLogger('import');

export function requireCategory(value: unknown): DatasetCategory {
  if (!isDatasetCategory(value)) {
    throw new InvalidInputError(
      `Unknown category: ${String(value)}. Expected one of: ${DATASET_CATEGORIES.join(', ')}`,
      'category',
    );
  }
  return value;
}

// ---------------------------------------------------------------------------
// Upload history
// ---------------------------------------------------------------------------

function ensureUploadHistory(db: TabularHandle): void {
  db.run(
    `CREATE TABLE IF NOT EXISTS ${quoteIdent(UPLOAD_HISTORY_TABLE)} (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      category TEXT NOT NULL,
      filename TEXT,
      uploaded_at TEXT NOT NULL,
      row_count INTEGER NOT NULL,
      column_count INTEGER,
      status TEXT NOT NULL
    )`,
  );
}

function recordUpload(
  db: TabularHandle,
  entry: { category: DatasetCategory; filename: string | null; uploadedAt: string; rowCount: number; columnCount: number },
): void {
  ensureUploadHistory(db);
  db.run(
    `INSERT INTO ${quoteIdent(UPLOAD_HISTORY_TABLE)} (category, filename, uploaded_at, row_count, column_count, status)
     VALUES (?, ?, ?, ?, ?, 'success')`,
    [entry.category, entry.filename, entry.uploadedAt, entry.rowCount, entry.columnCount],
  );
}

// ---------------------------------------------------------------------------
// Graph sync
// ---------------------------------------------------------------------------

async function syncGraph(runtime: EngineRuntime, category: DatasetCategory, rows: Row[]): Promise<SyncReport> {
  return withGraph(runtime.graph, (session) =>
    category === 'suppliers' ? syncSuppliersToGraph(session, rows) : syncPurchaseOrdersToGraph(session, rows),
  );
}

// ---------------------------------------------------------------------------
// Upload
// ---------------------------------------------------------------------------

/**
 * Parse, validate and store one dataset file.
 * Throws InvalidInputError for an unknown category or a malformed file.
 */
export async function uploadDataset(
  runtime: EngineRuntime,
  categoryInput: string,
  filename: string | null,
  csvText: string,
  options: ParseOptions = {},
): Promise<UploadResult> {
  const category = requireCategory(categoryInput);
  const template = getDatasetTemplate(category);

  const parsed = parseCsv(csvText, options);
  if (parsed.rows.length === 0) {
    throw new InvalidInputError('The file has a header but no data rows');
  }

  const present = new Set(parsed.headers);
  const missing = template.required.filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new InvalidInputError(`Missing required columns for ${category}: ${missing.join(', ')}`);
  }

  const table = toTypedTable(parsed);

  const stored = await withTabular(runtime.tabular, (db) => {
    db.replaceTable(category, table.columns, table.rows);
    recordUpload(db, {
      category,
      filename,
      uploadedAt: runtime.now().toISOString(),
      rowCount: table.rows.length,
      columnCount: table.columns.length,
    });
    return GRAPH_CATEGORIES.has(category) ? db.query(`SELECT * FROM ${quoteIdent(category)}`) : [];
  });

  logger.info({ category, filename, rows: table.rows.length, columns: table.columns.length }, 'Dataset uploaded');

  const result: UploadResult = {
    category,
    filename,
    rowCount: table.rows.length,
    columns: table.columns,
    missingOptional: template.optional.filter((c) => !present.has(c)),
    graphSynced: null,
  };

  if (GRAPH_CATEGORIES.has(category)) {
    try {
      result.graphSync = await syncGraph(runtime, category, stored);
      result.graphSynced = true;
    } catch (err) {
      result.graphSynced = false;
      result.graphError = errorMessage(err);
      logger.warn({ category, err: result.graphError }, 'Graph sync failed; tabular upload kept');
    }
  }

  return result;
}

/** Drop every dataset table and the upload history, then clear the graph */
export async function resetAllData(runtime: EngineRuntime): Promise<ResetResult> {
  const droppedTables = await withTabular(runtime.tabular, (db) => {
    const dropped: string[] = [];
    for (const table of [...DATASET_CATEGORIES, UPLOAD_HISTORY_TABLE]) {
      if (db.tableExists(table)) {
        db.dropTable(table);
        dropped.push(table);
      }
    }
    return dropped;
  });

  const result: ResetResult = { droppedTables, graphCleared: false };
  try {
    await withGraph(runtime.graph, (session) => session.clear());
    result.graphCleared = true;
  } catch (err) {
    result.graphError = errorMessage(err);
    logger.warn({ err: result.graphError }, 'Graph clear failed');
  }

  logger.info({ dropped: droppedTables.length, graphCleared: result.graphCleared }, 'All data reset');
  return result;
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

export function getTemplate(categoryInput: string): DatasetTemplate {
  return getDatasetTemplate(requireCategory(categoryInput));
}

function csvCell(value: ExampleValue | undefined): string {
  if (value === undefined) return '';
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Header of required then optional columns, plus the example row */
export function templateCsv(categoryInput: string): string {
  const template = getTemplate(categoryInput);
  const columns = [...template.required, ...template.optional];
  return `${columns.join(',')}\n${columns.map((c) => csvCell(template.example[c])).join(',')}\n`;
}

export { parseCsv, toTypedTable, normalizeHeader, normalizeDate, inferColumnType } from './csv-parser';
export type { Delimiter, ParseOptions, ParsedCsv, ResetResult, TypedTable, UploadResult } from './types';
