/**
 * Dataset Upload Types
 */

import type { ColumnDef, SqlParam } from '../db';
import type { DatasetCategory } from '../db/datasets';
import type { SyncReport } from '../graph/sync';

export type Delimiter = 'auto' | 'comma' | 'tab' | 'pipe';

export interface ParseOptions {
  delimiter?: Delimiter;
}

export interface ParsedCsv {
  /** The delimiter character in use */
  delimiter: string;
  /** Normalized column names */
  headers: string[];
  /** Raw cell text, padded to the header width */
  rows: string[][];
  /** Blank lines dropped */
  skippedRows: number;
}

/** Column types and bound values ready for the tabular store */
export interface TypedTable {
  columns: ColumnDef[];
  rows: SqlParam[][];
}

export interface UploadResult {
  category: DatasetCategory;
  filename: string | null;
  rowCount: number;
  columns: ColumnDef[];
  /** Template columns the file did not provide */
  missingOptional: string[];
  /** null when the category is not mirrored into the graph */
  graphSynced: boolean | null;
  graphError?: string;
  graphSync?: SyncReport;
}

export interface ResetResult {
  droppedTables: string[];
  graphCleared: boolean;
  graphError?: string;
}
