/**
 * CSV Parser - Parse CSV/TSV/pipe-delimited uploads into typed table rows
 *
 * Handles:
 * - Auto-detection of delimiter (comma, tab, pipe)
 * - UTF-8 BOM stripping
 * - Windows (\r\n) and Unix (\n) line endings
 * - Quoted fields with embedded delimiters/newlines and escaped quotes ("")
 * - Header normalization ("Product ID" -> product_id)
 * - Column type inference (INTEGER / REAL / TEXT)
 */

import { createLogger } from '../utils/logger';
import { InvalidInputError } from '../infra/errors';
import { isSafeIdentifier, type ColumnDef, type ColumnType, type SqlParam } from '../db';
import type { Delimiter, ParseOptions, ParsedCsv, TypedTable } from './types';

const logger = createLogger('csv-parser');

// ---------------------------------------------------------------------------
// Delimiter detection
// ---------------------------------------------------------------------------

const DELIMITER_MAP: Record<Exclude<Delimiter, 'auto'>, string> = {
  comma: ',',
  tab: '\t',
  pipe: '|',
};

/**
 * Auto-detect delimiter by counting occurrences in the first few lines.
 * Prefers comma > tab > pipe if counts are equal.
 */
export function detectDelimiter(text: string): string {
  const sampleLines = text.split(/\r?\n/).slice(0, 10).filter(Boolean);
  if (sampleLines.length === 0) return ',';

  const candidates = [',', '\t', '|'];
  let bestDelimiter = ',';
  let bestScore = -1;

  for (const delim of candidates) {
    const counts = sampleLines.map((line) => {
      let count = 0;
      let inQuotes = false;
      for (const ch of line) {
        if (ch === '"') {
          inQuotes = !inQuotes;
        } else if (ch === delim && !inQuotes) {
          count++;
        }
      }
      return count;
    });

    // Score: higher average count + bonus for consistency
    const uniqueCounts = new Set(counts);
    const avgCount = counts.reduce((a, b) => a + b, 0) / counts.length;
    const consistencyBonus = uniqueCounts.size === 1 ? 10 : 0;
    const score = avgCount + consistencyBonus;

    if (score > bestScore && avgCount > 0) {
      bestScore = score;
      bestDelimiter = delim;
    }
  }

  return bestDelimiter;
}

// ---------------------------------------------------------------------------
// Record parser (handles quoted fields across lines)
// ---------------------------------------------------------------------------

/**
 * Split the whole text into records of fields. A quote opens a quoted field
 * only at the start of a field; inside one, "" is a literal quote and
 * delimiters and newlines are data.
 */
export function parseRecords(data: string, delimiter: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let i = 0;

  while (i < data.length) {
    const ch = data[i];

    if (inQuotes) {
      if (ch === '"') {
        if (data[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }

    if (ch === '"' && current.trim().length === 0) {
      current = '';
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(current.trim());
      current = '';
    } else if (ch === '\n') {
      fields.push(current.trim());
      records.push(fields);
      fields = [];
      current = '';
    } else {
      current += ch;
    }
    i++;
  }

  if (inQuotes) {
    throw new InvalidInputError('Unterminated quoted field');
  }
  if (current.length > 0 || fields.length > 0) {
    fields.push(current.trim());
    records.push(fields);
  }
  return records;
}

// ---------------------------------------------------------------------------
// Headers
// ---------------------------------------------------------------------------

/** "Product ID" -> product_id, "lead-time days" -> lead_time_days */
export function normalizeHeader(raw: string): string {
  return raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function normalizeHeaders(raw: string[]): string[] {
  const seen = new Set<string>();
  return raw.map((header, index) => {
    const name = normalizeHeader(header);
    if (!name) {
      throw new InvalidInputError(`Column ${index + 1} has an empty header`);
    }
    if (!isSafeIdentifier(name)) {
      throw new InvalidInputError(`Invalid column name: ${JSON.stringify(header)}`);
    }
    if (seen.has(name)) {
      throw new InvalidInputError(`Duplicate column: ${name}`);
    }
    seen.add(name);
    return name;
  });
}

// ---------------------------------------------------------------------------
// Main parse function
// ---------------------------------------------------------------------------

/**
 * Parse CSV text into normalized headers and raw rows.
 * Throws InvalidInputError on a malformed file.
 */
export function parseCsv(csvData: string, options: ParseOptions = {}): ParsedCsv {
  const { delimiter: delimiterOption = 'auto' } = options;

  let data = csvData;
  if (data.charCodeAt(0) === 0xfeff) {
    data = data.slice(1);
  }
  data = data.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

  const delimiter = delimiterOption === 'auto' ? detectDelimiter(data) : DELIMITER_MAP[delimiterOption];

  const records = parseRecords(data, delimiter);
  const nonEmpty = records.filter((r) => r.some((f) => f.length > 0));
  if (nonEmpty.length === 0) {
    throw new InvalidInputError('The file is empty');
  }

  const [headerRecord, ...dataRecords] = nonEmpty;
  const headers = normalizeHeaders(headerRecord);

  const rows = dataRecords.map((record, index) => {
    if (record.length > headers.length) {
      throw new InvalidInputError(`Row ${index + 1} has ${record.length} fields; expected ${headers.length}`);
    }
    const padded = [...record];
    while (padded.length < headers.length) padded.push('');
    return padded;
  });

  const skippedRows = records.length - nonEmpty.length;
  logger.debug(
    { delimiter: delimiter === '\t' ? 'tab' : delimiter, columns: headers.length, rows: rows.length, skipped: skippedRows },
    'CSV parsed',
  );

  return { delimiter, headers, rows, skippedRows };
}

// ---------------------------------------------------------------------------
// Type inference
// ---------------------------------------------------------------------------

const INTEGER_RE = /^-?\d+$/;
const REAL_RE = /^-?(\d+\.\d*|\.\d+|\d+)([eE][-+]?\d+)?$/;
const LEADING_ZERO_RE = /^-?0\d/;
const BOOLEAN_VALUES: Record<string, number> = { true: 1, false: 0, yes: 1, no: 0 };

/** Identifier columns keep their text form ("00042" stays "00042") */
export function isIdentifierColumn(name: string): boolean {
  return name.endsWith('_id') || name === 'po_number';
}

export function isDateColumn(name: string): boolean {
  return name.endsWith('_date');
}

/**
 * Dates become YYYY-MM-DD where the shape is recognised (ISO with or without
 * time, YYYY/MM/DD, MM/DD/YYYY); anything else is kept as written.
 */
export function normalizeDate(value: string): string {
  let m = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ].*)?$/.exec(value);
  if (!m) m = /^(\d{4})\/(\d{1,2})\/(\d{1,2})$/.exec(value);
  if (m) return `${m[1]}-${m[2].padStart(2, '0')}-${m[3].padStart(2, '0')}`;

  const us = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (us) return `${us[3]}-${us[1].padStart(2, '0')}-${us[2].padStart(2, '0')}`;

  return value;
}

export function inferColumnType(name: string, values: Array<string | null>): ColumnType | 'BOOLEAN' {
  if (isIdentifierColumn(name) || isDateColumn(name)) return 'TEXT';
  const present = values.filter((v): v is string => v !== null);
  if (present.length === 0) return 'TEXT';
  if (present.every((v) => Object.hasOwn(BOOLEAN_VALUES, v.toLowerCase()))) return 'BOOLEAN';
  if (present.some((v) => LEADING_ZERO_RE.test(v))) return 'TEXT';
  if (present.every((v) => INTEGER_RE.test(v))) return 'INTEGER';
  if (present.every((v) => REAL_RE.test(v))) return 'REAL';
  return 'TEXT';
}

/**
 * Infer a type per column and convert the cells. Empty cells are NULL;
 * yes/no and true/false columns are stored as 0/1 integers.
 */
export function toTypedTable(parsed: ParsedCsv): TypedTable {
  const cells = parsed.rows.map((row) => row.map((v) => (v === '' ? null : v)));
  const columns: ColumnDef[] = [];
  const converters: Array<(value: string) => SqlParam> = [];

  parsed.headers.forEach((name, index) => {
    const inferred = inferColumnType(name, cells.map((row) => row[index]));
    if (inferred === 'BOOLEAN') {
      columns.push({ name, type: 'INTEGER' });
      converters.push((v) => BOOLEAN_VALUES[v.toLowerCase()]);
    } else {
      columns.push({ name, type: inferred });
      if (inferred === 'INTEGER' || inferred === 'REAL') converters.push(Number);
      else if (isDateColumn(name)) converters.push(normalizeDate);
      else converters.push((v) => v);
    }
  });

  const rows = cells.map((row) => row.map((value, index): SqlParam => (value === null ? null : converters[index](value))));
  return { columns, rows };
}
