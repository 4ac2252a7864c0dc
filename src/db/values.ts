/**
 * Row value readers
 *
 * sql.js hands back loosely typed cells; analyses read them through these so
 * every output field has a fixed type.
 */

import type { SqlValue } from 'sql.js';

export type Row = Record<string, SqlValue>;

/** Safely extract a number from a row field, defaulting to 0. */
export function num(value: SqlValue | undefined): number {
  return Number(value) || 0;
}

/** Number, or null when the cell is empty or not numeric. */
export function numOrNull(value: SqlValue | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

export function str(value: SqlValue | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Uint8Array) return Buffer.from(value).toString('utf-8');
  return String(value);
}

export function strOrNull(value: SqlValue | undefined): string | null {
  const s = str(value);
  return s === '' ? null : s;
}

/** JSON-safe copy of a row (blobs become base64). */
export function plainRow(row: Row): Record<string, string | number | null> {
  const out: Record<string, string | number | null> = {};
  for (const [key, value] of Object.entries(row)) {
    out[key] = value instanceof Uint8Array ? Buffer.from(value).toString('base64') : value;
  }
  return out;
}

export function round(value: number, digits = 0): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export const round1 = (value: number): number => round(value, 1);
export const round2 = (value: number): number => round(value, 2);
