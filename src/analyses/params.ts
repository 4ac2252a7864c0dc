/**
 * Input readers for analysis parameters
 *
 * Absent (undefined/null) values take the default; present values must be
 * well-formed or an InvalidInputError names the field.
 */

import { InvalidInputError } from '../infra/errors';

export interface NumberBounds {
  min?: number;
  max?: number;
  /** Lower bound excluded */
  exclusiveMin?: boolean;
  integer?: boolean;
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

export function readNumber(input: Record<string, unknown>, key: string, fallback: number, bounds: NumberBounds = {}): number {
  const raw = input[key];
  if (isAbsent(raw)) return fallback;
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(`${key} must be a number`, key);
  }
  if (bounds.integer && !Number.isInteger(value)) {
    throw new InvalidInputError(`${key} must be an integer`, key);
  }
  if (bounds.min !== undefined) {
    if (bounds.exclusiveMin ? value <= bounds.min : value < bounds.min) {
      throw new InvalidInputError(`${key} must be ${bounds.exclusiveMin ? 'greater than' : 'at least'} ${bounds.min}`, key);
    }
  }
  if (bounds.max !== undefined && value > bounds.max) {
    throw new InvalidInputError(`${key} must be at most ${bounds.max}`, key);
  }
  return value;
}

export function readOptionalNumber(input: Record<string, unknown>, key: string, bounds: NumberBounds = {}): number | undefined {
  if (isAbsent(input[key])) return undefined;
  return readNumber(input, key, 0, bounds);
}

/** Row limits: positive integers */
export function readLimit(input: Record<string, unknown>, fallback: number, key = 'limit'): number {
  return readNumber(input, key, fallback, { min: 1, integer: true });
}

export function readOptionalString(input: Record<string, unknown>, key: string): string | undefined {
  const raw = input[key];
  if (isAbsent(raw)) return undefined;
  if (typeof raw !== 'string' && typeof raw !== 'number') {
    throw new InvalidInputError(`${key} must be a string`, key);
  }
  const value = String(raw).trim();
  return value === '' ? undefined : value;
}

export function readString(input: Record<string, unknown>, key: string): string {
  const value = readOptionalString(input, key);
  if (value === undefined) {
    throw new InvalidInputError(`${key} is required`, key);
  }
  return value;
}

export function readEnum<T extends string>(
  input: Record<string, unknown>,
  key: string,
  allowed: readonly T[],
  fallback: T,
): T {
  const value = readOptionalString(input, key);
  if (value === undefined) return fallback;
  const match = allowed.find((a) => a === value);
  if (!match) {
    throw new InvalidInputError(`${key} must be one of: ${allowed.join(', ')}`, key);
  }
  return match;
}

/** Array of strings; a single comma-separated string is accepted too */
export function readStringList(input: Record<string, unknown>, key: string, required = false): string[] {
  const raw = input[key];
  if (isAbsent(raw)) {
    if (required) throw new InvalidInputError(`${key} is required`, key);
    return [];
  }
  let items: unknown[];
  if (Array.isArray(raw)) {
    items = raw;
  } else if (typeof raw === 'string') {
    items = raw.split(',');
  } else {
    throw new InvalidInputError(`${key} must be an array of strings`, key);
  }
  const values: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string' && typeof item !== 'number') {
      throw new InvalidInputError(`${key} must be an array of strings`, key);
    }
    const value = String(item).trim();
    if (value) values.push(value);
  }
  if (required && values.length === 0) {
    throw new InvalidInputError(`${key} must name at least one value`, key);
  }
  return values;
}
