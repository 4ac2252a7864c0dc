/**
 * Availability Resolver
 *
 * Decides whether an analysis may run from which dataset tables exist and are
 * non-empty. A failed requirement yields a message-only response; the gated
 * analysis never executes its queries.
 */

import { DATASET_CATEGORIES, GRAPH_CATEGORIES, type DatasetCategory } from '../db/datasets';
import type { TabularHandle } from '../db';
import type { InsufficientData, Requirement } from '../analyses/types';

export interface CategoryAvailability {
  category: DatasetCategory;
  exists: boolean;
  rowCount: number;
  /** Table exists and holds at least one row */
  available: boolean;
}

export interface AvailabilityReport {
  ok: boolean;
  categories: CategoryAvailability[];
  /** Every category that blocks the requirement (all-of misses, then the any-of group) */
  missing: DatasetCategory[];
  /** True when the any-of group had no available member */
  anyUnsatisfied: boolean;
}

export function probe(handle: TabularHandle, category: DatasetCategory): CategoryAvailability {
  const exists = handle.tableExists(category);
  const rowCount = exists ? handle.countRows(category) : 0;
  return { category, exists, rowCount, available: exists && rowCount > 0 };
}

export function isAvailable(handle: TabularHandle, category: DatasetCategory): boolean {
  return probe(handle, category).available;
}

export function resolveAvailability(handle: TabularHandle, requirement: Requirement): AvailabilityReport {
  const anyOf = requirement.any ?? [];
  const seen = new Set<DatasetCategory>();
  const categories: CategoryAvailability[] = [];
  for (const category of [...requirement.all, ...anyOf]) {
    if (seen.has(category)) continue;
    seen.add(category);
    categories.push(probe(handle, category));
  }

  const byCategory = new Map(categories.map((c) => [c.category, c]));
  const allMissing = requirement.all.filter((c) => !byCategory.get(c)?.available);
  const anyUnsatisfied = anyOf.length > 0 && !anyOf.some((c) => byCategory.get(c)?.available);

  return {
    ok: allMissing.length === 0 && !anyUnsatisfied,
    categories,
    missing: anyUnsatisfied ? [...allMissing, ...anyOf.filter((c) => !allMissing.includes(c))] : allMissing,
    anyUnsatisfied,
  };
}

function joinWith(items: string[], conjunction: 'and' | 'or'): string {
  if (items.length <= 1) return items.join('');
  return `${items.slice(0, -1).join(', ')} ${conjunction} ${items[items.length - 1]}`;
}

export interface InsufficientOptions {
  /** Categories of which any one would have sufficed */
  anyOf?: DatasetCategory[];
  hint?: string;
}

/**
 * Build the message-only response: "Upload a and b to enable this analysis."
 */
export function insufficientData(missing: DatasetCategory[], options: InsufficientOptions = {}): InsufficientData {
  const anyOf = options.anyOf ?? [];
  const allOf = missing.filter((c) => !anyOf.includes(c));
  const phrases: string[] = [...allOf];
  if (anyOf.length > 0) phrases.push(joinWith(anyOf, 'or'));

  let message = `Upload ${joinWith(phrases, 'and')} to enable this analysis.`;
  if (options.hint) message += ` ${options.hint}`;

  return {
    status: 'insufficient_data',
    message,
    missing: [...allOf, ...anyOf],
  };
}

/** The insufficient-data response for a failed report, or null when it passed */
export function gate(handle: TabularHandle, requirement: Requirement): InsufficientData | null {
  const report = resolveAvailability(handle, requirement);
  if (report.ok) return null;
  const anyOf = report.anyUnsatisfied ? requirement.any : undefined;
  return insufficientData(report.missing, { anyOf });
}

// ---------------------------------------------------------------------------
// Dataset status
// ---------------------------------------------------------------------------

export interface DatasetStatusEntry {
  category: DatasetCategory;
  status: 'uploaded' | 'empty' | 'not_uploaded';
  rowCount: number;
  destination: 'tabular' | 'tabular+graph';
}

export function datasetStatus(handle: TabularHandle): DatasetStatusEntry[] {
  return DATASET_CATEGORIES.map((category): DatasetStatusEntry => {
    const p = probe(handle, category);
    return {
      category,
      status: p.available ? 'uploaded' : p.exists ? 'empty' : 'not_uploaded',
      rowCount: p.rowCount,
      destination: GRAPH_CATEGORIES.has(category) ? 'tabular+graph' : 'tabular',
    };
  });
}
