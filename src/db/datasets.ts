/**
 * Dataset categories
 *
 * Nine fixed kinds of uploaded data, each stored in exactly one table of the
 * same name. The category list doubles as the allow-list for table identifiers.
 */

import templatesJson from './datasets.json';

export const DATASET_CATEGORIES = [
  'products',
  'customers',
  'suppliers',
  'inventory_snapshot',
  'sales_transactions',
  'purchase_orders',
  'ar_ledger',
  'ap_ledger',
  'shipments',
] as const;

export type DatasetCategory = (typeof DATASET_CATEGORIES)[number];

/** Categories mirrored into the graph store after upload */
export const GRAPH_CATEGORIES: ReadonlySet<DatasetCategory> = new Set<DatasetCategory>(['suppliers', 'purchase_orders']);

/** Upload history table; not a dataset category */
export const UPLOAD_HISTORY_TABLE = 'file_uploads';

export type ExampleValue = string | number | boolean;

export interface DatasetTemplate {
  category: DatasetCategory;
  description: string;
  required: string[];
  optional: string[];
  example: Record<string, ExampleValue>;
  destination: 'tabular' | 'tabular+graph';
}

type TemplateSource = Omit<DatasetTemplate, 'category' | 'destination'>;

const TEMPLATE_SOURCES: Record<DatasetCategory, TemplateSource> = templatesJson;

export function isDatasetCategory(value: unknown): value is DatasetCategory {
  return typeof value === 'string' && DATASET_CATEGORIES.some((c) => c === value);
}

export function getDatasetTemplate(category: DatasetCategory): DatasetTemplate {
  const source = TEMPLATE_SOURCES[category];
  return {
    category,
    description: source.description,
    required: [...source.required],
    optional: [...source.optional],
    example: { ...source.example },
    destination: GRAPH_CATEGORIES.has(category) ? 'tabular+graph' : 'tabular',
  };
}

export function listDatasetTemplates(): DatasetTemplate[] {
  return DATASET_CATEGORIES.map(getDatasetTemplate);
}
