/**
 * Query & Housekeeping Types
 */

import type { ColumnInfo } from '../db';
import type { DatasetCategory } from '../db/datasets';
import type { DatasetStatusEntry } from '../availability';
import type { GraphCounts } from '../graph/types';
import type { KpiSummary } from '../metrics/types';

export type PlainRow = Record<string, string | number | null>;

export interface SqlQueryResult {
  columns: string[];
  rowCount: number;
  truncated: boolean;
  rows: PlainRow[];
}

export interface SchemaInfo {
  table: DatasetCategory;
  rowCount: number;
  columns: ColumnInfo[];
  sample: PlainRow[];
}

export interface UploadStatus {
  uploaded: number;
  datasets: DatasetStatusEntry[];
}

export interface UploadRecord {
  id: number;
  category: string;
  filename: string | null;
  uploadedAt: string;
  rowCount: number;
  columnCount: number | null;
  status: string;
}

export interface VersionHistory {
  history: UploadRecord[];
  note?: string;
}

export interface TableQuality {
  table: DatasetCategory;
  rows: number;
  columns: number;
  nullCounts: Record<string, number>;
  duplicateRows: number;
  qualityScore: number;
}

export interface DataQualityReport {
  overallScore: number;
  tables: TableQuality[];
}

export type GraphStatus =
  | { backend: string; status: 'connected'; counts: GraphCounts }
  | { backend: string; status: 'unavailable'; error: string };

export interface DatabaseStatus {
  tabular: {
    datasets: Array<DatasetStatusEntry & { columns: number }>;
    totalRows: number;
  };
  graph: GraphStatus;
}

export interface Dashboard {
  availableDatasets: DatasetCategory[];
  kpis: KpiSummary;
  revenue?: { totalRevenue: number; unitsSold: number; transactions: number; skus: number; days: number };
  inventory?: { totalValue: number; skus: number; belowReorderPoint: number; overstocked: number };
  suppliers?: { count: number; avgLeadTimeDays: number | null; avgOnTimeDeliveryRate: number | null };
  customers?: { count: number };
  receivables?: { invoices: number; totalInvoiced: number; outstanding: number };
  payables?: { invoices: number; totalInvoiced: number };
  purchaseOrders?: { count: number; totalValue: number | null };
  shipments?: { count: number; inTransit: number };
}

export interface ShipmentStatusSummary {
  status: string;
  shipments: number;
  totalQty: number;
  totalFreight: number;
  avgDelayDays: number | null;
}

export interface ShipmentTracking {
  statusFilter: string | null;
  summary: ShipmentStatusSummary[];
  shipments: PlainRow[];
}

export interface ProductCatalog {
  total: number;
  products: PlainRow[];
}
