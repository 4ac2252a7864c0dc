/**
 * Metrics Module Types
 */

export type AbcClass = 'A' | 'B' | 'C';
export type XyzClass = 'X' | 'Y' | 'Z';
export type ConcentrationRisk = 'high' | 'medium' | 'low';

export interface ParetoInput {
  productId: string;
  value: number;
}

export interface ParetoEntry {
  productId: string;
  value: number;
  sharePct: number;
  cumulativePct: number;
  abcClass: AbcClass;
}

export interface LedgerEntry {
  /** null when the ledger row has no days value */
  days: number | null;
  amount: number;
}

export interface KpiSummary {
  formula: string;
  unit: 'days';
  dio: number;
  dso: number;
  dpo: number;
  ccc: number;
  dioNote?: string;
  dsoNote?: string;
  dpoNote?: string;
}

export interface WorkingCapitalLine {
  productId: string;
  units: number;
  cashTrapped: number;
}

export interface WorkingCapitalSummary {
  totalCashTrapped: number;
  productCount: number;
  topProducts: WorkingCapitalLine[];
  byCategory?: Array<{ category: string | null; cashTrapped: number; products: number }>;
}

export interface CarryingCost {
  totalInventoryValue: number;
  holdingRatePct: number;
  annualCarryingCost: number;
  monthlyCarryingCost: number;
}

export type ParetoDimension = 'revenue' | 'inventory_value' | 'quantity';

export interface ParetoReport {
  dimension: ParetoDimension;
  totalSkus: number;
  totalValue: number;
  skusDriving80Pct: number;
  pctOfSkus: number;
  paretoData: ParetoEntry[];
}

export interface AbcXyzEntry {
  productId: string;
  productName: string | null;
  revenue: number | null;
  cumulativePct: number | null;
  cv: number | null;
  abcClass: AbcClass | null;
  xyzClass: XyzClass | null;
  source: 'products' | 'computed' | 'mixed';
}

export interface AbcXyzReport {
  basis: 'sales_history' | 'product_master';
  totalProducts: number;
  matrix: Record<string, number>;
  products: AbcXyzEntry[];
  legend: Record<string, string>;
}

export interface CccLever {
  lever: 'dio' | 'dso' | 'dpo';
  action: string;
  days: number;
  cashFreed: number;
}

export interface CccSimulation {
  annualRevenue: number;
  revenueSource: 'parameter' | 'observed';
  dailyRevenue: number;
  totalDaysSaved: number;
  totalCashFreed: number;
  breakdown: CccLever[];
  currentCcc: number;
  projectedCcc: number;
}

export interface AgingBucket {
  bucket: string;
  invoices: number;
  totalAmount: number;
  outstanding: number;
}

export interface ArAgingReport {
  buckets: AgingBucket[];
  totalOutstanding: number;
  disputedInvoices: number;
  writeOffs: number;
}

export interface PartyDays {
  id: string;
  name: string | null;
  invoices: number;
  totalAmount: number;
  weightedDays: number | null;
}

export interface DsoReport {
  overallDso: number;
  byCustomer: Array<PartyDays & { segment: string | null }>;
}

export interface DpoReport {
  overallDpo: number;
  totalDiscountsCaptured: number;
  bySupplier: Array<PartyDays & { contractedDays: number | null }>;
}

export interface TurnoverLine {
  productId: string;
  revenue: number;
  inventoryValue: number;
  turnoverRatio: number;
}
