/**
 * Inventory Policy Types
 */

export type ReorderSeverity = 'critical' | 'warning' | 'ok';
export type ValueSource = 'history' | 'product_master' | 'default';

export interface SafetyStockLine {
  productId: string;
  safetyStock: number;
  demandStdDev: number;
  leadTimeDays: number;
  sigmaSource: 'history' | 'default';
  leadTimeSource: 'product_master' | 'default';
}

export interface SafetyStockReport {
  formula: string;
  serviceLevel: number;
  zScore: number;
  truncated: boolean;
  results: SafetyStockLine[];
}

export interface EoqLine {
  productId: string;
  annualDemand: number;
  unitCost: number;
  unitCostSource: 'product_master' | 'default';
  holdingCostPerUnit: number;
  eoq: number;
  ordersPerYear: number;
}

export interface EoqReport {
  formula: string;
  orderCost: number;
  holdingCostPct: number;
  truncated: boolean;
  results: EoqLine[];
}

export interface ReorderAlert {
  productId: string;
  locationId: string | null;
  qtyOnHand: number;
  reorderPoint: number;
  safetyStockTarget: number | null;
  severity: Exclude<ReorderSeverity, 'ok'>;
  /** qty / ROP; null when ROP is 0 */
  stockRatio: number | null;
}

export interface ReorderAlertReport {
  totalAlerts: number;
  critical: number;
  warning: number;
  alerts: ReorderAlert[];
}

export interface ReorderRecommendation {
  productId: string;
  productName: string | null;
  locationId: string | null;
  qtyOnHand: number;
  reorderPoint: number;
  stockStatus: string | null;
  daysOfSupply: number | null;
  priority: 1 | 2 | 3;
  recommendedQty: number;
  quantitySource: 'product_master' | 'default';
  leadTimeDays: number;
  estimatedCost: number | null;
}

export interface DeadStockItem {
  productId: string;
  qtyOnHand: number;
  valueAtRisk: number;
  lastSaleDate: string | null;
  daysIdle: number | null;
  neverSold: boolean;
}

export interface DeadStockReport {
  daysThreshold: number;
  basis: 'sales_history' | 'snapshot_movement';
  deadStockCount: number;
  totalValueAtRisk: number;
  items: DeadStockItem[];
}

export interface SnapshotLine {
  productId: string;
  locationId: string | null;
  qtyOnHand: number;
  reorderPoint: number;
  daysOfSupply: number | null;
  stockStatus: string | null;
  inventoryValue: number;
}

export interface OverstockReport {
  overstockedItems: number;
  totalExcessValue: number;
  items: SnapshotLine[];
  note?: string;
}

export interface StockoutRiskReport {
  horizonDays: number;
  atRiskCount: number;
  items: SnapshotLine[];
  note?: string;
}

export type AgingBucketLabel = '0-30d' | '31-60d' | '61-90d' | '90+d';

export interface InventoryAgingReport {
  buckets: Array<{ bucket: AgingBucketLabel; skuCount: number; qty: number; totalValue: number }>;
  unclassified: number;
  products: Array<{ productId: string; qty: number; value: number; daysIdle: number | null; bucket: AgingBucketLabel | null }>;
}
