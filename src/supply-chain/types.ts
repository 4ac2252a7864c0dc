/**
 * Supply Chain Module Types
 */

import type { SingleSourceProduct, SupplierNode, SuppliesEdge } from '../graph/types';

export type RiskLevel = 'high' | 'medium' | 'low';

/** Where a graph-backed answer came from */
export type DataSource = 'graph' | 'tabular';

export interface Sourced {
  source: DataSource;
  /** Set when the answer fell back to the tabular store */
  note?: string;
}

export interface RiskComponents {
  leadTime: number;
  onTimeDelivery: number;
  quality: number;
}

export interface SupplierRisk {
  supplierId: string;
  supplierName: string | null;
  riskScore: number;
  riskLevel: RiskLevel;
  leadTimeDays: number | null;
  onTimeDeliveryRate: number | null;
  qualityRejectionRate: number | null;
  components: RiskComponents;
}

export interface SupplierPerformance {
  supplierId: string;
  supplierName: string | null;
  avgLeadTimeDays: number | null;
  onTimeDeliveryRate: number | null;
  qualityRejectionRate: number | null;
  rating: number | null;
  country: string | null;
  purchaseOrders: number | null;
  totalPoValue: number | null;
  avgDelayDays: number | null;
}

export interface SupplierShare {
  supplierId: string;
  supplierName: string | null;
  orders: number;
  value: number;
  valuePct: number;
}

export interface SupplierConcentration {
  measure: 'total_po_value' | 'qty_ordered';
  totalValue: number;
  top3SharePct: number;
  concentrationRisk: RiskLevel;
  suppliers: SupplierShare[];
}

export interface SupplierNetwork extends Sourced {
  supplierCount: number;
  productCount: number;
  relationships: number;
  network: SuppliesEdge[];
}

export interface SingleSourceRisk extends SingleSourceProduct {
  risk: 'high';
}

export interface SingleSourceReport extends Sourced {
  total: number;
  risks: SingleSourceRisk[];
}

export interface RippleEffect extends Sourced {
  supplierId: string;
  supplierName: string | null;
  impactedProducts: string[];
  count: number;
  severity: RiskLevel;
}

export interface AlternativeSuppliers extends Sourced {
  productId: string;
  currentSuppliers: SupplierNode[];
  alternatives: SupplierNode[];
}

export interface LeadTimeStats {
  orders: number;
  mean: number;
  stdDev: number | null;
  min: number;
  max: number;
  /** stdDev / mean; null without a deviation or with a zero mean */
  cv: number | null;
}

export interface LeadTimeLine {
  supplierId: string;
  supplierName: string | null;
  leadTimeDays: number | null;
  observed: LeadTimeStats | null;
}

export interface LeadTimeVariability extends Sourced {
  averageLeadTime: number | null;
  minLeadTime: number | null;
  maxLeadTime: number | null;
  suppliers: LeadTimeLine[];
}
