/**
 * Graph store types
 *
 * The graph mirrors suppliers and purchase orders as
 * (Supplier)-[:SUPPLIES]->(Product). It may lag the tabular store or be
 * missing entirely.
 */

import type { GraphBackend } from '../types';

export interface SupplierNode {
  supplierId: string;
  supplierName: string | null;
  leadTime: number | null;
  rating: number | null;
  otdRate: number | null;
  country: string | null;
}

export interface SuppliesEdge {
  supplierId: string;
  supplierName: string | null;
  leadTime: number | null;
  productId: string;
}

export interface SingleSourceProduct {
  productId: string;
  supplierId: string;
  supplierName: string | null;
}

export interface GraphCounts {
  suppliers: number;
  products: number;
  relationships: number;
}

/** One connection's worth of graph operations */
export interface GraphSession {
  ensureIndexes(): Promise<void>;

  /** MERGE on supplier_id, then overwrite the attributes */
  upsertSupplier(node: SupplierNode): Promise<void>;
  upsertProduct(productId: string): Promise<void>;
  /** Upserts both endpoints before the edge */
  upsertSupplies(supplierId: string, productId: string): Promise<void>;

  supplierExists(supplierId: string): Promise<boolean>;
  /** Distinct product ids reachable through SUPPLIES, ascending */
  productsSuppliedBy(supplierId: string): Promise<string[]>;
  /** Suppliers with a SUPPLIES edge to the product, by supplier id */
  suppliersOf(productId: string): Promise<SupplierNode[]>;
  /** Every supplier node, by supplier id */
  allSuppliers(): Promise<SupplierNode[]>;
  /** Every SUPPLIES edge, by supplier name then product id */
  edges(): Promise<SuppliesEdge[]>;
  /** Products with exactly one supplying supplier, by product id */
  singleSourceProducts(limit: number): Promise<SingleSourceProduct[]>;

  counts(): Promise<GraphCounts>;
  clear(): Promise<void>;
}

export interface GraphStore {
  readonly backend: GraphBackend;
  open(): Promise<GraphSession>;
  close(session: GraphSession): Promise<void>;
  shutdown(): Promise<void>;
}
