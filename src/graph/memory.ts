/**
 * In-process graph store
 *
 * Same contract as the FalkorDB store, held in maps. Used by tests and by
 * deployments without a graph server (WCOPT_GRAPH_BACKEND=memory).
 */

import { GraphUnavailableError } from '../infra/errors';
import type {
  GraphCounts,
  GraphSession,
  GraphStore,
  SingleSourceProduct,
  SupplierNode,
  SuppliesEdge,
} from './types';

interface MemoryGraphState {
  suppliers: Map<string, SupplierNode>;
  products: Set<string>;
  /** supplier id -> product ids */
  supplies: Map<string, Set<string>>;
}

function emptySupplier(supplierId: string): SupplierNode {
  return { supplierId, supplierName: null, leadTime: null, rating: null, otdRate: null, country: null };
}

const byId = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

class MemoryGraphSession implements GraphSession {
  constructor(private readonly state: MemoryGraphState) {}

  async ensureIndexes(): Promise<void> {
    // maps are already keyed
  }

  async upsertSupplier(node: SupplierNode): Promise<void> {
    this.state.suppliers.set(node.supplierId, { ...node });
  }

  async upsertProduct(productId: string): Promise<void> {
    this.state.products.add(productId);
  }

  async upsertSupplies(supplierId: string, productId: string): Promise<void> {
    if (!this.state.suppliers.has(supplierId)) {
      this.state.suppliers.set(supplierId, emptySupplier(supplierId));
    }
    this.state.products.add(productId);
    let set = this.state.supplies.get(supplierId);
    if (!set) {
      set = new Set();
      this.state.supplies.set(supplierId, set);
    }
    set.add(productId);
  }

  async supplierExists(supplierId: string): Promise<boolean> {
    return this.state.suppliers.has(supplierId);
  }

  async productsSuppliedBy(supplierId: string): Promise<string[]> {
    return [...(this.state.supplies.get(supplierId) ?? [])].sort(byId);
  }

  async suppliersOf(productId: string): Promise<SupplierNode[]> {
    const result: SupplierNode[] = [];
    for (const [supplierId, products] of this.state.supplies) {
      if (!products.has(productId)) continue;
      result.push({ ...(this.state.suppliers.get(supplierId) ?? emptySupplier(supplierId)) });
    }
    return result.sort((a, b) => byId(a.supplierId, b.supplierId));
  }

  async allSuppliers(): Promise<SupplierNode[]> {
    return [...this.state.suppliers.values()]
      .map((s) => ({ ...s }))
      .sort((a, b) => byId(a.supplierId, b.supplierId));
  }

  async edges(): Promise<SuppliesEdge[]> {
    const result: SuppliesEdge[] = [];
    for (const [supplierId, products] of this.state.supplies) {
      const supplier = this.state.suppliers.get(supplierId) ?? emptySupplier(supplierId);
      for (const productId of products) {
        result.push({ supplierId, supplierName: supplier.supplierName, leadTime: supplier.leadTime, productId });
      }
    }
    return result.sort(
      (a, b) => byId(a.supplierName ?? '', b.supplierName ?? '') || byId(a.productId, b.productId),
    );
  }

  async singleSourceProducts(limit: number): Promise<SingleSourceProduct[]> {
    const suppliersByProduct = new Map<string, string[]>();
    for (const [supplierId, products] of this.state.supplies) {
      for (const productId of products) {
        const list = suppliersByProduct.get(productId) ?? [];
        list.push(supplierId);
        suppliersByProduct.set(productId, list);
      }
    }
    return [...suppliersByProduct.entries()]
      .filter(([, suppliers]) => suppliers.length === 1)
      .map(([productId, [supplierId]]) => ({
        productId,
        supplierId,
        supplierName: this.state.suppliers.get(supplierId)?.supplierName ?? null,
      }))
      .sort((a, b) => byId(a.productId, b.productId))
      .slice(0, limit);
  }

  async counts(): Promise<GraphCounts> {
    let relationships = 0;
    for (const products of this.state.supplies.values()) relationships += products.size;
    return { suppliers: this.state.suppliers.size, products: this.state.products.size, relationships };
  }

  async clear(): Promise<void> {
    this.state.suppliers.clear();
    this.state.products.clear();
    this.state.supplies.clear();
  }
}

export class MemoryGraphStore implements GraphStore {
  readonly backend = 'memory' as const;
  private readonly state: MemoryGraphState = {
    suppliers: new Map(),
    products: new Set(),
    supplies: new Map(),
  };
  private available = true;

  /** Simulate the graph server going away (or coming back) */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async open(): Promise<GraphSession> {
    if (!this.available) {
      throw new GraphUnavailableError('Graph store is unavailable');
    }
    return new MemoryGraphSession(this.state);
  }

  async close(): Promise<void> {
    // sessions hold no resources
  }

  async shutdown(): Promise<void> {
    // nothing to release
  }
}
