/**
 * Graph store - Supplier -[SUPPLIES]-> Product mirror
 */

import { createLogger } from '../utils/logger';
import type { GraphConfig } from '../types';
import { FalkorGraphStore } from './falkordb';
import { MemoryGraphStore } from './memory';
import type { GraphSession, GraphStore } from './types';

const logger = createLogger('graph');

export function createGraphStore(config: GraphConfig): GraphStore {
  if (config.backend === 'memory') {
    logger.info('Using in-process graph store');
    return new MemoryGraphStore();
  }
  logger.info({ host: config.host, port: config.port, graph: config.name }, 'Using FalkorDB graph store');
  return new FalkorGraphStore(config);
}

/**
 * Run fn with an open session; the session is closed on every exit path.
 */
export async function withGraph<T>(store: GraphStore, fn: (session: GraphSession) => Promise<T>): Promise<T> {
  const session = await store.open();
  try {
    return await fn(session);
  } finally {
    await store.close(session);
  }
}

export { FalkorGraphStore } from './falkordb';
export { MemoryGraphStore } from './memory';
export type {
  GraphCounts,
  GraphSession,
  GraphStore,
  SingleSourceProduct,
  SupplierNode,
  SuppliesEdge,
} from './types';
