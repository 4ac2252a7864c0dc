/**
 * FalkorDB graph store
 *
 * Speaks GRAPH.QUERY over the Redis protocol (ioredis). Values travel as a
 * `CYPHER k=v ...` parameter header so nothing user-supplied is spliced into
 * the query body. Each session owns one connection with a bounded connect
 * timeout and no reconnect loop.
 */

import Redis from 'ioredis';
import { createLogger } from '../utils/logger';
import { GraphUnavailableError, errorMessage } from '../infra/errors';
import type { GraphConfig } from '../types';
import type {
  GraphCounts,
  GraphSession,
  GraphStore,
  SingleSourceProduct,
  SupplierNode,
  SuppliesEdge,
} from './types';

const logger = createLogger('falkordb');

// =============================================================================
// CONNECTION
// =============================================================================

/** The slice of a Redis client the store needs */
export interface GraphConnection {
  query(graph: string, cypher: string): Promise<unknown>;
  close(): Promise<void>;
}

export type ConnectionFactory = (config: GraphConfig) => Promise<GraphConnection>;

export const connectRedis: ConnectionFactory = async (config) => {
  const client = new Redis({
    host: config.host,
    port: config.port,
    lazyConnect: true,
    connectTimeout: config.connectTimeoutMs,
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
    retryStrategy: () => null,
  });
  client.on('error', (err: Error) => {
    logger.debug({ err: err.message }, 'FalkorDB connection error');
  });

  try {
    await client.connect();
  } catch (err) {
    client.disconnect();
    throw new GraphUnavailableError(
      `Cannot reach FalkorDB at ${config.host}:${config.port}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  return {
    query: (graph, cypher) => client.call('GRAPH.QUERY', graph, cypher),
    close: async () => {
      await client.quit();
    },
  };
};

// =============================================================================
// PARAMETERS & REPLIES
// =============================================================================

export type CypherValue = string | number | boolean | null;

const PARAM_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function cypherLiteral(value: CypherValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'null';
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Prefix a query with its parameters: CYPHER id="S1" limit=5 MATCH ... */
export function withParams(query: string, params: Record<string, CypherValue> = {}): string {
  const entries = Object.entries(params);
  if (entries.length === 0) return query;
  const header = entries.map(([key, value]) => {
    if (!PARAM_NAME_RE.test(key)) throw new Error(`Invalid Cypher parameter name: ${key}`);
    return `${key}=${cypherLiteral(value)}`;
  });
  return `CYPHER ${header.join(' ')} ${query}`;
}

export interface GraphReply {
  header: string[];
  rows: unknown[][];
}

/**
 * Verbose GRAPH.QUERY replies are [header, rows, stats] when the query
 * returns something and [stats] otherwise.
 */
export function parseReply(reply: unknown): GraphReply {
  if (!Array.isArray(reply)) {
    throw new GraphUnavailableError('Unexpected GRAPH.QUERY reply');
  }
  const parts: unknown[] = reply;
  if (parts.length < 3) return { header: [], rows: [] };

  const [rawHeader, rawRows] = parts;
  const header = Array.isArray(rawHeader)
    ? rawHeader.map((h: unknown) => (Array.isArray(h) ? String(h[h.length - 1]) : String(h)))
    : [];
  const rows: unknown[][] = [];
  if (Array.isArray(rawRows)) {
    for (const row of rawRows) {
      if (Array.isArray(row)) rows.push([...row]);
    }
  }
  return { header, rows };
}

export function cellString(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}

export function cellNumber(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;
  const n = typeof value === 'number' ? value : Number(cellString(value));
  return Number.isFinite(n) ? n : null;
}

function toSupplierNode(row: unknown[]): SupplierNode {
  return {
    supplierId: cellString(row[0]) ?? '',
    supplierName: cellString(row[1]),
    leadTime: cellNumber(row[2]),
    rating: cellNumber(row[3]),
    otdRate: cellNumber(row[4]),
    country: cellString(row[5]),
  };
}

const SUPPLIER_FIELDS = 's.supplier_id, s.supplier_name, s.lead_time, s.rating, s.otd_rate, s.country';

// =============================================================================
// SESSION
// =============================================================================

class FalkorGraphSession implements GraphSession {
  constructor(
    readonly connection: GraphConnection,
    private readonly graphName: string,
  ) {}

  private async run(query: string, params?: Record<string, CypherValue>): Promise<GraphReply> {
    let reply: unknown;
    try {
      reply = await this.connection.query(this.graphName, withParams(query, params));
    } catch (err) {
      throw new GraphUnavailableError(`Graph query failed: ${errorMessage(err)}`, { cause: err });
    }
    return parseReply(reply);
  }

  private async count(query: string): Promise<number> {
    const { rows } = await this.run(query);
    return cellNumber(rows[0]?.[0]) ?? 0;
  }

  async ensureIndexes(): Promise<void> {
    for (const [label, property] of [['Supplier', 'supplier_id'], ['Product', 'product_id']]) {
      try {
        await this.run(`CREATE INDEX FOR (n:${label}) ON (n.${property})`);
      } catch (err) {
        if (!/already indexed/i.test(errorMessage(err))) throw err;
        logger.debug({ label, property }, 'Index already exists');
      }
    }
  }

  async upsertSupplier(node: SupplierNode): Promise<void> {
    await this.run(
      'MERGE (s:Supplier {supplier_id: $id}) ' +
        'SET s.supplier_name = $name, s.lead_time = $lead, s.rating = $rating, s.otd_rate = $otd, s.country = $country',
      {
        id: node.supplierId,
        name: node.supplierName,
        lead: node.leadTime,
        rating: node.rating,
        otd: node.otdRate,
        country: node.country,
      },
    );
  }

  async upsertProduct(productId: string): Promise<void> {
    await this.run('MERGE (p:Product {product_id: $id})', { id: productId });
  }

  async upsertSupplies(supplierId: string, productId: string): Promise<void> {
    await this.run(
      'MERGE (s:Supplier {supplier_id: $sid}) MERGE (p:Product {product_id: $pid}) MERGE (s)-[:SUPPLIES]->(p)',
      { sid: supplierId, pid: productId },
    );
  }

  async supplierExists(supplierId: string): Promise<boolean> {
    const { rows } = await this.run('MATCH (s:Supplier {supplier_id: $id}) RETURN count(s)', { id: supplierId });
    return (cellNumber(rows[0]?.[0]) ?? 0) > 0;
  }

  async productsSuppliedBy(supplierId: string): Promise<string[]> {
    const { rows } = await this.run(
      'MATCH (s:Supplier {supplier_id: $id})-[:SUPPLIES]->(p:Product) RETURN DISTINCT p.product_id ORDER BY p.product_id',
      { id: supplierId },
    );
    return rows.map((r) => cellString(r[0]) ?? '').filter(Boolean);
  }

  async suppliersOf(productId: string): Promise<SupplierNode[]> {
    const { rows } = await this.run(
      `MATCH (s:Supplier)-[:SUPPLIES]->(p:Product {product_id: $pid}) RETURN DISTINCT ${SUPPLIER_FIELDS} ORDER BY s.supplier_id`,
      { pid: productId },
    );
    return rows.map(toSupplierNode);
  }

  async allSuppliers(): Promise<SupplierNode[]> {
    const { rows } = await this.run(`MATCH (s:Supplier) RETURN ${SUPPLIER_FIELDS} ORDER BY s.supplier_id`);
    return rows.map(toSupplierNode);
  }

  async edges(): Promise<SuppliesEdge[]> {
    const { rows } = await this.run(
      'MATCH (s:Supplier)-[:SUPPLIES]->(p:Product) ' +
        'RETURN s.supplier_id, s.supplier_name, s.lead_time, p.product_id ORDER BY s.supplier_name, p.product_id',
    );
    return rows.map((r) => ({
      supplierId: cellString(r[0]) ?? '',
      supplierName: cellString(r[1]),
      leadTime: cellNumber(r[2]),
      productId: cellString(r[3]) ?? '',
    }));
  }

  async singleSourceProducts(limit: number): Promise<SingleSourceProduct[]> {
    const { rows } = await this.run(
      'MATCH (s:Supplier)-[:SUPPLIES]->(p:Product) ' +
        'WITH p, count(s) AS c, collect(s.supplier_id) AS ids, collect(s.supplier_name) AS names ' +
        'WHERE c = 1 RETURN p.product_id, ids[0], names[0] ORDER BY p.product_id LIMIT $limit',
      { limit },
    );
    return rows.map((r) => ({
      productId: cellString(r[0]) ?? '',
      supplierId: cellString(r[1]) ?? '',
      supplierName: cellString(r[2]),
    }));
  }

  async counts(): Promise<GraphCounts> {
    return {
      suppliers: await this.count('MATCH (s:Supplier) RETURN count(s)'),
      products: await this.count('MATCH (p:Product) RETURN count(p)'),
      relationships: await this.count('MATCH ()-[r:SUPPLIES]->() RETURN count(r)'),
    };
  }

  async clear(): Promise<void> {
    await this.run('MATCH (n) DETACH DELETE n');
  }
}

// =============================================================================
// STORE
// =============================================================================

export class FalkorGraphStore implements GraphStore {
  readonly backend = 'falkordb' as const;

  constructor(
    private readonly config: GraphConfig,
    private readonly connect: ConnectionFactory = connectRedis,
  ) {}

  async open(): Promise<GraphSession> {
    const connection = await this.connect(this.config);
    return new FalkorGraphSession(connection, this.config.name);
  }

  async close(session: GraphSession): Promise<void> {
    if (!(session instanceof FalkorGraphSession)) return;
    try {
      await session.connection.close();
    } catch (err) {
      logger.warn({ err: errorMessage(err) }, 'Failed to close FalkorDB connection');
    }
  }

  async shutdown(): Promise<void> {
    // connections are per session
  }
}
