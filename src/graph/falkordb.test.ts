import { describe, it, expect, vi } from 'vitest';
import { GraphUnavailableError } from '../infra/errors';
import { testConfig } from '../test-helpers';
import { withGraph } from './index';
import {
  FalkorGraphStore,
  cellNumber,
  cellString,
  cypherLiteral,
  parseReply,
  withParams,
  type GraphConnection,
} from './falkordb';

const GRAPH_CONFIG = { ...testConfig().graph, backend: 'falkordb' as const, name: 'test_graph' };

/** Records every query and answers from a handler */
class FakeConnection implements GraphConnection {
  readonly queries: Array<{ graph: string; cypher: string }> = [];
  closed = 0;

  constructor(private readonly handler: (cypher: string) => unknown = () => [['stats']]) {}

  async query(graph: string, cypher: string): Promise<unknown> {
    this.queries.push({ graph, cypher });
    return this.handler(cypher);
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

function storeWith(connection: GraphConnection): FalkorGraphStore {
  return new FalkorGraphStore(GRAPH_CONFIG, async () => connection);
}

// =============================================================================
// Parameters
// =============================================================================

describe('cypherLiteral', () => {
  it('renders each value kind', () => {
    expect(cypherLiteral(null)).toBe('null');
    expect(cypherLiteral(true)).toBe('true');
    expect(cypherLiteral(false)).toBe('false');
    expect(cypherLiteral(14)).toBe('14');
    expect(cypherLiteral(Number.NaN)).toBe('null');
    expect(cypherLiteral('Acme "Q" \\ Co')).toBe('"Acme \\"Q\\" \\\\ Co"');
  });
});

describe('withParams', () => {
  it('leaves a query without parameters untouched', () => {
    expect(withParams('MATCH (n) RETURN n')).toBe('MATCH (n) RETURN n');
  });

  it('prefixes a CYPHER header', () => {
    expect(withParams('MATCH (s {id: $id}) RETURN s LIMIT $limit', { id: 'S1', limit: 5 })).toBe(
      'CYPHER id="S1" limit=5 MATCH (s {id: $id}) RETURN s LIMIT $limit',
    );
  });

  it('rejects parameter names that are not identifiers', () => {
    expect(() => withParams('RETURN 1', { 'a b': 1 })).toThrow('Invalid Cypher parameter name: a b');
  });
});

// =============================================================================
// Replies
// =============================================================================

describe('parseReply', () => {
  it('reads header, rows and ignores stats', () => {
    expect(parseReply([['count(s)'], [[3]], ['Query internal execution time: 0.1 ms']])).toEqual({
      header: ['count(s)'],
      rows: [[3]],
    });
  });

  it('takes the name from typed header cells', () => {
    expect(parseReply([[[1, 'p.product_id']], [['P1'], ['P2']], []]).header).toEqual(['p.product_id']);
  });

  it('treats a stats-only reply as empty', () => {
    expect(parseReply([['Nodes created: 1']])).toEqual({ header: [], rows: [] });
  });

  it('rejects anything that is not an array', () => {
    expect(() => parseReply('OK')).toThrow(GraphUnavailableError);
  });
});

describe('cells', () => {
  it('decodes buffers and numbers', () => {
    expect(cellString(Buffer.from('P1'))).toBe('P1');
    expect(cellString(undefined)).toBeNull();
    expect(cellNumber('14')).toBe(14);
    expect(cellNumber(Buffer.from('2.5'))).toBe(2.5);
    expect(cellNumber('')).toBeNull();
    expect(cellNumber('n/a')).toBeNull();
  });
});

// =============================================================================
// Sessions
// =============================================================================

describe('FalkorGraphStore', () => {
  it('sends supplier values as parameters to the configured graph', async () => {
    const connection = new FakeConnection();
    await withGraph(storeWith(connection), (s) =>
      s.upsertSupplier({ supplierId: 'S1', supplierName: 'Acme', leadTime: 14, rating: null, otdRate: 0.9, country: null }),
    );

    expect(connection.queries).toEqual([
      {
        graph: 'test_graph',
        cypher:
          'CYPHER id="S1" name="Acme" lead=14 rating=null otd=0.9 country=null ' +
          'MERGE (s:Supplier {supplier_id: $id}) ' +
          'SET s.supplier_name = $name, s.lead_time = $lead, s.rating = $rating, s.otd_rate = $otd, s.country = $country',
      },
    ]);
    expect(connection.closed).toBe(1);
  });

  it('reads counts from count replies', async () => {
    const totals: Record<string, number> = {
      'MATCH (s:Supplier) RETURN count(s)': 3,
      'MATCH (p:Product) RETURN count(p)': 5,
      'MATCH ()-[r:SUPPLIES]->() RETURN count(r)': 7,
    };
    const connection = new FakeConnection((cypher) => [['count'], [[totals[cypher] ?? 0]], ['stats']]);

    expect(await withGraph(storeWith(connection), (s) => s.counts())).toEqual({
      suppliers: 3,
      products: 5,
      relationships: 7,
    });
  });

  it('maps single-source rows', async () => {
    const connection = new FakeConnection(() => [
      ['p.product_id', 'ids[0]', 'names[0]'],
      [[Buffer.from('P1'), 'S1', null]],
      ['stats'],
    ]);

    const rows = await withGraph(storeWith(connection), (s) => s.singleSourceProducts(5));
    expect(rows).toEqual([{ productId: 'P1', supplierId: 'S1', supplierName: null }]);
    expect(connection.queries[0]?.cypher.startsWith('CYPHER limit=5 MATCH (s:Supplier)-[:SUPPLIES]->(p:Product)')).toBe(true);
  });

  it('tolerates existing indexes', async () => {
    const connection = new FakeConnection(() => {
      throw new Error('Attribute supplier_id is already indexed');
    });

    await expect(withGraph(storeWith(connection), (s) => s.ensureIndexes())).resolves.toBeUndefined();
    expect(connection.queries).toHaveLength(2);
  });

  it('wraps query errors', async () => {
    const connection = new FakeConnection(() => {
      throw new Error('ERR unknown command');
    });

    const attempt = withGraph(storeWith(connection), (s) => s.clear());
    await expect(attempt).rejects.toThrow(GraphUnavailableError);
    await expect(withGraph(storeWith(connection), (s) => s.clear())).rejects.toThrow('Graph query failed: ERR unknown command');
    expect(connection.closed).toBe(2);
  });

  it('surfaces connection failures', async () => {
    const store = new FalkorGraphStore(GRAPH_CONFIG, async () => {
      throw new GraphUnavailableError('Cannot reach FalkorDB at localhost:6379: refused');
    });
    await expect(withGraph(store, (s) => s.counts())).rejects.toThrow('Cannot reach FalkorDB');
  });

  it('does not fail when closing a connection fails', async () => {
    const connection = new FakeConnection();
    vi.spyOn(connection, 'close').mockRejectedValue(new Error('socket gone'));

    await expect(withGraph(storeWith(connection), (s) => s.clear())).resolves.toBeUndefined();
  });
});
