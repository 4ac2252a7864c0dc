import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DEFAULT_POLICY, loadConfig, resolveStateDir } from './config';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'wcopt-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (content: string) => writeFileSync(join(dir, 'wcopt.json'), content);

  it('starts from defaults under the state directory', () => {
    const config = loadConfig({ env: { WCOPT_STATE_DIR: dir } });

    expect(config).toEqual({
      tabular: { path: join(dir, 'supply_chain.db') },
      graph: { backend: 'falkordb', host: 'localhost', port: 6379, name: 'supply_chain', connectTimeoutMs: 2000 },
      server: { port: 8000 },
      mcp: { allowedTools: [], blockedTools: [], audit: true },
      policy: DEFAULT_POLICY,
    });
    expect(resolveStateDir({ WCOPT_STATE_DIR: dir })).toBe(dir);
  });

  it('reads the config file and keeps defaults for malformed values', () => {
    writeConfig(JSON.stringify({ graph: { port: 7000, name: 'from_file' }, policy: { serviceLevel: 0.99, orderCost: 'lots' } }));

    const config = loadConfig({ env: { WCOPT_STATE_DIR: dir } });
    expect(config.graph.port).toBe(7000);
    expect(config.graph.name).toBe('from_file');
    expect(config.policy.serviceLevel).toBe(0.99);
    expect(config.policy.orderCost).toBe(50);
  });

  it('lets the environment override the file', () => {
    writeConfig(JSON.stringify({ graph: { port: 7000 } }));

    const config = loadConfig({
      env: {
        WCOPT_STATE_DIR: dir,
        WCOPT_DB_PATH: join(dir, 'other.db'),
        FALKORDB_PORT: '6390',
        WCOPT_GRAPH_BACKEND: 'MEMORY',
        WCOPT_MCP_BLOCKED_TOOLS: 'run_sql_query, reset_all_data',
        WCOPT_MCP_AUDIT: 'false',
      },
    });

    expect(config.tabular.path).toBe(join(dir, 'other.db'));
    expect(config.graph.port).toBe(6390);
    expect(config.graph.backend).toBe('memory');
    expect(config.mcp.blockedTools).toEqual(['run_sql_query', 'reset_all_data']);
    expect(config.mcp.audit).toBe(false);
  });

  it('applies explicit overrides last', () => {
    const config = loadConfig({
      env: { WCOPT_STATE_DIR: dir, FALKORDB_PORT: '6390' },
      overrides: { graph: { port: 1234 }, policy: { queryRowCap: 5 } },
    });
    expect(config.graph.port).toBe(1234);
    expect(config.policy.queryRowCap).toBe(5);
    expect(config.policy.orderCost).toBe(50);
  });

  it('ignores invalid ports and backends', () => {
    const config = loadConfig({ env: { WCOPT_STATE_DIR: dir, FALKORDB_PORT: 'abc', WCOPT_GRAPH_BACKEND: 'neo4j' } });
    expect(config.graph.port).toBe(6379);
    expect(config.graph.backend).toBe('falkordb');
  });

  it('falls back to defaults when the file is not valid JSON', () => {
    writeConfig('{ not json');
    expect(loadConfig({ env: { WCOPT_STATE_DIR: dir } }).graph.port).toBe(6379);
  });

  it('skips prototype keys in the file', () => {
    writeConfig('{"__proto__": {"polluted": true}, "server": {"port": 9000}}');
    const config = loadConfig({ env: { WCOPT_STATE_DIR: dir } });
    expect(config.server.port).toBe(9000);
    expect(Object.prototype).not.toHaveProperty('polluted');
  });

  it('honours an explicit config path', () => {
    const path = join(dir, 'custom.json');
    writeFileSync(path, JSON.stringify({ server: { port: 8100 } }));
    expect(loadConfig({ env: { WCOPT_STATE_DIR: dir }, configPath: path }).server.port).toBe(8100);
  });
});
