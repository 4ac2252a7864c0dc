/**
 * Tabular store - SQLite (sql.js WASM) holding the uploaded datasets
 *
 * Every analysis call acquires a handle for its duration and releases it on
 * every exit path (see withTabular). File-backed stores load the database file
 * on acquire and write it back (tmp file + rename) on release when the handle
 * changed anything. ':memory:' stores share one in-process database.
 *
 * Uploads replace whole tables without isolation from concurrent readers.
 */

import initSqlJs, { Database as SqlJsDatabase, SqlJsStatic, SqlValue, Statement } from 'sql.js';
import { dirname } from 'path';
import { mkdirSync, existsSync, readFileSync, writeFileSync, renameSync, statSync } from 'fs';
import { createLogger } from '../utils/logger';
import { InvalidInputError, TabularStoreError, errorMessage } from '../infra/errors';
import type { TabularConfig } from '../types';
import type { Row } from './values';

const logger = createLogger('db');

/**
 * Values that can be bound to SQL parameters.
 */
export type SqlParam = string | number | null;

export type ColumnType = 'INTEGER' | 'REAL' | 'TEXT';

export interface ColumnDef {
  name: string;
  type: ColumnType;
}

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
}

export interface QueryResult {
  columns: string[];
  rows: Row[];
}

// ---------------------------------------------------------------------------
// Handle interface
// ---------------------------------------------------------------------------

export interface TabularHandle {
  /** All rows of a read statement */
  query(sql: string, params?: SqlParam[]): Row[];
  /** Rows plus column names (present even when no row matches) */
  select(sql: string, params?: SqlParam[]): QueryResult;
  /** Execute a statement that changes data or schema */
  run(sql: string, params?: SqlParam[]): void;

  tableExists(table: string): boolean;
  countRows(table: string): number;
  tableColumns(table: string): ColumnInfo[];
  listTables(): string[];

  /** Drop and recreate a table, inserting all rows in one transaction */
  replaceTable(table: string, columns: ColumnDef[], rows: SqlParam[][]): void;
  dropTable(table: string): void;
}

export interface TabularStore {
  /** File path, or ':memory:' */
  readonly location: string;
  acquire(): Promise<TabularHandle>;
  release(handle: TabularHandle): Promise<void>;
  /** Size of the database file in bytes (0 in memory) */
  sizeBytes(): number;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Identifiers
// ---------------------------------------------------------------------------

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isSafeIdentifier(name: string): boolean {
  return IDENTIFIER_RE.test(name);
}

/** Double-quote an identifier after checking it against the allowed shape. */
export function quoteIdent(name: string): string {
  if (!isSafeIdentifier(name)) {
    throw new InvalidInputError(`Invalid identifier: ${JSON.stringify(name)}`);
  }
  return `"${name}"`;
}

// ---------------------------------------------------------------------------
// sql.js handle
// ---------------------------------------------------------------------------

class SqlJsHandle implements TabularHandle {
  private changed = false;

  constructor(readonly db: SqlJsDatabase) {}

  get dirty(): boolean {
    return this.changed;
  }

  query(sql: string, params: SqlParam[] = []): Row[] {
    return this.select(sql, params).rows;
  }

  select(sql: string, params: SqlParam[] = []): QueryResult {
    const stmt = this.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return { columns: stmt.getColumnNames(), rows };
    } catch (err) {
      throw new TabularStoreError(`Query failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      stmt.free();
    }
  }

  private prepare(sql: string): Statement {
    try {
      return this.db.prepare(sql);
    } catch (err) {
      throw new TabularStoreError(`Query failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  run(sql: string, params: SqlParam[] = []): void {
    try {
      this.db.run(sql, params);
      this.changed = true;
    } catch (err) {
      throw new TabularStoreError(`Statement failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  tableExists(table: string): boolean {
    const rows = this.query("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?", [table]);
    return rows.length > 0;
  }

  countRows(table: string): number {
    if (!this.tableExists(table)) return 0;
    const rows = this.query(`SELECT COUNT(*) AS cnt FROM ${quoteIdent(table)}`);
    return Number(rows[0]?.cnt ?? 0);
  }

  tableColumns(table: string): ColumnInfo[] {
    if (!this.tableExists(table)) return [];
    return this.query(`PRAGMA table_info(${quoteIdent(table)})`).map((row) => ({
      name: String(row.name),
      type: String(row.type ?? ''),
      nullable: Number(row.notnull) === 0,
    }));
  }

  listTables(): string[] {
    return this.query(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    ).map((row) => String(row.name));
  }

  replaceTable(table: string, columns: ColumnDef[], rows: SqlParam[][]): void {
    if (columns.length === 0) {
      throw new InvalidInputError(`Cannot create table ${table} without columns`);
    }
    const tableId = quoteIdent(table);
    const columnSql = columns.map((c) => `${quoteIdent(c.name)} ${c.type}`).join(', ');
    const placeholders = columns.map(() => '?').join(', ');

    this.run(`DROP TABLE IF EXISTS ${tableId}`);
    this.run(`CREATE TABLE ${tableId} (${columnSql})`);

    const stmt = this.prepare(`INSERT INTO ${tableId} VALUES (${placeholders})`);
    this.db.run('BEGIN');
    try {
      for (const row of rows) {
        stmt.run(row);
      }
      this.db.run('COMMIT');
    } catch (err) {
      this.db.run('ROLLBACK');
      throw new TabularStoreError(`Failed to load ${table}: ${errorMessage(err)}`, { cause: err });
    } finally {
      stmt.free();
    }
  }

  dropTable(table: string): void {
    this.run(`DROP TABLE IF EXISTS ${quoteIdent(table)}`);
  }
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs().catch((err: unknown) => {
      sqlJsPromise = null;
      throw new TabularStoreError(`Failed to initialise sql.js: ${errorMessage(err)}`, { cause: err });
    });
  }
  return sqlJsPromise;
}

export class SqliteTabularStore implements TabularStore {
  readonly location: string;
  private readonly inMemory: boolean;
  private shared: SqlJsDatabase | null = null;
  private readonly leases = new Map<TabularHandle, SqlJsHandle>();

  constructor(config: TabularConfig) {
    this.location = config.path;
    this.inMemory = config.path === ':memory:';
  }

  async acquire(): Promise<TabularHandle> {
    const SQL = await loadSqlJs();
    let db: SqlJsDatabase;

    if (this.inMemory) {
      if (!this.shared) this.shared = new SQL.Database();
      db = this.shared;
    } else if (existsSync(this.location)) {
      try {
        db = new SQL.Database(readFileSync(this.location));
      } catch (err) {
        throw new TabularStoreError(`Cannot open database ${this.location}: ${errorMessage(err)}`, { cause: err });
      }
    } else {
      db = new SQL.Database();
    }

    const handle = new SqlJsHandle(db);
    this.leases.set(handle, handle);
    return handle;
  }

  async release(handle: TabularHandle): Promise<void> {
    const lease = this.leases.get(handle);
    if (!lease) return;
    this.leases.delete(handle);
    if (this.inMemory) return;

    try {
      if (lease.dirty) this.save(lease.db);
    } finally {
      lease.db.close();
    }
  }

  sizeBytes(): number {
    if (this.inMemory || !existsSync(this.location)) return 0;
    return statSync(this.location).size;
  }

  async close(): Promise<void> {
    for (const handle of [...this.leases.keys()]) {
      await this.release(handle);
    }
    if (this.shared) {
      this.shared.close();
      this.shared = null;
    }
  }

  private save(db: SqlJsDatabase): void {
    try {
      const dir = dirname(this.location);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      const tmpPath = this.location + '.tmp';
      writeFileSync(tmpPath, Buffer.from(db.export()));
      renameSync(tmpPath, this.location);
      logger.debug({ path: this.location }, 'Database saved');
    } catch (err) {
      throw new TabularStoreError(`Failed to save database ${this.location}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export function createTabularStore(config: TabularConfig): TabularStore {
  logger.info({ path: config.path }, 'Opening tabular store');
  return new SqliteTabularStore(config);
}

/**
 * Run fn with an acquired handle; the handle is released on every exit path.
 */
export async function withTabular<T>(
  store: TabularStore,
  fn: (handle: TabularHandle) => T | Promise<T>,
): Promise<T> {
  const handle = await store.acquire();
  try {
    return await fn(handle);
  } finally {
    await store.release(handle);
  }
}

export type { Row } from './values';
export type { SqlValue };
