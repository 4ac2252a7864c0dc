/**
 * Shared configuration types
 */

export type GraphBackend = 'falkordb' | 'memory';

/** Formula defaults. Every magic number an analysis falls back on lives here. */
export interface PolicyDefaults {
  /** Annual holding cost as a fraction of inventory value */
  holdingCostPct: number;
  /** Fixed cost per purchase order (EOQ "S") */
  orderCost: number;
  /** Unit cost used when the product master has none */
  defaultUnitCost: number;
  /** Supplier lead time used when the product master has none */
  defaultLeadTimeDays: number;
  /** Demand standard deviation used when a SKU has no usable sales history */
  defaultDemandStdDev: number;
  /** Order quantity suggested when the product master has no EOQ */
  defaultEoq: number;
  serviceLevel: number;
  deadStockDays: number;
  stockoutHorizonDays: number;
  forecastWindow: number;
  forecastHorizonDays: number;
  anomalyZThreshold: number;
  /** Rows returned by an ad-hoc query */
  queryRowCap: number;
  alternativeSupplierLimit: number;
  /** on-hand below ROP × factor is a warning */
  reorderWarningFactor: number;
}

export interface TabularConfig {
  /** SQLite database file, or ':memory:' */
  path: string;
}

export interface GraphConfig {
  backend: GraphBackend;
  host: string;
  port: number;
  name: string;
  connectTimeoutMs: number;
}

export interface McpConfig {
  allowedTools: string[];
  blockedTools: string[];
  audit: boolean;
}

export interface EngineConfig {
  tabular: TabularConfig;
  graph: GraphConfig;
  server: { port: number };
  mcp: McpConfig;
  policy: PolicyDefaults;
}
