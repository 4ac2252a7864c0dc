/**
 * Configuration loading
 *
 * Builds one immutable EngineConfig from defaults, ~/.wcopt/wcopt.json and the
 * environment. Stores and analyses receive the object at construction and never
 * read process.env themselves.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import type { EngineConfig, GraphBackend, PolicyDefaults } from '../types';
import { createLogger } from './logger';

const logger = createLogger('config');

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed === ':memory:') return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.WCOPT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.wcopt');
}

function resolveConfigPath(env: NodeJS.ProcessEnv): string {
  const override = env.WCOPT_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'wcopt.json');
}

/** Load .env from the state dir first, then the CWD (won't override existing vars). */
export function loadEnvFiles(env: NodeJS.ProcessEnv = process.env): void {
  dotenvConfig({ path: join(resolveStateDir(env), '.env') });
  dotenvConfig();
}

export const DEFAULT_POLICY: PolicyDefaults = {
  holdingCostPct: 0.25,
  orderCost: 50,
  defaultUnitCost: 10,
  defaultLeadTimeDays: 14,
  defaultDemandStdDev: 50,
  defaultEoq: 100,
  serviceLevel: 0.95,
  deadStockDays: 90,
  stockoutHorizonDays: 14,
  forecastWindow: 7,
  forecastHorizonDays: 30,
  anomalyZThreshold: 2.0,
  queryRowCap: 100,
  alternativeSupplierLimit: 5,
  reorderWarningFactor: 1.2,
};

const POLICY_KEYS: ReadonlyArray<keyof PolicyDefaults> = [
  'holdingCostPct',
  'orderCost',
  'defaultUnitCost',
  'defaultLeadTimeDays',
  'defaultDemandStdDev',
  'defaultEoq',
  'serviceLevel',
  'deadStockDays',
  'stockoutHorizonDays',
  'forecastWindow',
  'forecastHorizonDays',
  'anomalyZThreshold',
  'queryRowCap',
  'alternativeSupplierLimit',
  'reorderWarningFactor',
];

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    tabular: { path: join(resolveStateDir(env), 'supply_chain.db') },
    graph: {
      backend: 'falkordb',
      host: 'localhost',
      port: 6379,
      name: 'supply_chain',
      connectTimeoutMs: 2000,
    },
    server: { port: 8000 },
    mcp: { allowedTools: [], blockedTools: [], audit: true },
    policy: { ...DEFAULT_POLICY },
  };
}

type DeepPartial<T> = { [K in keyof T]?: T[K] extends object ? (T[K] extends unknown[] ? T[K] : DeepPartial<T[K]>) : T[K] };

export type ConfigOverrides = DeepPartial<EngineConfig>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Protects against prototype pollution.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const sourceValue = source[key];
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function splitList(value: string | undefined): string[] | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  return trimmed.split(',').map((s) => s.trim()).filter(Boolean);
}

function parsePort(value: string | undefined): number | undefined {
  if (!value?.trim()) return undefined;
  const port = Number.parseInt(value, 10);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : undefined;
}

function parseBackend(value: string | undefined): GraphBackend | undefined {
  const v = value?.trim().toLowerCase();
  if (v === 'falkordb' || v === 'memory') return v;
  if (v) logger.warn({ value }, 'Unknown graph backend, keeping default');
  return undefined;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const dbPath = env.WCOPT_DB_PATH?.trim();
  const audit = env.WCOPT_MCP_AUDIT?.trim();
  return {
    tabular: { path: dbPath ? resolveUserPath(dbPath) : undefined },
    graph: {
      backend: parseBackend(env.WCOPT_GRAPH_BACKEND),
      host: env.FALKORDB_HOST?.trim() || undefined,
      port: parsePort(env.FALKORDB_PORT),
      name: env.WCOPT_GRAPH_NAME?.trim() || undefined,
    },
    server: { port: parsePort(env.WCOPT_PORT) },
    mcp: {
      allowedTools: splitList(env.WCOPT_MCP_ALLOWED_TOOLS),
      blockedTools: splitList(env.WCOPT_MCP_BLOCKED_TOOLS),
      audit: audit ? audit !== 'false' : undefined,
    },
  };
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    if (isPlainObject(parsed)) return parsed;
    logger.error({ configPath }, 'Config file must contain a JSON object');
  } catch (err) {
    logger.error({ configPath, err }, 'Failed to parse config file');
  }
  return {};
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}

function finite(value: unknown, fallback: number): number {
  const n = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(n) ? n : fallback;
}

/** Re-type a merged record, falling back to defaults for anything malformed. */
function normalize(merged: Record<string, unknown>, defaults: EngineConfig): EngineConfig {
  const section = (key: string): Record<string, unknown> => {
    const value = merged[key];
    return isPlainObject(value) ? value : {};
  };
  const tabular = section('tabular');
  const graph = section('graph');
  const server = section('server');
  const mcp = section('mcp');
  const policy = section('policy');

  const policyOut: PolicyDefaults = { ...defaults.policy };
  for (const key of POLICY_KEYS) {
    policyOut[key] = finite(policy[key], defaults.policy[key]);
  }

  const stringList = (value: unknown, fallback: string[]): string[] =>
    Array.isArray(value) ? value.map(String) : fallback;

  return {
    tabular: {
      path: typeof tabular.path === 'string' && tabular.path ? resolveUserPath(tabular.path) : defaults.tabular.path,
    },
    graph: {
      backend: parseBackend(typeof graph.backend === 'string' ? graph.backend : undefined) ?? defaults.graph.backend,
      host: typeof graph.host === 'string' && graph.host ? graph.host : defaults.graph.host,
      port: finite(graph.port, defaults.graph.port),
      name: typeof graph.name === 'string' && graph.name ? graph.name : defaults.graph.name,
      connectTimeoutMs: finite(graph.connectTimeoutMs, defaults.graph.connectTimeoutMs),
    },
    server: { port: finite(server.port, defaults.server.port) },
    mcp: {
      allowedTools: stringList(mcp.allowedTools, defaults.mcp.allowedTools),
      blockedTools: stringList(mcp.blockedTools, defaults.mcp.blockedTools),
      audit: typeof mcp.audit === 'boolean' ? mcp.audit : defaults.mcp.audit,
    },
    policy: policyOut,
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Explicit config file; defaults to WCOPT_CONFIG_PATH or ~/.wcopt/wcopt.json */
  configPath?: string;
  /** Applied last, after file and environment */
  overrides?: ConfigOverrides;
}

/**
 * Load configuration: defaults < config file < environment < explicit overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const env = options.env ?? process.env;
  const defaults = defaultConfig(env);
  const configPath = options.configPath ?? resolveConfigPath(env);

  let merged = toRecord(defaults);
  merged = deepMerge(merged, readConfigFile(configPath));
  merged = deepMerge(merged, toRecord(envOverrides(env)));
  if (options.overrides) merged = deepMerge(merged, toRecord(options.overrides));

  const config = normalize(merged, defaults);
  logger.debug({ tabular: config.tabular.path, graph: config.graph.backend }, 'Configuration loaded');
  return config;
}
