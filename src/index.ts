/**
 * wc-optimizer — working-capital and supply-chain analytics
 *
 * Library entry point. The CLI (src/cli) wires these pieces into the HTTP
 * API and the MCP server.
 */

export { loadConfig, loadEnvFiles, defaultConfig, DEFAULT_POLICY, type ConfigOverrides, type LoadConfigOptions } from './utils/config';
export { createLogger, type Logger } from './utils/logger';
export {
  InvalidInputError,
  StoreError,
  TabularStoreError,
  GraphUnavailableError,
  errorMessage,
  isInvalidInput,
  isStoreError,
} from './infra/errors';
export type { EngineConfig, PolicyDefaults, TabularConfig, GraphConfig, GraphBackend, McpConfig } from './types';

export { createRuntime, shutdownRuntime, type EngineRuntime, type RuntimeDeps } from './runtime';
export { createTabularStore, withTabular, SqliteTabularStore, type TabularHandle, type TabularStore } from './db';
export { DATASET_CATEGORIES, isDatasetCategory, listDatasetTemplates, type DatasetCategory, type DatasetTemplate } from './db/datasets';
export { createGraphStore, withGraph, FalkorGraphStore, MemoryGraphStore, type GraphStore, type GraphSession } from './graph';
export { resolveAvailability, insufficientData, datasetStatus, gate, probe } from './availability';

export { runAnalysis } from './analyses/runner';
export { getCatalogue, buildCatalogue } from './analyses/catalogue';
export { AnalysisRegistry, defineAnalysis, type RegisteredAnalysis } from './analyses/registry';
export type { AnalysisOutcome, AnalysisResult, AnalysisCategory, Requirement } from './analyses/types';

export { uploadDataset, resetAllData, getTemplate, templateCsv, parseCsv, type UploadResult, type ResetResult } from './import';
export { createGateway, createServer, httpStatusFor, type Gateway } from './gateway';
export { McpServer, startMcpServer } from './mcp';
