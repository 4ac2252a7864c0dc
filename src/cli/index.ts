#!/usr/bin/env node
/**
 * wcopt CLI
 *
 * Commands:
 * - wcopt serve                      — Start the HTTP API
 * - wcopt mcp                        — Serve analyses as MCP tools over stdio
 * - wcopt upload <category> <file>   — Load a CSV dataset
 * - wcopt run <analysis>             — Run one analysis
 * - wcopt query <sql>                — Read-only SQL
 * - wcopt list                       — List analyses
 * - wcopt template <category>        — Dataset template
 * - wcopt status                     — Dataset and graph status
 * - wcopt reset                      — Drop every dataset and clear the graph
 *
 * Results are printed to stdout as JSON; logs go to stderr.
 */

import { readFileSync, existsSync } from 'fs';
import { basename, resolve } from 'path';
import { Command } from 'commander';
import { loadConfig, loadEnvFiles } from '../utils/config';
import { logger } from '../utils/logger';
import { setupShutdownHandlers } from '../utils/shutdown';
import { errorMessage, isInvalidInput } from '../infra/errors';
import { createRuntime, shutdownRuntime, type EngineRuntime } from '../runtime';
import { createGateway } from '../gateway';
import { startMcpServer } from '../mcp';
import { runAnalysis } from '../analyses/runner';
import { getCatalogue } from '../analyses/catalogue';
import type { AnalysisCategory, AnalysisOutcome } from '../analyses/types';
import { getTemplate, resetAllData, templateCsv, uploadDataset, type Delimiter } from '../import';

loadEnvFiles();

const program = new Command();

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

program
  .name('wcopt')
  .description('Working-capital and supply-chain analytics over uploaded CSV datasets')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (defaults to ~/.wcopt/wcopt.json)');

// ============================================================================
// Helpers
// ============================================================================

function print(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

function configPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config ? resolve(opts.config) : undefined;
}

/** Run fn against a fresh runtime that is shut down afterwards */
async function withRuntime<T>(fn: (runtime: EngineRuntime) => Promise<T>): Promise<T> {
  const runtime = createRuntime(loadConfig({ configPath: configPath() }));
  try {
    return await fn(runtime);
  } finally {
    await shutdownRuntime(runtime);
  }
}

function printOutcome(outcome: AnalysisOutcome): void {
  print(outcome);
  if (outcome.status === 'invalid_input' || outcome.status === 'failure') {
    process.exitCode = 1;
  }
}

function parseParams(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return fail(`--params is not valid JSON: ${errorMessage(err)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return fail('--params must be a JSON object');
  }
  return Object.fromEntries(Object.entries(parsed));
}

// ============================================================================
// serve — Start the HTTP API
// ============================================================================
program
  .command('serve')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Override the server port')
  .action(async (options: { port?: string }) => {
    const port = options.port ? Number.parseInt(options.port, 10) : undefined;
    const config = loadConfig({ configPath: configPath(), overrides: port ? { server: { port } } : undefined });
    const gateway = createGateway(config);
    await gateway.start();
    setupShutdownHandlers(() => gateway.stop());
  });

// ============================================================================
// mcp — MCP stdio server
// ============================================================================
program
  .command('mcp')
  .description('Serve the analyses as MCP tools over stdio')
  .action(async () => {
    const runtime = createRuntime(loadConfig({ configPath: configPath() }));
    setupShutdownHandlers(() => shutdownRuntime(runtime));
    await startMcpServer(runtime);
    await shutdownRuntime(runtime);
  });

// ============================================================================
// upload — Load a dataset
// ============================================================================
program
  .command('upload')
  .argument('<category>', 'Dataset category, e.g. products or purchase_orders')
  .argument('<file>', 'CSV file')
  .option('-d, --delimiter <delimiter>', 'auto, comma, tab or pipe', 'auto')
  .description('Upload a CSV file, replacing the category table')
  .action(async (category: string, file: string, options: { delimiter: string }) => {
    const filePath = resolve(file);
    if (!existsSync(filePath)) fail(`File not found: ${filePath}`);

    const delimiters: readonly Delimiter[] = ['auto', 'comma', 'tab', 'pipe'];
    const delimiter = delimiters.find((d) => d === options.delimiter);
    if (!delimiter) fail(`--delimiter must be one of: ${delimiters.join(', ')}`);

    const csv = readFileSync(filePath, 'utf-8');
    try {
      print(await withRuntime((runtime) => uploadDataset(runtime, category, basename(filePath), csv, { delimiter })));
    } catch (err) {
      if (isInvalidInput(err)) fail(err.message);
      throw err;
    }
  });

// ============================================================================
// run — Run one analysis
// ============================================================================
program
  .command('run')
  .argument('<analysis>', 'Analysis name (see `wcopt list`)')
  .option('--params <json>', 'Parameters as a JSON object')
  .description('Run an analysis and print its outcome')
  .action(async (analysis: string, options: { params?: string }) => {
    const params = parseParams(options.params);
    printOutcome(await withRuntime((runtime) => runAnalysis(runtime, analysis, params)));
  });

// ============================================================================
// query — Read-only SQL
// ============================================================================
program
  .command('query')
  .argument('<sql>', 'SELECT statement')
  .description('Run a read-only SQL query against the uploaded tables')
  .action(async (sql: string) => {
    printOutcome(await withRuntime((runtime) => runAnalysis(runtime, 'run_sql_query', { sql })));
  });

// ============================================================================
// list — Analysis catalogue
// ============================================================================
program
  .command('list')
  .option('--category <category>', 'kpi, inventory, demand, supplier or data')
  .option('-q, --query <text>', 'Search names, tags and descriptions')
  .description('List the available analyses')
  .action((options: { category?: string; query?: string }) => {
    const categories: readonly AnalysisCategory[] = ['kpi', 'inventory', 'demand', 'supplier', 'data'];
    const category = options.category === undefined ? undefined : categories.find((c) => c === options.category);
    if (options.category !== undefined && !category) fail(`--category must be one of: ${categories.join(', ')}`);

    const analyses = getCatalogue().search({ category, query: options.query });
    for (const a of analyses) {
      process.stdout.write(`${a.name.padEnd(36)} ${a.category.padEnd(10)} ${a.description}\n`);
    }
  });

// ============================================================================
// template — Dataset template
// ============================================================================
program
  .command('template')
  .argument('<category>', 'Dataset category')
  .option('--csv', 'Print a CSV header and example row')
  .description('Show the columns a dataset upload expects')
  .action((category: string, options: { csv?: boolean }) => {
    try {
      if (options.csv) process.stdout.write(templateCsv(category));
      else print(getTemplate(category));
    } catch (err) {
      if (isInvalidInput(err)) fail(err.message);
      throw err;
    }
  });

// ============================================================================
// status — Stores
// ============================================================================
program
  .command('status')
  .description('Show dataset row counts and graph store status')
  .action(async () => {
    printOutcome(await withRuntime((runtime) => runAnalysis(runtime, 'trigger_database_refresh')));
  });

// ============================================================================
// reset — Drop everything
// ============================================================================
program
  .command('reset')
  .option('-y, --yes', 'Confirm dropping every dataset')
  .description('Drop every dataset table and clear the graph')
  .action(async (options: { yes?: boolean }) => {
    if (!options.yes) fail('Refusing to reset without --yes');
    print(await withRuntime((runtime) => resetAllData(runtime)));
  });

program.parseAsync().catch((err: unknown) => {
  logger.error({ err: errorMessage(err) }, 'Command failed');
  process.exit(1);
});
