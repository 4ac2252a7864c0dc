/**
 * HTTP Server - the analysis catalogue, uploads and store housekeeping over REST
 *
 * Middleware:
 * - Security headers (nosniff, DENY)
 * - Request logging (method, path, status, duration)
 * - Error-handling middleware
 *
 * Outcome statuses map to HTTP: ok / insufficient_data / not_found 200,
 * invalid_input 400, failure 500.
 */

import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { createLogger } from '../utils/logger';
import { InvalidInputError, errorMessage, isInvalidInput } from '../infra/errors';
import type { EngineRuntime } from '../runtime';
import { getCatalogue } from '../analyses/catalogue';
import { runAnalysis } from '../analyses/runner';
import type { AnalysisRegistry } from '../analyses/registry';
import type { AnalysisCategory, AnalysisOutcome } from '../analyses/types';
import { getTemplate, resetAllData, templateCsv, uploadDataset } from '../import';
import { listDatasetTemplates } from '../db/datasets';

const logger = createLogger('server');

// =============================================================================
// CONFIG TYPES
// =============================================================================

export interface ServerConfig {
  port: number;
  /** Defaults to 0.0.0.0 */
  host?: string;
  /** Largest accepted upload body. Defaults to 50mb. */
  uploadLimit?: string;
}

export interface GatewayServer {
  app: express.Express;
  server: http.Server;
  /** Resolves with the bound port */
  start(): Promise<number>;
  stop(): Promise<void>;
}

// =============================================================================
// HELPERS
// =============================================================================

export function httpStatusFor(outcome: AnalysisOutcome): number {
  switch (outcome.status) {
    case 'invalid_input':
      return 400;
    case 'failure':
      return 500;
    default:
      return 200;
  }
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error middleware */
function route(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function queryString(req: Request, key: string): string | undefined {
  const value = req.query[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

const ANALYSIS_CATEGORIES: readonly AnalysisCategory[] = ['kpi', 'inventory', 'demand', 'supplier', 'data'];

function parseCategory(value: string | undefined): AnalysisCategory | undefined {
  if (value === undefined) return undefined;
  const match = ANALYSIS_CATEGORIES.find((c) => c === value);
  if (!match) {
    throw new InvalidInputError(`category must be one of: ${ANALYSIS_CATEGORIES.join(', ')}`, 'category');
  }
  return match;
}

function statusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const status = err.status ?? err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : undefined;
}

// =============================================================================
// SERVER FACTORY
// =============================================================================

export function createServer(
  runtime: EngineRuntime,
  config: ServerConfig,
  registry: AnalysisRegistry = getCatalogue(),
): GatewayServer {
  const app = express();

  // ---------------------------------------------------------------------------
  // 1. Security headers
  // ---------------------------------------------------------------------------
  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    next();
  });

  // ---------------------------------------------------------------------------
  // 2. Request logging
  // ---------------------------------------------------------------------------
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const duration = Date.now() - start;
      const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
      logger[level](
        { method: req.method, path: req.path, status: res.statusCode, duration },
        '%s %s %d %dms',
        req.method,
        req.path,
        res.statusCode,
        duration,
      );
    });
    next();
  });

  const json = express.json({ limit: '1mb' });
  const text = express.text({ type: () => true, limit: config.uploadLimit ?? '50mb' });

  // ---------------------------------------------------------------------------
  // Health check
  // ---------------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      tabular: runtime.tabular.location,
      graph: runtime.graph.backend,
      analyses: registry.size(),
    });
  });

  // ---------------------------------------------------------------------------
  // Analysis catalogue
  // ---------------------------------------------------------------------------
  app.get('/api/analytics', (req: Request, res: Response) => {
    const analyses = registry.search({ category: parseCategory(queryString(req, 'category')), query: queryString(req, 'q') });
    res.json({
      count: analyses.length,
      analyses: analyses.map((a) => ({
        name: a.name,
        category: a.category,
        description: a.description,
        tags: a.tags,
        requires: a.requires ?? null,
        dynamicRequirement: a.dynamicRequirement,
        input_schema: a.input_schema,
      })),
    });
  });

  app.post(
    '/api/analytics/:name',
    json,
    route(async (req, res) => {
      const params = isRecord(req.body) ? req.body : {};
      const outcome = await runAnalysis(runtime, req.params.name, params, registry);
      res.status(httpStatusFor(outcome)).json(outcome);
    }),
  );

  app.post(
    '/api/query',
    json,
    route(async (req, res) => {
      const sql = isRecord(req.body) ? req.body.sql : undefined;
      const outcome = await runAnalysis(runtime, 'run_sql_query', { sql }, registry);
      res.status(httpStatusFor(outcome)).json(outcome);
    }),
  );

  // ---------------------------------------------------------------------------
  // Files and templates
  // ---------------------------------------------------------------------------
  app.post(
    '/api/files/upload',
    text,
    route(async (req, res) => {
      const category = queryString(req, 'category');
      if (!category) throw new InvalidInputError('category query parameter is required', 'category');
      if (typeof req.body !== 'string' || req.body.trim() === '') {
        throw new InvalidInputError('Request body must contain the CSV text');
      }
      const result = await uploadDataset(runtime, category, queryString(req, 'filename') ?? null, req.body);
      res.status(201).json(result);
    }),
  );

  app.get(
    '/api/files/status',
    route(async (_req, res) => {
      const outcome = await runAnalysis(runtime, 'list_uploads', {}, registry);
      res.status(httpStatusFor(outcome)).json(outcome);
    }),
  );

  app.get('/api/templates', (_req: Request, res: Response) => {
    res.json({ templates: listDatasetTemplates() });
  });

  app.get('/api/templates/:category', (req: Request, res: Response) => {
    if (queryString(req, 'format') === 'csv') {
      const csv = templateCsv(req.params.category);
      res.type('text/csv').attachment(`${req.params.category}_template.csv`).send(csv);
      return;
    }
    res.json(getTemplate(req.params.category));
  });

  // ---------------------------------------------------------------------------
  // Database
  // ---------------------------------------------------------------------------
  app.get(
    '/api/database/status',
    route(async (_req, res) => {
      const outcome = await runAnalysis(runtime, 'trigger_database_refresh', {}, registry);
      res.status(httpStatusFor(outcome)).json(outcome);
    }),
  );

  app.post(
    '/api/database/reset',
    route(async (_req, res) => {
      res.json(await resetAllData(runtime));
    }),
  );

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  // ---------------------------------------------------------------------------
  // 3. Error-handling middleware (must be last middleware)
  // ---------------------------------------------------------------------------
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (res.headersSent) return;

    if (isInvalidInput(err)) {
      res.status(400).json({ status: 'invalid_input', message: err.message });
      return;
    }

    const status = statusOf(err) ?? 500;
    const message = errorMessage(err);
    if (status >= 500) {
      logger.error({ err: message, method: req.method, path: req.path }, 'Unhandled error in request handler');
    }
    res.status(status).json({ status: status >= 500 ? 'failure' : 'invalid_input', message });
  });

  const server = http.createServer(app);

  return {
    app,
    server,
    start(): Promise<number> {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host ?? '0.0.0.0', () => {
          const address = server.address();
          const port = typeof address === 'object' && address !== null ? address.port : config.port;
          logger.info({ port }, 'Server started');
          resolve(port);
        });
      });
    },
    stop(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info('Server stopped');
          resolve();
        });
      });
    },
  };
}
