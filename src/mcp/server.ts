/**
 * MCP Server Mode - Expose the analysis catalogue as MCP tools via stdio
 *
 * Reads JSON-RPC from stdin, writes to stdout, logs to stderr.
 */

import { createInterface } from 'readline';
import type { EngineRuntime } from '../runtime';
import { getCatalogue } from '../analyses/catalogue';
import { runAnalysis } from '../analyses/runner';
import type { AnalysisRegistry } from '../analyses/registry';
import { getTemplate } from '../import';
import { DATASET_CATEGORIES } from '../db/datasets';
import { errorMessage, isInvalidInput } from '../infra/errors';
import { createLogger } from '../utils/logger';
import {
  MCP_PROTOCOL_VERSION,
  RPC_ERRORS,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpTool,
  type McpToolResult,
} from './index';
import { filterTools, isToolAllowed, logAudit, securityConfigFrom, type AuditSink, type McpSecurityConfig } from './security';

const logger = createLogger('mcp');

// =============================================================================
// HELPERS
// =============================================================================

function errorResponse(id: JsonRpcId | null, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

function textResult(payload: unknown, isError = false): McpToolResult {
  const result: McpToolResult = { content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }] };
  if (isError) result.isError = true;
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRpcId(value: unknown): value is JsonRpcId {
  return typeof value === 'string' || typeof value === 'number';
}

const TEMPLATE_TOOL: McpTool = {
  name: 'get_dataset_template',
  description: 'Required columns, optional columns and an example row for a dataset category.',
  inputSchema: {
    type: 'object',
    properties: { category: { type: 'string', description: 'Dataset category', enum: DATASET_CATEGORIES } },
    required: ['category'],
  },
};

// =============================================================================
// SERVER
// =============================================================================

export interface McpServerOptions {
  registry?: AnalysisRegistry;
  auditSink?: AuditSink;
  version?: string;
}

export class McpServer {
  private readonly registry: AnalysisRegistry;
  private readonly security: McpSecurityConfig;
  private readonly auditSink: AuditSink | undefined;
  private readonly version: string;

  constructor(private readonly runtime: EngineRuntime, options: McpServerOptions = {}) {
    this.registry = options.registry ?? getCatalogue();
    this.security = securityConfigFrom(runtime.config.mcp);
    this.auditSink = options.auditSink;
    this.version = options.version ?? '0.1.0';
  }

  listTools(): McpTool[] {
    const tools: McpTool[] = this.registry.list().map((analysis) => ({
      name: analysis.name,
      description: analysis.description,
      inputSchema: analysis.input_schema,
    }));
    tools.push(TEMPLATE_TOOL);
    return filterTools(tools, this.security);
  }

  private async callTool(name: string, args: Record<string, unknown>): Promise<{ result: McpToolResult; status: string }> {
    if (name === TEMPLATE_TOOL.name) {
      try {
        return { result: textResult(getTemplate(String(args.category ?? ''))), status: 'ok' };
      } catch (err) {
        if (!isInvalidInput(err)) throw err;
        return { result: textResult({ status: 'invalid_input', message: err.message }, true), status: 'invalid_input' };
      }
    }

    const outcome = await runAnalysis(this.runtime, name, args, this.registry);
    const isError = outcome.status === 'invalid_input' || outcome.status === 'failure';
    return { result: textResult(outcome, isError), status: outcome.status };
  }

  private audit(tool: string, start: number, status: string, error?: string): void {
    logAudit({ tool, timestamp: start, durationMs: Date.now() - start, status, error }, this.security, this.auditSink);
  }

  /** Handle one request; null for notifications */
  async handleRequest(req: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const id = req.id ?? null;

    switch (req.method) {
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: { name: 'wc-optimizer', version: this.version },
          },
        };

      case 'notifications/initialized':
        return null;

      case 'tools/list':
        return { jsonrpc: '2.0', id, result: { tools: this.listTools() } };

      case 'tools/call': {
        const params = req.params ?? {};
        const toolName = params.name;
        if (typeof toolName !== 'string' || !toolName) {
          return errorResponse(id, RPC_ERRORS.INVALID_PARAMS, 'Missing tool name');
        }
        const toolArgs = isRecord(params.arguments) ? params.arguments : {};
        const start = Date.now();

        if (!isToolAllowed(toolName, this.security)) {
          this.audit(toolName, start, 'blocked');
          return errorResponse(id, RPC_ERRORS.INVALID_REQUEST, `Tool not allowed: ${toolName}`);
        }
        if (toolName !== TEMPLATE_TOOL.name && !this.registry.has(toolName)) {
          this.audit(toolName, start, 'unknown_tool');
          return errorResponse(id, RPC_ERRORS.INVALID_PARAMS, `Unknown tool: ${toolName}`);
        }

        try {
          const { result, status } = await this.callTool(toolName, toolArgs);
          this.audit(toolName, start, status);
          return { jsonrpc: '2.0', id, result };
        } catch (err) {
          const message = errorMessage(err);
          this.audit(toolName, start, 'failure', message);
          return errorResponse(id, RPC_ERRORS.INTERNAL_ERROR, message || 'Tool execution failed');
        }
      }

      default:
        if (req.id === undefined) return null;
        return errorResponse(id, RPC_ERRORS.METHOD_NOT_FOUND, `Method not found: ${req.method}`);
    }
  }

  /** Parse and handle one line of input */
  async handleLine(line: string): Promise<JsonRpcResponse | null> {
    const trimmed = line.trim();
    if (!trimmed) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      return errorResponse(null, RPC_ERRORS.PARSE_ERROR, 'Parse error');
    }

    if (!isRecord(parsed) || parsed.jsonrpc !== '2.0' || typeof parsed.method !== 'string') {
      const id = isRecord(parsed) && isRpcId(parsed.id) ? parsed.id : null;
      return errorResponse(id, RPC_ERRORS.INVALID_REQUEST, 'Invalid Request: missing jsonrpc "2.0" or method');
    }

    const req: JsonRpcRequest = {
      jsonrpc: '2.0',
      method: parsed.method,
      id: isRpcId(parsed.id) ? parsed.id : undefined,
      params: isRecord(parsed.params) ? parsed.params : undefined,
    };

    try {
      return await this.handleRequest(req);
    } catch (err) {
      return errorResponse(req.id ?? null, RPC_ERRORS.INTERNAL_ERROR, errorMessage(err) || 'Internal error');
    }
  }
}

// =============================================================================
// STDIO TRANSPORT
// =============================================================================

/** Serve until stdin closes */
export function startMcpServer(runtime: EngineRuntime, options: McpServerOptions = {}): Promise<void> {
  const server = new McpServer(runtime, options);
  const rl = createInterface({ input: process.stdin, terminal: false });
  let pending = Promise.resolve();

  rl.on('line', (line) => {
    // answer in arrival order
    pending = pending
      .then(() => server.handleLine(line))
      .then((response) => {
        if (response) process.stdout.write(JSON.stringify(response) + '\n');
      })
      .catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, 'Failed to answer MCP request');
      });
  });

  logger.info({ tools: server.listTools().length }, 'MCP server started (stdio)');

  return new Promise((resolve) => {
    rl.on('close', () => {
      pending.then(resolve, resolve);
    });
  });
}
