/**
 * MCP (Model Context Protocol) - analyses as tools over stdio
 *
 * Features:
 * - JSON-RPC 2.0 transport (newline-delimited, stdio)
 * - initialize, tools/list, tools/call
 * - Tool allow/block lists and an audit trail on stderr
 */

// =============================================================================
// MCP PROTOCOL TYPES
// =============================================================================

export type JsonRpcId = string | number;

/** JSON-RPC 2.0 Request */
export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

/** JSON-RPC 2.0 Response */
export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcError;
}

/** JSON-RPC 2.0 Error */
export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/** Standard JSON-RPC error codes */
export const RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
} as const;

/** JSON Schema for tool inputs */
export interface JsonSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: readonly string[];
}

/** MCP Tool Definition */
export interface McpTool {
  name: string;
  description?: string;
  inputSchema: JsonSchema;
}

/** MCP Content */
export interface McpContent {
  type: 'text';
  text: string;
}

/** MCP Tool Call Result */
export interface McpToolResult {
  content: McpContent[];
  isError?: boolean;
}

export const MCP_PROTOCOL_VERSION = '2024-11-05';

export { McpServer, startMcpServer } from './server';
export { isToolAllowed, filterTools, logAudit, securityConfigFrom, type McpSecurityConfig, type AuditEntry } from './security';
