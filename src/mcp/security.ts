/**
 * MCP Security Layers
 *
 * Tool allowlisting and audit logging, driven by the mcp config section.
 * With both lists empty every tool is allowed.
 */

import type { McpConfig } from '../types';
import type { McpTool } from './index';

// =============================================================================
// CONFIG
// =============================================================================

export interface McpSecurityConfig {
  /** Empty = all allowed */
  allowedTools: Set<string>;
  blockedTools: Set<string>;
  auditEnabled: boolean;
}

export function securityConfigFrom(config: McpConfig): McpSecurityConfig {
  return {
    allowedTools: new Set(config.allowedTools),
    blockedTools: new Set(config.blockedTools),
    auditEnabled: config.audit,
  };
}

// =============================================================================
// TOOL ALLOWLISTING
// =============================================================================

/** Check whether a single tool name is allowed by the config */
export function isToolAllowed(toolName: string, config: McpSecurityConfig): boolean {
  // Blocklist always wins
  if (config.blockedTools.has(toolName)) return false;
  if (config.allowedTools.size > 0) {
    return config.allowedTools.has(toolName);
  }
  return true;
}

/** Filter a tools/list response to only include allowed tools */
export function filterTools(tools: McpTool[], config: McpSecurityConfig): McpTool[] {
  if (config.blockedTools.size === 0 && config.allowedTools.size === 0) return tools;
  return tools.filter((t) => isToolAllowed(t.name, config));
}

// =============================================================================
// AUDIT LOGGING
// =============================================================================

export interface AuditEntry {
  tool: string;
  timestamp: number;
  durationMs: number;
  /** Outcome status, or why the call never ran */
  status: string;
  error?: string;
}

export interface AuditSink {
  write(chunk: string): unknown;
}

/** Log a structured audit entry to stderr (stdout carries JSON-RPC) */
export function logAudit(entry: AuditEntry, config: McpSecurityConfig, sink: AuditSink = process.stderr): void {
  if (!config.auditEnabled) return;

  const record = {
    level: 'info',
    time: entry.timestamp,
    audit: true,
    tool: entry.tool,
    durationMs: entry.durationMs,
    status: entry.status,
    ...(entry.error ? { error: entry.error } : {}),
  };
  sink.write(JSON.stringify(record) + '\n');
}
