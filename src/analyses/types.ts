/**
 * Analysis catalogue types
 */

import type { DatasetCategory } from '../db/datasets';
import type { TabularHandle } from '../db';
import type { GraphStore } from '../graph/types';
import type { PolicyDefaults } from '../types';

// =============================================================================
// RESULTS
// =============================================================================

export interface Ok<T> {
  status: 'ok';
  data: T;
}

/** A required dataset is absent. Message only, never numeric fields. */
export interface InsufficientData {
  status: 'insufficient_data';
  message: string;
  missing: DatasetCategory[];
}

export interface NotFound {
  status: 'not_found';
  message: string;
}

export type AnalysisResult<T> = Ok<T> | InsufficientData | NotFound;

export function ok<T>(data: T): Ok<T> {
  return { status: 'ok', data };
}

export function notFound(message: string): NotFound {
  return { status: 'not_found', message };
}

/** What callers of runAnalysis receive */
export type AnalysisOutcome =
  | { status: 'ok'; analysis: string; data: unknown }
  | { status: 'insufficient_data'; analysis: string; message: string; missing: DatasetCategory[] }
  | { status: 'not_found'; analysis: string; message: string }
  | { status: 'invalid_input'; analysis: string; message: string }
  | { status: 'failure'; analysis: string; message: string };

export type OutcomeStatus = AnalysisOutcome['status'];

// =============================================================================
// DEFINITIONS
// =============================================================================

export type AnalysisCategory = 'kpi' | 'inventory' | 'demand' | 'supplier' | 'data';

/** Dataset gate: every `all` category, plus at least one of `any` when given */
export interface Requirement {
  all: DatasetCategory[];
  any?: DatasetCategory[];
}

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array';
  description: string;
  default?: string | number | boolean;
  enum?: readonly string[];
  items?: { type: 'string' };
  minimum?: number;
  maximum?: number;
}

export interface InputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: readonly string[];
}

/** Everything an analysis may touch while it runs */
export interface AnalysisContext {
  db: TabularHandle;
  graph: GraphStore;
  policy: PolicyDefaults;
  now: () => Date;
}

export interface AnalysisDefinition<P, R> {
  name: string;
  category: AnalysisCategory;
  description: string;
  /** Omitted for composite analyses that degrade field by field */
  requires?: Requirement;
  input_schema: InputSchema;
  tags?: string[];
  /** Validate raw input; throws InvalidInputError */
  parse(input: Record<string, unknown>, policy: PolicyDefaults): P;
  run(ctx: AnalysisContext, params: P): AnalysisResult<R> | Promise<AnalysisResult<R>>;
}
