/**
 * Analysis runner - resolves a name against the catalogue, validates input,
 * gates on dataset availability and maps every exit to an AnalysisOutcome.
 */

import { withTabular } from '../db';
import { gate } from '../availability';
import { createLogger } from '../utils/logger';
import { errorMessage, isInvalidInput, isStoreError } from '../infra/errors';
import type { EngineRuntime } from '../runtime';
import { getCatalogue } from './catalogue';
import type { AnalysisRegistry, PreparedAnalysis } from './registry';
import type { AnalysisOutcome } from './types';

const logger = createLogger('analyses');

export async function runAnalysis(
  runtime: EngineRuntime,
  name: string,
  input: Record<string, unknown> = {},
  registry: AnalysisRegistry = getCatalogue(),
): Promise<AnalysisOutcome> {
  const analysis = registry.get(name);
  if (!analysis) {
    return { status: 'invalid_input', analysis: name, message: `Unknown analysis: ${name}` };
  }

  let prepared: PreparedAnalysis;
  try {
    prepared = analysis.prepare(input, runtime.config.policy);
  } catch (err) {
    if (isInvalidInput(err)) {
      return { status: 'invalid_input', analysis: name, message: err.message };
    }
    throw err;
  }

  const started = Date.now();
  try {
    const result = await withTabular(runtime.tabular, async (db) => {
      if (prepared.requirement) {
        const blocked = gate(db, prepared.requirement);
        if (blocked) return blocked;
      }
      return prepared.run({ db, graph: runtime.graph, policy: runtime.config.policy, now: runtime.now });
    });

    logger.debug({ analysis: name, status: result.status, ms: Date.now() - started }, 'Analysis finished');

    switch (result.status) {
      case 'ok':
        return { status: 'ok', analysis: name, data: result.data };
      case 'insufficient_data':
        return { status: 'insufficient_data', analysis: name, message: result.message, missing: result.missing };
      case 'not_found':
        return { status: 'not_found', analysis: name, message: result.message };
    }
  } catch (err) {
    if (isInvalidInput(err)) {
      return { status: 'invalid_input', analysis: name, message: err.message };
    }
    const message = errorMessage(err);
    logger.error({ analysis: name, err: message, store: isStoreError(err) ? err.store : undefined }, 'Analysis failed');
    return { status: 'failure', analysis: name, message };
  }
}
