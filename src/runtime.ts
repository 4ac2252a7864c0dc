/**
 * Engine runtime - the stores, config and clock every entry point shares
 */

import { createTabularStore, type TabularStore } from './db';
import { createGraphStore, type GraphStore } from './graph';
import { createLogger } from './utils/logger';
import { errorMessage } from './infra/errors';
import type { EngineConfig } from './types';

const logger = createLogger('runtime');

export interface EngineRuntime {
  readonly config: EngineConfig;
  readonly tabular: TabularStore;
  readonly graph: GraphStore;
  now: () => Date;
}

export interface RuntimeDeps {
  tabular?: TabularStore;
  graph?: GraphStore;
  now?: () => Date;
}

export function createRuntime(config: EngineConfig, deps: RuntimeDeps = {}): EngineRuntime {
  return {
    config,
    tabular: deps.tabular ?? createTabularStore(config.tabular),
    graph: deps.graph ?? createGraphStore(config.graph),
    now: deps.now ?? (() => new Date()),
  };
}

export async function shutdownRuntime(runtime: EngineRuntime): Promise<void> {
  try {
    await runtime.graph.shutdown();
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, 'Graph store shutdown failed');
  }
  await runtime.tabular.close();
}
