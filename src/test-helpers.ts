/**
 * Shared fixtures for tests: an in-memory runtime and CSV builders
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { loadConfig, type ConfigOverrides } from './utils/config';
import { createRuntime, type EngineRuntime } from './runtime';
import { MemoryGraphStore } from './graph/memory';
import { uploadDataset } from './import';
import type { UploadResult } from './import/types';
import type { EngineConfig } from './types';

export const TEST_NOW = new Date('2024-06-30T12:00:00Z');

export function testConfig(overrides: ConfigOverrides = {}): EngineConfig {
  return loadConfig({
    env: {},
    configPath: join(tmpdir(), 'wcopt-test-absent', 'wcopt.json'),
    overrides: {
      ...overrides,
      tabular: { path: ':memory:' },
      graph: { ...overrides.graph, backend: 'memory' },
    },
  });
}

export interface TestRuntime {
  runtime: EngineRuntime;
  graph: MemoryGraphStore;
}

export function createTestRuntime(overrides: ConfigOverrides = {}): TestRuntime {
  const graph = new MemoryGraphStore();
  const runtime = createRuntime(testConfig(overrides), { graph, now: () => TEST_NOW });
  return { runtime, graph };
}

/** Join header and rows into CSV text */
export function csv(lines: string[]): string {
  return lines.join('\n') + '\n';
}

export function upload(runtime: EngineRuntime, category: string, lines: string[]): Promise<UploadResult> {
  return uploadDataset(runtime, category, `${category}.csv`, csv(lines));
}
