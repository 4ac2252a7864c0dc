/**
 * The analysis catalogue: every engine's analyses in one registry
 */

import { metricsAnalyses } from '../metrics';
import { inventoryAnalyses } from '../inventory';
import { analyticsAnalyses } from '../analytics';
import { supplyChainAnalyses } from '../supply-chain';
import { queryAnalyses } from '../query';
import { AnalysisRegistry } from './registry';

let catalogue: AnalysisRegistry | null = null;

export function buildCatalogue(): AnalysisRegistry {
  const registry = new AnalysisRegistry();
  registry.registerAll(metricsAnalyses);
  registry.registerAll(inventoryAnalyses);
  registry.registerAll(analyticsAnalyses);
  registry.registerAll(supplyChainAnalyses);
  registry.registerAll(queryAnalyses);
  return registry;
}

export function getCatalogue(): AnalysisRegistry {
  if (!catalogue) catalogue = buildCatalogue();
  return catalogue;
}
