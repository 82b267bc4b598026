/**
 * Budgeted prompt selector
 *
 * Picks the subset of modules with the highest total impact whose content
 * fits a byte budget. Small problems are solved exactly on a discretized
 * capacity grid; larger ones fall back to an impact-per-byte greedy pass.
 */

import type { SelectedModule, SelectionResult, SelectionStrategy } from '../types/index.js';
import type { DependencyGraph } from '../graph/dependency-graph.js';
import { compareIds } from '../graph/dependency-graph.js';
import {
  assertValidSize,
  DEFAULT_CONTENT_BUDGET,
  discretize,
  estimateTokens,
  resolveBudget,
  type ContentBudget,
} from './budget.js';
import { solveExact, solveGreedy, type KnapsackItem } from './knapsack.js';

export * from './budget.js';
export * from './knapsack.js';

export interface SelectableModule extends KnapsackItem {
  files: readonly string[];
}

export interface SelectorOptions extends Partial<ContentBudget> {
  /** Explicit byte budget; overrides maxContentLength × budgetPercent */
  budget?: number;
  /** Upper bound on the capacity grid of the exact solver */
  maxCapacityUnits?: number;
  /** Largest items × capacity table the exact solver may allocate */
  maxDpCells?: number;
  /** Per-file sizes, used to size the union of selected files */
  fileSizes?: ReadonlyMap<string, number>;
}

export const DEFAULT_MAX_CAPACITY_UNITS = 10_000;
export const DEFAULT_MAX_DP_CELLS = 4_000_000;

export function selectModules(modules: readonly SelectableModule[], options: SelectorOptions = {}): SelectionResult {
  const budget = resolveBudget(options.budget, {
    maxContentLength: options.maxContentLength ?? DEFAULT_CONTENT_BUDGET.maxContentLength,
    budgetPercent: options.budgetPercent ?? DEFAULT_CONTENT_BUDGET.budgetPercent,
  });

  for (const entry of modules) {
    assertValidSize(entry.id, entry.size);
  }

  const items = [...modules].sort((a, b) => compareIds(a.id, b.id));
  const totalSize = items.reduce((sum, item) => sum + item.size, 0);

  if (totalSize <= budget) {
    return toResult(items, budget, 'all', options.fileSizes);
  }

  const eligible = items.filter(item => item.size <= budget);
  const { scale, capacity } = discretize(budget, options.maxCapacityUnits ?? DEFAULT_MAX_CAPACITY_UNITS);
  const cells = eligible.length * (capacity + 1);

  if (cells <= (options.maxDpCells ?? DEFAULT_MAX_DP_CELLS)) {
    const weights = eligible.map(item => Math.ceil(item.size / scale));
    const chosen = solveExact(eligible, weights, capacity);
    return toResult(chosen, budget, 'exact', options.fileSizes);
  }

  return toResult(solveGreedy(eligible, budget), budget, 'greedy', options.fileSizes);
}

/**
 * Every module of a graph as a selector item
 */
export function selectableModules(graph: DependencyGraph): SelectableModule[] {
  return graph.modules().map(node => ({ id: node.id, size: node.size, impact: node.impact, files: node.files }));
}

function toResult(
  chosen: readonly SelectableModule[],
  budget: number,
  strategy: SelectionStrategy,
  fileSizes?: ReadonlyMap<string, number>
): SelectionResult {
  const modules: SelectedModule[] = chosen
    .map(item => ({ id: item.id, size: item.size, impact: item.impact }))
    .sort((a, b) => b.impact - a.impact || compareIds(a.id, b.id));

  const files = Array.from(new Set(chosen.flatMap(item => item.files))).sort(compareIds);
  // Folder-modules may share files with file modules; count each file once
  const totalSize = fileSizes
    ? files.reduce((sum, file) => sum + (fileSizes.get(file) ?? 0), 0)
    : chosen.reduce((sum, item) => sum + item.size, 0);

  return {
    modules,
    files,
    totalSize,
    totalImpact: chosen.reduce((sum, item) => sum + item.impact, 0),
    budget,
    strategy,
    estimatedTokens: estimateTokens(totalSize),
  };
}
