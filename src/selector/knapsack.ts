/**
 * 0/1 knapsack solvers over modules: value is impact, weight is size.
 */

import { compareIds } from '../graph/dependency-graph.js';

export interface KnapsackItem {
  id: string;
  /** Bytes */
  size: number;
  impact: number;
}

/**
 * Exact dynamic programme over integer weights.
 *
 * `table[i * (capacity + 1) + c]` holds the best value reachable with items
 * i..n-1 and capacity c. Items are walked in the order given; reconstruction
 * takes an item whenever the optimum allows it, so earlier items win ties.
 */
export function solveExact<T extends KnapsackItem>(items: readonly T[], weights: readonly number[], capacity: number): T[] {
  const n = items.length;
  const width = capacity + 1;
  const table = new Float64Array((n + 1) * width);

  for (let i = n - 1; i >= 0; i--) {
    const weight = weights[i] ?? 0;
    const value = items[i]?.impact ?? 0;
    const row = i * width;
    const next = (i + 1) * width;
    for (let c = 0; c <= capacity; c++) {
      const skip = table[next + c] ?? 0;
      const take = weight <= c ? value + (table[next + c - weight] ?? 0) : -Infinity;
      table[row + c] = Math.max(skip, take);
    }
  }

  const chosen: T[] = [];
  let remaining = capacity;
  for (let i = 0; i < n; i++) {
    const item = items[i];
    const weight = weights[i] ?? 0;
    if (!item || weight > remaining) continue;
    const best = table[i * width + remaining] ?? 0;
    const withItem = item.impact + (table[(i + 1) * width + remaining - weight] ?? 0);
    if (best === withItem) {
      chosen.push(item);
      remaining -= weight;
    }
  }

  return chosen;
}

/**
 * Impact per byte, highest first, ties by id. Items that do not fit are
 * skipped and later ones still considered.
 */
export function solveGreedy<T extends KnapsackItem>(items: readonly T[], budget: number): T[] {
  const ranked = [...items].sort((a, b) => ratio(b) - ratio(a) || compareIds(a.id, b.id));
  const chosen: T[] = [];
  let used = 0;

  for (const item of ranked) {
    if (used + item.size > budget) continue;
    chosen.push(item);
    used += item.size;
  }

  return chosen;
}

function ratio(item: KnapsackItem): number {
  return item.size === 0 ? Infinity : item.impact / item.size;
}
