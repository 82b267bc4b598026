/**
 * Content budget helpers for prompt selection.
 */

import { AnalysisConfigError } from '../errors.js';

export interface ContentBudget {
  /** Maximum content length in bytes the prompt may carry */
  maxContentLength: number;
  /** Share of maxContentLength given to selected files, 0-100 */
  budgetPercent: number;
}

export const DEFAULT_CONTENT_BUDGET: ContentBudget = {
  maxContentLength: 500_000,
  budgetPercent: 80,
};

/**
 * Estimate token count from a byte or character count (rough approximation).
 */
export function estimateTokens(length: number): number {
  return Math.ceil(length / 4);
}

/**
 * Byte budget for a selection: an explicit budget wins, otherwise a share of
 * the configured content length.
 */
export function resolveBudget(explicit?: number, budget: ContentBudget = DEFAULT_CONTENT_BUDGET): number {
  const value = explicit ?? Math.floor((budget.maxContentLength * budget.budgetPercent) / 100);
  assertValidBudget(value);
  return value;
}

export function assertValidBudget(budget: number): void {
  if (!Number.isFinite(budget) || budget <= 0) {
    throw new AnalysisConfigError(`Budget must be a positive finite number, got ${budget}`);
  }
}

export function assertValidSize(id: string, size: number): void {
  if (!Number.isFinite(size) || size < 0) {
    throw new AnalysisConfigError(`Module "${id}" has invalid size ${size}`);
  }
}

/**
 * Integer capacity grid for the exact solver. Weights are rounded up, so a
 * set that fits the grid also fits the byte budget.
 */
export function discretize(budget: number, maxCapacityUnits: number): { scale: number; capacity: number } {
  const scale = Math.max(1, Math.ceil(budget / Math.max(1, maxCapacityUnits)));
  return { scale, capacity: Math.floor(budget / scale) };
}
