/**
 * Helpers shared by CLI commands
 */

import path from 'node:path';
import { ModuleAnalyzer } from '../analyzer/index.js';
import { loadConfigOrDefault } from '../config/loader.js';
import type { AnalysisResult, AnalysisSnapshot } from '../analyzer/index.js';

export interface CommonOptions {
  config?: string;
  root?: string;
  cache?: boolean;
}

export async function createAnalyzer(directory: string, options: CommonOptions): Promise<ModuleAnalyzer> {
  const rootDirectory = path.resolve(directory);
  const config = await loadConfigOrDefault(rootDirectory, options.config);
  if (options.cache === false) {
    config.cache.enabled = false;
  }
  return new ModuleAnalyzer({ rootDirectory, config });
}

/**
 * Run one analysis and close the cache whether or not it succeeds. The
 * analyzer keeps its snapshot in memory for the queries that follow.
 */
export async function runAnalysis(
  directory: string,
  options: CommonOptions
): Promise<{ analyzer: ModuleAnalyzer; result: AnalysisResult }> {
  const analyzer = await createAnalyzer(directory, options);
  try {
    return { analyzer, result: await analyzer.analyze() };
  } finally {
    await analyzer.close();
  }
}

/**
 * Run a full analysis and return its snapshot, warning about skipped files.
 */
export async function analyzeOrFail(
  directory: string,
  options: CommonOptions
): Promise<{ analyzer: ModuleAnalyzer; snapshot: AnalysisSnapshot }> {
  const { analyzer, result } = await runAnalysis(directory, options);
  if (result.status === 'cancelled') {
    throw new Error('Analysis was cancelled');
  }
  if (result.status === 'partial') {
    console.warn(`Warning: ${result.skippedFiles.length} file(s) could not be analyzed`);
  }
  return { analyzer, snapshot: result.snapshot };
}

export function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}
