/**
 * Lazily analyze on first use so every tool works without an explicit scan
 */

import type { AnalysisSnapshot, ModuleAnalyzer } from '../../analyzer/index.js';

export async function ensureSnapshot(analyzer: ModuleAnalyzer): Promise<AnalysisSnapshot> {
  const existing = analyzer.getSnapshot();
  if (existing) return existing;

  const result = await analyzer.analyze();
  if (result.status === 'cancelled') {
    throw new Error('Analysis was cancelled before a snapshot was built');
  }
  return result.snapshot;
}
