/**
 * analyze_repository tool implementation
 * Rescans the repository and rebuilds the dependency snapshot
 */

import type { ModuleAnalyzer } from '../../analyzer/index.js';
import { enforceOutputBudget, formatTable, textResponse, type ResponseFormat, type ToolResponse } from './compact-format.js';

const DEFAULT_MAX_BYTES = 4000;

export interface AnalyzeRepositoryInput {
  format?: ResponseFormat;
}

export async function analyzeRepositoryTool(
  analyzer: ModuleAnalyzer,
  input: AnalyzeRepositoryInput
): Promise<ToolResponse> {
  const format = input.format ?? 'compact';
  const result = await analyzer.analyze();

  if (result.status === 'cancelled') {
    return textResponse(`Analysis cancelled after ${result.analyzedFiles.length} of ${result.totalFiles} files.`, true);
  }

  const { graph, clusters } = result.snapshot;
  const skipped = result.skippedFiles.map(file => ({ path: file.path, code: file.code, message: file.message }));

  const header = format === 'compact'
    ? `[ANALYSIS] status=${result.status} files=${result.totalFiles} analyzed=${result.analyzedFiles.length} skipped=${skipped.length} modules=${graph.size} edges=${graph.edgeCount} clusters=${clusters.length} duration_ms=${result.durationMs}`
    : [
        `# Analysis ${result.status}`,
        '',
        `- **Files**: ${result.totalFiles} (${result.analyzedFiles.length} analyzed, ${skipped.length} skipped)`,
        `- **Modules**: ${graph.size}`,
        `- **Edges**: ${graph.edgeCount}`,
        `- **Clusters**: ${clusters.length}`,
        `- **Duration**: ${result.durationMs}ms`,
      ].join('\n');

  const sections = [header];
  if (skipped.length > 0) {
    sections.push(format === 'compact' ? '[SKIPPED]' : '\n## Skipped files\n');
    sections.push(formatTable(format, skipped, { columns: ['path', 'code', 'message'] }));
  }

  return textResponse(enforceOutputBudget(sections.join('\n'), DEFAULT_MAX_BYTES));
}
