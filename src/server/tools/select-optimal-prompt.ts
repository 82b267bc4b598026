/**
 * select_optimal_prompt tool implementation
 */

import type { ModuleAnalyzer } from '../../analyzer/index.js';
import type { SelectionResult } from '../../types/index.js';
import { AnalysisConfigError } from '../../errors.js';
import { enforceOutputBudget, formatTable, textResponse, type ResponseFormat, type ToolResponse } from './compact-format.js';
import { ensureSnapshot } from './snapshot.js';

const DEFAULT_MAX_BYTES = 6000;

export interface SelectOptimalPromptInput {
  budget?: number;
  format?: ResponseFormat;
}

export async function selectOptimalPromptTool(
  analyzer: ModuleAnalyzer,
  input: SelectOptimalPromptInput
): Promise<ToolResponse> {
  const format = input.format ?? 'compact';
  await ensureSnapshot(analyzer);

  let selection: SelectionResult;
  try {
    selection = analyzer.selectOptimalPrompt({ budget: input.budget });
  } catch (error) {
    if (error instanceof AnalysisConfigError) {
      return textResponse(error.message, true);
    }
    throw error;
  }

  const rows = selection.modules.map(entry => ({ module: entry.id, bytes: entry.size, impact: entry.impact }));
  const header = format === 'compact'
    ? `[SELECTION] strategy=${selection.strategy} budget=${selection.budget} bytes=${selection.totalSize} impact=${selection.totalImpact} tokens~${selection.estimatedTokens} modules=${selection.modules.length} files=${selection.files.length}`
    : [
        '# Optimal prompt selection',
        '',
        `- **Strategy**: ${selection.strategy}`,
        `- **Budget**: ${selection.budget} bytes`,
        `- **Selected**: ${selection.totalSize} bytes (~${selection.estimatedTokens} tokens)`,
        `- **Impact captured**: ${selection.totalImpact}`,
        '',
      ].join('\n');

  const sections = [
    header,
    formatTable(format, rows, { columns: ['module', 'bytes', 'impact'] }),
    format === 'compact' ? '[FILES]' : '\n## Files\n',
    ...selection.files.map(file => (format === 'compact' ? file : `- \`${file}\``)),
  ];

  return textResponse(enforceOutputBudget(sections.join('\n'), DEFAULT_MAX_BYTES));
}
