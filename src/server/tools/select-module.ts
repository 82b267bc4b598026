/**
 * select_module tool implementation
 */

import type { ModuleAnalyzer } from '../../analyzer/index.js';
import { enforceOutputBudget, textResponse, type ResponseFormat, type ToolResponse } from './compact-format.js';
import { ensureSnapshot } from './snapshot.js';

const DEFAULT_MAX_BYTES = 4000;

export interface SelectModuleInput {
  module: string;
  format?: ResponseFormat;
}

export async function selectModuleTool(analyzer: ModuleAnalyzer, input: SelectModuleInput): Promise<ToolResponse> {
  const format = input.format ?? 'compact';
  const { graph } = await ensureSnapshot(analyzer);
  const result = analyzer.selectModule(input.module);

  if (!result.success) {
    const suggestions = result.error.suggestions?.length
      ? `\nDid you mean: ${result.error.suggestions.join(', ')}`
      : '';
    return textResponse(`${result.error.message}${suggestions}`, true);
  }

  const { selection } = result;
  const dependencies = graph.dependenciesOf(selection.moduleId);
  const dependents = graph.dependentsOf(selection.moduleId);

  if (format === 'compact') {
    const lines = [
      `[MODULE ${selection.moduleId}] kind=${selection.kind} files=${selection.files.length} bytes=${selection.size} impact=${selection.impact}`,
      `imports: ${dependencies.join(', ') || '-'}`,
      `imported_by: ${dependents.join(', ') || '-'}`,
      '[FILES]',
      ...selection.files,
    ];
    return textResponse(enforceOutputBudget(lines.join('\n'), DEFAULT_MAX_BYTES));
  }

  const lines = [
    `# ${selection.moduleId}`,
    '',
    `- **Kind**: ${selection.kind}`,
    `- **Size**: ${selection.size} bytes`,
    `- **Impact**: ${selection.impact}`,
    `- **Imports**: ${dependencies.map(id => `\`${id}\``).join(', ') || 'none'}`,
    `- **Imported by**: ${dependents.map(id => `\`${id}\``).join(', ') || 'none'}`,
    '',
    '## Files',
    '',
    ...selection.files.map(file => `- \`${file}\``),
  ];
  return textResponse(enforceOutputBudget(lines.join('\n'), DEFAULT_MAX_BYTES));
}
