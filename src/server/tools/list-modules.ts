/**
 * list_modules tool implementation
 */

import type { ModuleAnalyzer } from '../../analyzer/index.js';
import { enforceOutputBudget, formatTable, textResponse, type ResponseFormat, type ToolResponse } from './compact-format.js';
import { ensureSnapshot } from './snapshot.js';

const DEFAULT_MAX_BYTES = 6000;

export interface ListModulesInput {
  limit?: number;
  offset?: number;
  kind?: 'file' | 'folder';
  min_impact?: number;
  format?: ResponseFormat;
}

export async function listModulesTool(analyzer: ModuleAnalyzer, input: ListModulesInput): Promise<ToolResponse> {
  const limit = input.limit ?? 50;
  const offset = input.offset ?? 0;
  const format = input.format ?? 'compact';

  await ensureSnapshot(analyzer);
  const modules = analyzer
    .listModules()
    .filter(node => !input.kind || node.kind === input.kind)
    .filter(node => node.impact >= (input.min_impact ?? 0));

  if (modules.length === 0) {
    return textResponse('No modules found. Check the scan include/exclude patterns.');
  }

  const page = modules.slice(offset, offset + limit);
  const rows = page.map(node => ({
    module: node.id,
    kind: node.kind,
    files: node.files.length,
    bytes: node.size,
    impact: node.impact,
    centrality: node.centrality.toFixed(3),
  }));

  const header = format === 'compact'
    ? `[MODULES] total=${modules.length} offset=${offset} showing=${page.length}`
    : `# Modules (${offset + 1}-${offset + page.length} of ${modules.length})\n`;
  const sections = [header, formatTable(format, rows, { columns: ['module', 'kind', 'files', 'bytes', 'impact', 'centrality'] })];

  if (offset + page.length < modules.length) {
    sections.push(format === 'compact' ? `[NEXT_OFFSET] ${offset + limit}` : `\nUse \`offset: ${offset + limit}\` for the next page.`);
  }

  return textResponse(enforceOutputBudget(sections.join('\n'), DEFAULT_MAX_BYTES));
}
