/**
 * MCP Tool registration
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ModuleAnalyzer } from '../../analyzer/index.js';
import { analyzeRepositoryTool } from './analyze-repository.js';
import { listModulesTool } from './list-modules.js';
import { selectClusterTool } from './select-cluster.js';
import { selectModuleTool } from './select-module.js';
import { selectOptimalPromptTool } from './select-optimal-prompt.js';

const responseFormatSchema = z.enum(['compact', 'markdown']).optional().default('compact')
  .describe('Response format');

export const TOOL_NAMES = [
  'analyze_repository',
  'list_modules',
  'select_module',
  'select_cluster',
  'select_optimal_prompt',
] as const;

export function registerTools(server: McpServer, analyzer: ModuleAnalyzer): void {
  server.tool(
    'analyze_repository',
    'Scan the repository, extract imports and rebuild the module dependency graph. Run again after files change.',
    {
      format: responseFormatSchema,
    },
    { title: 'Analyze Repository' },
    async ({ format }) => analyzeRepositoryTool(analyzer, { format })
  );

  server.tool(
    'list_modules',
    'List modules ranked by impact (how many modules import them). Use this first to see what the codebase leans on.',
    {
      limit: z.number().int().min(1).optional().default(50).describe('Maximum number of modules to return'),
      offset: z.number().int().min(0).optional().default(0).describe('Skip first N modules for pagination'),
      kind: z.enum(['file', 'folder']).optional().describe('Only file modules or only folder-modules'),
      min_impact: z.number().int().min(0).optional().describe('Hide modules imported by fewer modules than this'),
      format: responseFormatSchema,
    },
    { title: 'List Modules' },
    async ({ limit, offset, kind, min_impact, format }) =>
      listModulesTool(analyzer, { limit, offset, kind, min_impact, format })
  );

  server.tool(
    'select_module',
    'Select one module by path or name ("pkg", "src/utils", "utils.py") and list its files and neighbours.',
    {
      module: z.string().describe('Module identifier, path or partial path'),
      format: responseFormatSchema,
    },
    { title: 'Select Module' },
    async ({ module, format }) => selectModuleTool(analyzer, { module, format })
  );

  server.tool(
    'select_cluster',
    'Select a cluster of structurally related modules by cluster id, or by cut height plus a member module. With neither, list the named clusters.',
    {
      cluster_id: z.number().int().min(0).optional().describe('Dendrogram cluster id (leaves first, then merges)'),
      height: z.number().min(0).optional().describe('Cut height; 0 keeps every module on its own'),
      module: z.string().optional().describe('Module inside the wanted cluster (required with height)'),
      format: responseFormatSchema,
    },
    { title: 'Select Cluster' },
    async ({ cluster_id, height, module, format }) =>
      selectClusterTool(analyzer, { cluster_id, height, module, format })
  );

  server.tool(
    'select_optimal_prompt',
    'Pick the set of files with the highest total impact that fits a byte budget.',
    {
      budget: z.number().positive().optional().describe('Byte budget; defaults to the configured share of the maximum content length'),
      format: responseFormatSchema,
    },
    { title: 'Select Optimal Prompt' },
    async ({ budget, format }) => selectOptimalPromptTool(analyzer, { budget, format })
  );
}
