/**
 * select_cluster tool implementation
 * Explicit cluster id, a (height, module) cut, or the named flat clusters
 */

import type { ClusterSelection, ModuleAnalyzer } from '../../analyzer/index.js';
import { enforceOutputBudget, formatTable, textResponse, type ResponseFormat, type ToolResponse } from './compact-format.js';
import { ensureSnapshot } from './snapshot.js';

const DEFAULT_MAX_BYTES = 5000;

export interface SelectClusterInput {
  cluster_id?: number;
  height?: number;
  module?: string;
  format?: ResponseFormat;
}

export async function selectClusterTool(analyzer: ModuleAnalyzer, input: SelectClusterInput): Promise<ToolResponse> {
  const format = input.format ?? 'compact';
  const { clusters } = await ensureSnapshot(analyzer);

  if (input.cluster_id !== undefined) {
    const cluster = analyzer.selectCluster(input.cluster_id);
    if (!cluster) {
      return textResponse(`Cluster ${input.cluster_id} does not exist in the current dendrogram.`, true);
    }
    return textResponse(renderCluster(cluster, format));
  }

  if (input.height !== undefined) {
    if (!input.module) {
      return textResponse('Selecting by height needs a module to locate the cluster.', true);
    }
    const result = analyzer.selectClusterAt(input.height, input.module);
    if (!result.success) {
      const suggestions = result.error.suggestions?.length ? `\nDid you mean: ${result.error.suggestions.join(', ')}` : '';
      return textResponse(`${result.error.message}${suggestions}`, true);
    }
    return textResponse(renderCluster(result.cluster, format));
  }

  const rows = clusters.map(cluster => ({
    name: cluster.name,
    modules: cluster.modules.length,
    files: cluster.fileCount,
    impact: cluster.aggregateImpact.toFixed(3),
    members: cluster.modules.slice(0, 5).join(', ') + (cluster.modules.length > 5 ? ', ...' : ''),
  }));
  const header = format === 'compact' ? `[CLUSTERS] total=${clusters.length}` : `# Clusters (${clusters.length})\n`;
  const table = formatTable(format, rows, { columns: ['name', 'modules', 'files', 'impact', 'members'] });
  return textResponse(enforceOutputBudget([header, table].join('\n'), DEFAULT_MAX_BYTES));
}

function renderCluster(cluster: ClusterSelection, format: ResponseFormat): string {
  const label = cluster.clusterId !== null ? `cluster ${cluster.clusterId}` : `cut at ${cluster.height}`;
  const lines = format === 'compact'
    ? [
        `[CLUSTER ${label}] height=${cluster.height} modules=${cluster.modules.length} files=${cluster.files.length}`,
        '[MODULES]',
        ...cluster.modules,
        '[FILES]',
        ...cluster.files,
      ]
    : [
        `# Cluster (${label})`,
        '',
        `Merged at height ${cluster.height}.`,
        '',
        '## Modules',
        ...cluster.modules.map(id => `- \`${id}\``),
        '',
        '## Files',
        ...cluster.files.map(file => `- \`${file}\``),
      ];
  return enforceOutputBudget(lines.join('\n'), DEFAULT_MAX_BYTES);
}
