/**
 * analyze command - Build the module dependency graph of a directory
 */

import { Command } from 'commander';
import { runAnalysis, type CommonOptions } from '../shared.js';

interface AnalyzeCommandOptions extends CommonOptions {
  json: boolean;
  verbose: boolean;
  top: string;
}

export const analyzeCommand = new Command('analyze')
  .description('Analyze imports and rank modules by impact')
  .argument('[directory]', 'Directory to analyze', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('--no-cache', 'Do not read or write the extraction cache')
  .option('-n, --top <number>', 'Number of top modules to show', '10')
  .option('--json', 'Output as JSON', false)
  .option('--verbose', 'List files that could not be analyzed', false)
  .action(async (directory: string, options: AnalyzeCommandOptions) => {
    try {
      const { result } = await runAnalysis(directory, options);

      if (result.status === 'cancelled') {
        throw new Error('Analysis was cancelled');
      }

      const { graph, dendrogram, clusters } = result.snapshot;

      if (options.json) {
        console.log(JSON.stringify({
          status: result.status,
          totalFiles: result.totalFiles,
          analyzedFiles: result.analyzedFiles.length,
          skippedFiles: result.skippedFiles,
          graph: graph.toJSON(),
          dendrogram,
          clusters,
        }, null, 2));
        return;
      }

      console.log(`Analyzed ${result.snapshot.rootDirectory}\n`);
      console.log(`  Status:        ${result.status}`);
      console.log(`  Total files:   ${result.totalFiles}`);
      console.log(`  Analyzed:      ${result.analyzedFiles.length}`);
      console.log(`  Skipped:       ${result.skippedFiles.length}`);
      console.log(`  Modules:       ${graph.size}`);
      console.log(`  Edges:         ${graph.edgeCount}`);
      console.log(`  Clusters:      ${clusters.length}`);
      console.log(`  Duration:      ${result.durationMs}ms\n`);

      if (result.skippedFiles.length > 0 && options.verbose) {
        console.log('Skipped:');
        for (const file of result.skippedFiles) {
          console.log(`  ${file.path} (${file.code}): ${file.message}`);
        }
        console.log('');
      }

      const top = graph.rankByImpact().slice(0, Number.parseInt(options.top, 10) || 10);
      if (top.length > 0) {
        console.log('Top modules by impact:');
        for (const node of top) {
          console.log(`  ${String(node.impact).padStart(4)}  ${node.id}${node.kind === 'folder' ? '/' : ''}`);
        }
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
