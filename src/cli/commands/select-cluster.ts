/**
 * select-cluster command - Pick a cluster by id or by cut height
 */

import { Command } from 'commander';
import { analyzeOrFail, parseNumber, type CommonOptions } from '../shared.js';

interface SelectClusterOptions extends CommonOptions {
  root: string;
  id?: string;
  height?: string;
  module?: string;
  json: boolean;
}

export const selectClusterCommand = new Command('select-cluster')
  .description('Select a cluster of related modules, or list clusters when no id or height is given')
  .option('-r, --root <path>', 'Repository root', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('--no-cache', 'Do not read or write the extraction cache')
  .option('-i, --id <number>', 'Dendrogram cluster id')
  .option('-H, --height <number>', 'Cut height')
  .option('-m, --module <module>', 'Module inside the cluster (with --height)')
  .option('--json', 'Output as JSON', false)
  .action(async (options: SelectClusterOptions) => {
    try {
      const { analyzer, snapshot } = await analyzeOrFail(options.root, options);

      if (options.id !== undefined) {
        const cluster = analyzer.selectCluster(parseNumber(options.id, 'Cluster id'));
        if (!cluster) {
          throw new Error(`Cluster ${options.id} does not exist`);
        }
        print(cluster, options.json);
        return;
      }

      if (options.height !== undefined) {
        const height = parseNumber(options.height, 'Height');
        if (!options.module) {
          // Without a module, show every group of the cut
          const groups = analyzer.cutClusters(height);
          if (options.json) {
            console.log(JSON.stringify(groups, null, 2));
          } else {
            groups.forEach((group, index) => console.log(`${index + 1}. ${group.join(', ')}`));
          }
          return;
        }

        const result = analyzer.selectClusterAt(height, options.module);
        if (!result.success) {
          throw new Error(result.error.message);
        }
        print(result.cluster, options.json);
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(snapshot.clusters, null, 2));
        return;
      }
      for (const cluster of snapshot.clusters) {
        console.log(`${cluster.name}: ${cluster.modules.length} modules, ${cluster.fileCount} files, impact ${cluster.aggregateImpact.toFixed(3)}`);
        console.log(`  ${cluster.modules.join(', ')}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

function print(cluster: { height: number; modules: string[]; files: string[] }, json: boolean): void {
  if (json) {
    console.log(JSON.stringify(cluster, null, 2));
    return;
  }
  console.log(`Cluster at height ${cluster.height}: ${cluster.modules.length} modules`);
  for (const file of cluster.files) {
    console.log(`  ${file}`);
  }
}
