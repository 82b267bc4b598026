/**
 * optimal command - Highest-impact file set under a content budget
 */

import { Command } from 'commander';
import { analyzeOrFail, parseNumber, type CommonOptions } from '../shared.js';

interface OptimalOptions extends CommonOptions {
  root: string;
  budget?: string;
  json: boolean;
}

export const optimalCommand = new Command('optimal')
  .description('Select the files with the highest total impact that fit the budget')
  .option('-r, --root <path>', 'Repository root', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('--no-cache', 'Do not read or write the extraction cache')
  .option('-b, --budget <bytes>', 'Byte budget (default: configured share of the maximum content length)')
  .option('--json', 'Output as JSON', false)
  .action(async (options: OptimalOptions) => {
    try {
      const { analyzer } = await analyzeOrFail(options.root, options);

      const budget = options.budget !== undefined ? parseNumber(options.budget, 'Budget') : undefined;
      const selection = analyzer.selectOptimalPrompt({ budget });

      if (options.json) {
        console.log(JSON.stringify(selection, null, 2));
        return;
      }

      console.log(`Selected ${selection.files.length} files (${selection.totalSize} of ${selection.budget} bytes, ~${selection.estimatedTokens} tokens)`);
      console.log(`Strategy: ${selection.strategy}, impact captured: ${selection.totalImpact}\n`);
      for (const file of selection.files) {
        console.log(`  ${file}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
