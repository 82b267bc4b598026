/**
 * select-module command - Resolve a module and print its files
 */

import { Command } from 'commander';
import { analyzeOrFail, type CommonOptions } from '../shared.js';

interface SelectModuleOptions extends CommonOptions {
  root: string;
  json: boolean;
}

export const selectModuleCommand = new Command('select-module')
  .description('Select a module by path or name and list its files')
  .argument('<module>', 'Module identifier, path or partial path')
  .option('-r, --root <path>', 'Repository root', '.')
  .option('-c, --config <path>', 'Path to config file')
  .option('--no-cache', 'Do not read or write the extraction cache')
  .option('--json', 'Output as JSON', false)
  .action(async (moduleInput: string, options: SelectModuleOptions) => {
    try {
      const { analyzer } = await analyzeOrFail(options.root, options);
      const result = analyzer.selectModule(moduleInput);

      if (!result.success) {
        const { message, suggestions } = result.error;
        throw new Error(suggestions?.length ? `${message}\nDid you mean: ${suggestions.join(', ')}` : message);
      }

      const { selection } = result;
      if (options.json) {
        console.log(JSON.stringify(selection, null, 2));
        return;
      }

      console.log(`${selection.moduleId} (${selection.kind}, impact ${selection.impact}, ${selection.size} bytes)`);
      for (const file of selection.files) {
        console.log(`  ${file}`);
      }
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
