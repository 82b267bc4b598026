/**
 * serve command - Start the MCP server
 */

import { Command } from 'commander';
import { startStdioServer } from '../../server/index.js';
import { createAnalyzer, type CommonOptions } from '../shared.js';

interface ServeOptions extends CommonOptions {
  root?: string;
}

export const serveCommand = new Command('serve')
  .description('Start the MCP server over stdio')
  .option('-r, --root <path>', 'Root directory of the repository to analyze')
  .option('-c, --config <path>', 'Path to config file')
  .action(async (options: ServeOptions) => {
    try {
      const rootDirectory = options.root
        ?? process.env['MODULE_ATLAS_ROOT']
        ?? process.cwd();

      const analyzer = await createAnalyzer(rootDirectory, options);
      await analyzer.initialize();

      await startStdioServer(analyzer, {
        name: 'module-atlas',
        version: '0.1.0',
      });
    } catch (error) {
      // stdout carries the protocol
      console.error('Error starting server:', error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
