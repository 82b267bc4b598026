#!/usr/bin/env node

/**
 * module-atlas CLI
 */

import { Command } from 'commander';
import { analyzeCommand } from './commands/analyze.js';
import { selectModuleCommand } from './commands/select-module.js';
import { selectClusterCommand } from './commands/select-cluster.js';
import { optimalCommand } from './commands/optimal.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('module-atlas')
  .description('Module dependency analysis and budgeted file selection for LLM prompts')
  .version('0.1.0');

program.addCommand(analyzeCommand);
program.addCommand(selectModuleCommand);
program.addCommand(selectClusterCommand);
program.addCommand(optimalCommand);
program.addCommand(serveCommand);

program.parse(process.argv);
