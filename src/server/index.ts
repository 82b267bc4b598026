/**
 * MCP Server setup
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { ModuleAnalyzer } from '../analyzer/index.js';
import { registerTools } from './tools/index.js';

export interface ServerOptions {
  name?: string;
  version?: string;
}

export async function createServer(
  analyzer: ModuleAnalyzer,
  options: ServerOptions = {}
): Promise<McpServer> {
  const server = new McpServer({
    name: options.name ?? 'module-atlas',
    version: options.version ?? '0.1.0',
  });

  registerTools(server, analyzer);

  return server;
}

export async function startStdioServer(
  analyzer: ModuleAnalyzer,
  options: ServerOptions = {}
): Promise<void> {
  const server = await createServer(analyzer, options);
  const transport = new StdioServerTransport();

  await server.connect(transport);

  const shutdown = async (): Promise<void> => {
    await analyzer.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch(error => {
      console.error('Error during shutdown:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

export { registerTools, TOOL_NAMES } from './tools/index.js';
