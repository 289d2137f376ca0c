import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { PipelineStore } from './store/index.js';
import { PipelineRunner } from './pipeline/index.js';
import { registerAllTools } from './tools/index.js';
import { registerAllResources } from './resources/index.js';
import type { AppConfig } from './config.js';
import { logger } from './utils/index.js';

export function createServer(config: AppConfig): { server: McpServer; store: PipelineStore; runner: PipelineRunner } {
  const server = new McpServer({
    name: 'customer-signals',
    version: '0.1.0',
  });

  const store = new PipelineStore(config.storePath);
  const runner = new PipelineRunner(store, config);

  registerAllTools(server, store, runner);
  registerAllResources(server, store);

  logger.info('MCP server created, store path:', config.storePath);

  return { server, store, runner };
}
