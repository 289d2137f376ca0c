import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import type { PipelineRunner } from '../pipeline/index.js';
import { registerImportTools } from './import.js';
import { registerRunTools } from './run.js';
import { registerFlagsTool } from './flags.js';
import { registerCustomerTools } from './customers.js';
import { registerHistoryTool } from './history.js';
import { registerRollbackTool } from './rollback.js';

export function registerAllTools(server: McpServer, store: PipelineStore, runner: PipelineRunner): void {
  registerImportTools(server, store);
  registerRunTools(server, runner);
  registerFlagsTool(server, store);
  registerCustomerTools(server, store);
  registerHistoryTool(server, store);
  registerRollbackTool(server, store);
}
