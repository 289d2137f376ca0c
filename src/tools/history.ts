import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import {
  CUSTOMERS_FILE, EVENTS_FILE, EXPERIMENT_ENTRIES_FILE, FLAGS_FILE, IDENTIFIERS_FILE,
} from '../store/index.js';
import { jsonResult, errorResult } from './input.js';

const TABLE_FILES = {
  customers: CUSTOMERS_FILE,
  identifiers: IDENTIFIERS_FILE,
  events: EVENTS_FILE,
  flags: FLAGS_FILE,
  experiments: EXPERIMENT_ENTRIES_FILE,
} as const;

export function registerHistoryTool(server: McpServer, store: PipelineStore): void {
  server.registerTool('history', {
    description: 'Show pipeline run history (imports, resolutions, flag runs, rollbacks) from the store\'s git log.',
    inputSchema: {
      table: z.enum(['customers', 'identifiers', 'events', 'flags', 'experiments']).optional()
        .describe('Only commits touching this table (omit for every run)'),
      limit: z.number().optional().default(20).describe('Max entries to return'),
    },
  }, async ({ table, limit }) => {
    try {
      const entries = await store.getHistory(limit, table ? TABLE_FILES[table] : undefined);
      return jsonResult({ scope: table ?? 'global', entries });
    } catch (err) {
      return errorResult(err);
    }
  });
}
