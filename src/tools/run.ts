import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineRunner } from '../pipeline/index.js';
import { toDate } from '../utils/index.js';
import { jsonResult, errorResult } from './input.js';

export function registerRunTools(server: McpServer, runner: PipelineRunner): void {
  server.registerTool('resolve_identities', {
    description: 'Rebuild the customer registry and identifier log from every imported contact record.',
    inputSchema: {},
  }, async () => {
    try {
      return jsonResult(await runner.resolveIdentities());
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('evaluate_flags', {
    description: 'Evaluate all flag rules against the event feed, merge with existing flags, expire old ones and record flag_set events.',
    inputSchema: {
      date: z.string().optional().describe('Evaluation date (ISO 8601). Defaults to now.'),
    },
  }, async ({ date }) => {
    try {
      const today = date ? toDate(date) : new Date();
      if (Number.isNaN(today.getTime())) {
        return errorResult(new Error(`Invalid date: ${date}`));
      }
      return jsonResult(await runner.evaluateFlags(today));
    } catch (err) {
      return errorResult(err);
    }
  });
}
