import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import { jsonResult, errorResult } from './input.js';

export function registerFlagsTool(server: McpServer, store: PipelineStore): void {
  server.registerTool('list_flags', {
    description: 'List active flags, optionally filtered by flag type or customer.',
    inputSchema: {
      flagType: z.string().optional().describe('Only flags of this type (exact match)'),
      customerId: z.string().optional().describe('Only flags for this customer'),
      limit: z.number().optional().default(100).describe('Max flags to return'),
    },
  }, async ({ flagType, customerId, limit }) => {
    try {
      const flags = (await store.listFlags())
        .filter(f => !flagType || f.flagType === flagType)
        .filter(f => !customerId || f.customerId === customerId);

      const byType: Record<string, number> = {};
      for (const flag of flags) byType[flag.flagType] = (byType[flag.flagType] ?? 0) + 1;

      return jsonResult({ total: flags.length, byType, flags: flags.slice(0, limit) });
    } catch (err) {
      return errorResult(err);
    }
  });
}
