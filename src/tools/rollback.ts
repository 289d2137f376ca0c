import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import { jsonResult, errorResult } from './input.js';

export function registerRollbackTool(server: McpServer, store: PipelineStore): void {
  server.registerTool('rollback', {
    description: 'Undo recent runs by reverting git commits. Tags the current state first so the rollback itself can be undone.',
    inputSchema: {
      mode: z.enum(['last-n', 'to-commit']).describe('Rollback mode'),
      count: z.number().optional().describe('Number of commits to revert (for "last-n", default 1)'),
      commitHash: z.string().optional().describe('Target commit hash (for "to-commit")'),
      dryRun: z.boolean().optional().default(false).describe('Create the safety tag only'),
    },
  }, async (args) => {
    try {
      const result = await store.rollback({
        mode: args.mode,
        count: args.count,
        commitHash: args.commitHash,
        dryRun: args.dryRun,
      });

      return jsonResult({
        ...result,
        message: args.dryRun
          ? `Dry run: nothing reverted. Safety tag: ${result.safetyTag}`
          : `Reverted ${result.revertedCommits} commit(s). Safety tag: ${result.safetyTag}`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });
}
