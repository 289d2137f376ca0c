import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import { ContactRecordSchema, CustomerEventSchema, FamilyEdgeSchema } from '../store/index.js';
import { readJsonRows, jsonResult, errorResult } from './input.js';

const SourcelessContactSchema = ContactRecordSchema.extend({ source: z.string().optional() });

export function registerImportTools(server: McpServer, store: PipelineStore): void {
  server.registerTool('import_contacts', {
    description: 'Load contact records exported by one upstream system (JSON array). Replaces that source\'s previous records.',
    inputSchema: {
      filePath: z.string().describe('Path to a JSON array of {email?, phone?, name?, sourceId, firstSeen?}'),
      source: z.string().describe('Upstream system name, e.g. "crm" or "payments"'),
      dryRun: z.boolean().optional().default(false).describe('Validate without writing'),
    },
  }, async ({ filePath, source, dryRun }) => {
    try {
      const rows = await readJsonRows(filePath, SourcelessContactSchema);
      const records = rows.map(row => ({ ...row, source }));
      const withIdentifier = records.filter(r => r.email || r.phone).length;

      if (dryRun) {
        return jsonResult({ dryRun: true, source, totalParsed: records.length, withIdentifier });
      }

      const commit = await store.importContacts(source, records);
      return jsonResult({
        source,
        imported: records.length,
        withIdentifier,
        commit,
        message: `Imported ${records.length} contact records from ${filePath}`,
      });
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('import_events', {
    description: 'Load customer events (JSON array of {customerId, eventType, eventDate, source?, payload?}) into the shared event feed.',
    inputSchema: {
      filePath: z.string().describe('Path to a JSON array of events'),
      mode: z.enum(['append', 'replace']).optional().default('append')
        .describe('Append to the feed or replace it entirely'),
    },
  }, async ({ filePath, mode }) => {
    try {
      const events = await readJsonRows(filePath, CustomerEventSchema);
      const commit = await store.importEvents(events, mode);
      return jsonResult({ imported: events.length, mode, commit });
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('import_family_edges', {
    description: 'Replace the family graph (JSON array of {childCustomerId, parentCustomerId}) used for parent-contact fallback.',
    inputSchema: {
      filePath: z.string().describe('Path to a JSON array of family edges'),
    },
  }, async ({ filePath }) => {
    try {
      const edges = await readJsonRows(filePath, FamilyEdgeSchema);
      const commit = await store.importFamilyEdges(edges);
      return jsonResult({ imported: edges.length, commit });
    } catch (err) {
      return errorResult(err);
    }
  });
}
