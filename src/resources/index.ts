import { ResourceTemplate } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import { toSummary } from '../types/index.js';

const JSON_MIME = 'application/json';

function jsonContents(uri: URL, value: unknown) {
  return {
    contents: [{ uri: uri.href, text: JSON.stringify(value, null, 2), mimeType: JSON_MIME }],
  };
}

export function registerAllResources(server: McpServer, store: PipelineStore): void {
  server.registerResource('all-customers', 'customers://all', {
    title: 'All Customers',
    description: 'Summary list of every resolved customer',
    mimeType: JSON_MIME,
  }, async (uri) => jsonContents(uri, (await store.listCustomers()).map(toSummary)));

  server.registerResource('customer-detail',
    new ResourceTemplate('customers://{id}', {
      list: async () => ({
        resources: (await store.listCustomers()).map(c => ({
          uri: `customers://${c.customerId}`,
          name: c.primaryName ?? c.primaryEmail ?? c.primaryPhone ?? c.customerId,
          mimeType: JSON_MIME,
        })),
      }),
    }),
    {
      title: 'Customer Detail',
      description: 'A resolved customer with its identifiers and active flags',
      mimeType: JSON_MIME,
    },
    async (uri, variables) => {
      const id = String(variables.id);
      const customer = await store.getCustomer(id);
      const identifiers = (await store.listIdentifiers()).filter(i => i.customerId === id);
      const flags = (await store.listFlags()).filter(f => f.customerId === id);
      return jsonContents(uri, { customer, identifiers, flags });
    },
  );

  server.registerResource('active-flags', 'flags://active', {
    title: 'Active Flags',
    description: 'Flags table from the last evaluation, highest priority first',
    mimeType: JSON_MIME,
  }, async (uri) => jsonContents(uri, await store.listFlags()));

  server.registerResource('identity-conflicts', 'conflicts://all', {
    title: 'Identity Conflicts',
    description: 'Records whose email and phone resolved to different customers, kept for review',
    mimeType: JSON_MIME,
  }, async (uri) => jsonContents(uri, await store.listConflicts()));

  server.registerResource('run-history', 'pipeline://history', {
    title: 'Recent Runs',
    description: 'Imports, resolutions, flag runs and rollbacks from the store\'s git log',
    mimeType: JSON_MIME,
  }, async (uri) => jsonContents(uri, await store.getHistory(20)));
}
