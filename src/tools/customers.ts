import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { PipelineStore } from '../store/index.js';
import { normalizeEmail, normalizePhone } from '../identity/index.js';
import { jsonResult, errorResult } from './input.js';

export function registerCustomerTools(server: McpServer, store: PipelineStore): void {
  server.registerTool('get_customer', {
    description: 'Get a resolved customer with every identifier observed for it and its active flags.',
    inputSchema: {
      customerId: z.string().describe('Customer ID'),
    },
  }, async ({ customerId }) => {
    try {
      const customer = await store.getCustomer(customerId);
      const identifiers = (await store.listIdentifiers()).filter(i => i.customerId === customerId);
      const flags = (await store.listFlags()).filter(f => f.customerId === customerId);
      return jsonResult({ customer, identifiers, flags });
    } catch (err) {
      return errorResult(err);
    }
  });

  server.registerTool('find_customer', {
    description: 'Look up which customer an email address or phone number resolved to.',
    inputSchema: {
      email: z.string().optional().describe('Email address in any casing'),
      phone: z.string().optional().describe('Phone number in any format'),
    },
  }, async ({ email, phone }) => {
    try {
      const normalized = [normalizeEmail(email), normalizePhone(phone)].filter((v): v is string => v !== null);
      if (normalized.length === 0) {
        return errorResult(new Error('Provide a valid email or phone'));
      }

      const identifiers = await store.listIdentifiers();
      const customerIds = [...new Set(
        identifiers.filter(i => normalized.includes(i.normalizedValue)).map(i => i.customerId),
      )];
      const customers = (await store.listCustomers()).filter(c => customerIds.includes(c.customerId));

      return jsonResult({ query: normalized, matches: customers.length, customers });
    } catch (err) {
      return errorResult(err);
    }
  });
}
