import * as path from 'node:path';

export const CONTACT_INPUTS_DIR = 'inputs/contacts';
export const FAMILY_EDGES_FILE = 'inputs/family-edges.json';
export const EVENTS_FILE = 'events/customer-events.json';
export const CUSTOMERS_FILE = 'registry/customers.json';
export const IDENTIFIERS_FILE = 'registry/identifiers.json';
export const CONFLICTS_FILE = 'registry/conflicts.json';
export const FLAGS_FILE = 'flags/customer-flags.json';
export const EXPERIMENT_ENTRIES_FILE = 'experiments/entries.json';

export const STORE_DIRS = [CONTACT_INPUTS_DIR, 'events', 'registry', 'flags', 'experiments'];

export function storeFile(storePath: string, relative: string): string {
  return path.join(storePath, ...relative.split('/'));
}

/** Source names become file names, so keep them to a safe alphabet. */
export function sanitizeSourceName(source: string): string {
  return source.trim().toLowerCase().replace(/[^a-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '') || 'unknown';
}

export function relativeContactInputPath(source: string): string {
  return `${CONTACT_INPUTS_DIR}/${sanitizeSourceName(source)}.json`;
}

