import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PipelineStore } from '../src/store/pipeline-store.js';
import type { CustomerEvent, Flag } from '../src/types/index.js';

/** Create a temp directory with an initialized PipelineStore for testing. */
export async function createTestStore(): Promise<{ store: PipelineStore; storePath: string; cleanup: () => Promise<void> }> {
  const storePath = await fs.mkdtemp(path.join(os.tmpdir(), 'customer-signals-test-'));
  const store = new PipelineStore(storePath);
  await store.init();
  return {
    store,
    storePath,
    cleanup: async () => {
      await fs.rm(storePath, { recursive: true, force: true });
    },
  };
}

/** Build an event for a customer; the date may be a day ("2026-03-10") or a full timestamp. */
export function makeEvent(
  customerId: string,
  eventType: string,
  eventDate: string,
  payload: Record<string, unknown> = {},
): CustomerEvent {
  return { customerId, eventType, eventDate, source: 'test', payload };
}

export function makeFlag(overrides: Partial<Flag> & { flagType: string }): Flag {
  return {
    customerId: 'c1',
    triggeredDate: '2026-03-15T00:00:00.000Z',
    flagData: {},
    priority: 'high',
    flagAddedDate: '2026-03-15T00:00:00.000Z',
    ...overrides,
  };
}

export const TODAY = new Date('2026-03-15T12:00:00Z');
