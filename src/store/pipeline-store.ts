import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type {
  ContactRecord, Customer, CustomerEvent, ExperimentEntry, FamilyEdge, Flag, HistoryEntry,
  Identifier, IdentityConflict, CommitInfo,
} from '../types/index.js';
import {
  CustomerNotFoundError, RunFailedError, StoreError, errorMessage, hasErrorCode, logger,
} from '../utils/index.js';
import { GitOps } from './git-ops.js';
import {
  CONFLICTS_FILE, CONTACT_INPUTS_DIR, CUSTOMERS_FILE, EVENTS_FILE, EXPERIMENT_ENTRIES_FILE,
  FAMILY_EDGES_FILE, FLAGS_FILE, IDENTIFIERS_FILE, relativeContactInputPath, sanitizeSourceName, storeFile,
} from './file-layout.js';
import {
  ContactRecordSchema, CustomerEventSchema, CustomerSchema, ExperimentEntrySchema, FamilyEdgeSchema,
  FlagSchema, IdentifierSchema, IdentityConflictSchema,
} from './schemas.js';

/** One file of a commit: its path relative to the store and its rows. */
export interface TableWrite {
  file: string;
  rows: unknown[];
}

export interface RegistryWrite {
  customers: Customer[];
  identifiers: Identifier[];
  conflicts: IdentityConflict[];
}

export interface FlagRunWrite {
  flags: Flag[];
  events: CustomerEvent[];
  experimentEntries: ExperimentEntry[];
}

/** Writes tables as one commit inside an exclusive section. */
export type CommitTables = (writes: TableWrite[], message: string) => Promise<string | null>;

const LOCK_STALE_MS = 30_000;

/**
 * Git-backed store for every table the pipeline reads and writes.
 * Each write is a single commit, so a run's outputs land together or not
 * at all, and any run can be reverted.
 */
export class PipelineStore {
  private git: GitOps;
  private storePath: string;
  private lockFile: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(storePath: string) {
    this.storePath = storePath;
    this.git = new GitOps(storePath);
    this.lockFile = path.join(storePath, '.lock');
  }

  async init(): Promise<void> {
    await this.git.init();
  }

  get path(): string {
    return this.storePath;
  }

  // --- Locking ---

  private async acquireLock(): Promise<void> {
    try {
      await fs.writeFile(this.lockFile, process.pid.toString(), { flag: 'wx' });
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) throw err;
      const stat = await fs.stat(this.lockFile).catch(() => null);
      if (stat && Date.now() - stat.mtimeMs > LOCK_STALE_MS) {
        logger.warn('Removing stale store lock:', this.lockFile);
        await fs.rm(this.lockFile, { force: true });
        await fs.writeFile(this.lockFile, process.pid.toString(), { flag: 'wx' });
        return;
      }
      throw new StoreError('Store is locked by another run');
    }
  }

  private async releaseLock(): Promise<void> {
    await fs.rm(this.lockFile, { force: true });
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      return await fn();
    } finally {
      await this.releaseLock();
    }
  }

  /**
   * Run a read-compute-write cycle with the store to itself. Sections from
   * this process queue behind one another; another process holding `.lock`
   * makes the section fail. `fn` must write through the `commit` it is given.
   */
  async runExclusive<T>(fn: (commit: CommitTables) => Promise<T>): Promise<T> {
    const section = this.queue.then(() =>
      this.withLock(() => fn((writes, message) => this.commitTables(writes, message))));
    // The next section only waits for this one; its error goes to the caller.
    this.queue = section.catch(() => undefined);
    return section;
  }

  // --- Tables ---

  private async readTable<S extends z.ZodTypeAny>(relative: string, schema: S): Promise<Array<z.output<S>>> {
    let raw: string;
    try {
      raw = await fs.readFile(storeFile(this.storePath, relative), 'utf-8');
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StoreError(`Corrupt table ${relative}: ${errorMessage(err)}`);
    }

    const result = z.array(schema).safeParse(parsed);
    if (!result.success) {
      throw new StoreError(`Corrupt table ${relative}: ${result.error.issues[0]?.message ?? 'invalid rows'}`);
    }
    return result.data;
  }

  /**
   * Write every table and commit them together. On any failure the working
   * tree is reset to the last commit, leaving the previous outputs in place.
   */
  private async commitTables(writes: TableWrite[], message: string): Promise<string | null> {
    try {
      for (const write of writes) {
        const target = storeFile(this.storePath, write.file);
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, JSON.stringify(write.rows, null, 2) + '\n', 'utf-8');
      }
      await this.git.addMultiple(writes.map(write => write.file));
      return await this.git.commit(message);
    } catch (err) {
      logger.error('Write failed, restoring previous outputs:', errorMessage(err));
      try {
        await this.git.resetHard();
      } catch (resetErr) {
        logger.error('Could not restore store after failed write:', errorMessage(resetErr));
      }
      throw new RunFailedError(`Failed to persist "${message}": ${errorMessage(err)}`, err);
    }
  }

  async write(writes: TableWrite[], message: string): Promise<string | null> {
    return this.runExclusive(commit => commit(writes, message));
  }

  // --- Inputs ---

  /** Replace one source's contact records. */
  async importContacts(source: string, records: ContactRecord[]): Promise<string | null> {
    const name = sanitizeSourceName(source);
    const hash = await this.write(
      [{ file: relativeContactInputPath(name), rows: records }],
      `Import ${records.length} contact records from ${name}`,
    );
    logger.info('Imported', records.length, 'contact records from', name);
    return hash;
  }

  async listContactSources(): Promise<string[]> {
    try {
      const files = await fs.readdir(storeFile(this.storePath, CONTACT_INPUTS_DIR));
      return files.filter(file => file.endsWith('.json')).map(file => file.slice(0, -'.json'.length)).sort();
    } catch (err) {
      if (hasErrorCode(err, 'ENOENT')) return [];
      throw err;
    }
  }

  /** All contact records, grouped by source in name order. */
  async listContactRecords(): Promise<ContactRecord[]> {
    const records: ContactRecord[] = [];
    for (const source of await this.listContactSources()) {
      records.push(...await this.readTable(relativeContactInputPath(source), ContactRecordSchema));
    }
    return records;
  }

  async importEvents(events: CustomerEvent[], mode: 'append' | 'replace'): Promise<string | null> {
    const hash = await this.runExclusive(async commit => {
      const existing = mode === 'append' ? await this.listEvents() : [];
      return commit(
        [{ file: EVENTS_FILE, rows: [...existing, ...events] }],
        `Import ${events.length} events (${mode})`,
      );
    });
    logger.info('Imported', events.length, 'events, mode:', mode);
    return hash;
  }

  async listEvents(): Promise<CustomerEvent[]> {
    return this.readTable(EVENTS_FILE, CustomerEventSchema);
  }

  async importFamilyEdges(edges: FamilyEdge[]): Promise<string | null> {
    return this.write([{ file: FAMILY_EDGES_FILE, rows: edges }], `Import ${edges.length} family edges`);
  }

  async listFamilyEdges(): Promise<FamilyEdge[]> {
    return this.readTable(FAMILY_EDGES_FILE, FamilyEdgeSchema);
  }

  // --- Outputs ---

  async writeRegistry(
    registry: RegistryWrite,
    commit: CommitTables = (writes, message) => this.write(writes, message),
  ): Promise<string | null> {
    return commit([
      { file: CUSTOMERS_FILE, rows: registry.customers },
      { file: IDENTIFIERS_FILE, rows: registry.identifiers },
      { file: CONFLICTS_FILE, rows: registry.conflicts },
    ], `Resolve ${registry.customers.length} customers from ${registry.identifiers.length} identifiers`);
  }

  /** Flags table, event feed and experiment entries in one commit. */
  async writeFlagRun(
    run: FlagRunWrite,
    today: Date,
    commit: CommitTables = (writes, message) => this.write(writes, message),
  ): Promise<string | null> {
    return commit([
      { file: FLAGS_FILE, rows: run.flags },
      { file: EVENTS_FILE, rows: run.events },
      { file: EXPERIMENT_ENTRIES_FILE, rows: run.experimentEntries },
    ], `Flags ${today.toISOString().slice(0, 10)}: ${run.flags.length} active flags`);
  }

  async listCustomers(): Promise<Customer[]> {
    return this.readTable(CUSTOMERS_FILE, CustomerSchema);
  }

  async listIdentifiers(): Promise<Identifier[]> {
    return this.readTable(IDENTIFIERS_FILE, IdentifierSchema);
  }

  async listConflicts(): Promise<IdentityConflict[]> {
    return this.readTable(CONFLICTS_FILE, IdentityConflictSchema);
  }

  async listFlags(): Promise<Flag[]> {
    return this.readTable(FLAGS_FILE, FlagSchema);
  }

  async listExperimentEntries(): Promise<ExperimentEntry[]> {
    return this.readTable(EXPERIMENT_ENTRIES_FILE, ExperimentEntrySchema);
  }

  async getCustomer(customerId: string): Promise<Customer> {
    const customer = (await this.listCustomers()).find(c => c.customerId === customerId);
    if (!customer) throw new CustomerNotFoundError(customerId);
    return customer;
  }

  // --- History ---

  async getHistory(limit: number = 20, file?: string): Promise<HistoryEntry[]> {
    const logResult = await this.git.log({ file, maxCount: limit });

    return logResult.all.map(entry => {
      const commit: CommitInfo = {
        hash: entry.hash,
        message: entry.message,
        date: entry.date,
        author: entry.author_name,
      };
      return { commit, operation: parseOperation(entry.message), summary: entry.message };
    });
  }

  // --- Rollback ---

  async rollback(options: {
    mode: 'last-n' | 'to-commit';
    count?: number;
    commitHash?: string;
    dryRun?: boolean;
  }): Promise<{ revertedCommits: number; safetyTag: string }> {
    return this.runExclusive(async () => {
      const safetyTag = `pre-rollback-${Date.now()}`;
      await this.git.tag(safetyTag);

      if (options.dryRun) {
        return { revertedCommits: 0, safetyTag };
      }

      const targets: string[] = [];
      if (options.mode === 'last-n') {
        const log = await this.git.log({ maxCount: options.count ?? 1 });
        targets.push(...log.all.map(entry => entry.hash));
      } else {
        const target = options.commitHash;
        if (!target) throw new StoreError('commitHash required for to-commit mode');
        const log = await this.git.log({ maxCount: 100 });
        const index = log.all.findIndex(entry => entry.hash.startsWith(target));
        if (index < 0) throw new StoreError(`Commit not found in recent history: ${target}`);
        targets.push(...log.all.slice(0, index).map(entry => entry.hash));
      }

      let revertedCommits = 0;
      // Newest first
      for (const hash of targets) {
        if (await this.isRootCommit(hash)) break;
        await this.git.revert(hash);
        revertedCommits++;
      }

      logger.info('Rolled back', revertedCommits, 'commits, safety tag:', safetyTag);
      return { revertedCommits, safetyTag };
    });
  }

  private async isRootCommit(hash: string): Promise<boolean> {
    const log = await this.git.log();
    return log.all[log.all.length - 1]?.hash === hash;
  }
}

// --- Helpers ---

function parseOperation(message: string): HistoryEntry['operation'] {
  const lower = message.toLowerCase();
  if (lower.startsWith('import')) return 'import';
  if (lower.startsWith('resolve')) return 'resolve';
  if (lower.startsWith('flags')) return 'flags';
  if (lower.startsWith('revert')) return 'rollback';
  return 'other';
}
