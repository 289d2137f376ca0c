import type { AppConfig } from '../config.js';
import type { Customer, ExperimentEntry, FamilyEdge, MatchConfidence } from '../types/index.js';
import type { CommitTables, PipelineStore } from '../store/index.js';
import { IdentityResolver, carryOverIds } from '../identity/index.js';
import {
  FlagsEngine, CollectingExperimentSink, appendFlagSetEvents, buildEvaluationContext,
  createPersistentClassifier, getDefaultRules,
} from '../flags/index.js';
import { errorMessage, logger } from '../utils/index.js';

export interface ResolveRunResult {
  customers: number;
  identifiers: number;
  discarded: number;
  conflicts: number;
  byConfidence: Record<MatchConfidence, number>;
  bySource: Record<string, number>;
  commit: string | null;
  duration: number;
}

export interface FlagRunResult {
  evaluationDate: string;
  customersEvaluated: number;
  customersFlagged: number;
  newFlags: number;
  activeFlags: number;
  expired: number;
  flagSetEvents: number;
  experimentEntries: number;
  warnings: string[];
  commit: string | null;
  duration: number;
}

/**
 * One batch run at a time: load every input, compute in memory, write
 * every output. Each run holds the store exclusively from its first read
 * to its commit, so a concurrent import waits instead of being overwritten.
 */
export class PipelineRunner {
  private store: PipelineStore;
  private config: AppConfig;

  constructor(store: PipelineStore, config: AppConfig) {
    this.store = store;
    this.config = config;
  }

  createEngine(): FlagsEngine {
    const { flags } = this.config;
    return new FlagsEngine({
      rules: getDefaultRules({
        experimentId: flags.experimentId,
        abGroupOverrides: flags.abGroupOverrides,
        disabledRules: flags.disabledRules,
      }),
      isPersistent: createPersistentClassifier(flags.persistentFlags),
      expirationDays: flags.expirationDays,
    });
  }

  async resolveIdentities(): Promise<ResolveRunResult> {
    return this.store.runExclusive(async commitTables => {
      const startTime = Date.now();
      const records = await this.store.listContactRecords();
      const previous = await this.store.listCustomers();

      const resolver = new IdentityResolver({
        fuzzyThreshold: this.config.matching.fuzzyThreshold,
        assignId: carryOverIds(previous),
      });
      resolver.addRecords(records);

      const registry = resolver.build();
      const commit = await this.store.writeRegistry(registry, commitTables);
      const summary = resolver.summary();

      logger.info(
        `Resolved ${summary.customers} customers from ${records.length} records`,
        `(${summary.identifiers} identifiers, ${summary.discarded} discarded, ${summary.conflicts} conflicts)`,
      );
      for (const [confidence, count] of Object.entries(summary.byConfidence)) {
        logger.debug(`  ${confidence}: ${count} identifiers`);
      }

      return { ...summary, commit, duration: Date.now() - startTime };
    });
  }

  async evaluateFlags(today: Date = new Date()): Promise<FlagRunResult> {
    return this.store.runExclusive(commitTables => this.runFlags(today, commitTables));
  }

  private async runFlags(today: Date, commitTables: CommitTables): Promise<FlagRunResult> {
    const startTime = Date.now();
    const warnings: string[] = [];

    const events = await this.store.listEvents();
    const previousFlags = await this.store.listFlags();
    const previousEntries = await this.store.listExperimentEntries();

    let customers: Customer[] = [];
    try {
      customers = await this.store.listCustomers();
    } catch (err) {
      warnings.push(`Contact cache unavailable: ${errorMessage(err)}`);
    }

    let edges: FamilyEdge[] = [];
    try {
      edges = await this.store.listFamilyEdges();
    } catch (err) {
      warnings.push(`Family graph unavailable: ${errorMessage(err)}`);
    }

    for (const warning of warnings) logger.warn(warning, '- continuing without it');

    const sink = new CollectingExperimentSink();
    const result = this.createEngine().evaluateAllCustomers({
      events,
      today,
      context: buildEvaluationContext(customers, edges),
      previousFlags,
      experimentSink: sink,
    });

    const experimentEntries = mergeExperimentEntries(previousEntries, sink.entries);
    const commit = await this.store.writeFlagRun({
      flags: result.flags,
      events: appendFlagSetEvents(events, result.flagSetEvents),
      experimentEntries,
    }, today, commitTables);

    return {
      evaluationDate: today.toISOString(),
      customersEvaluated: result.customersEvaluated,
      customersFlagged: result.customersFlagged,
      newFlags: result.newFlags.length,
      activeFlags: result.flags.length,
      expired: result.expired,
      flagSetEvents: result.flagSetEvents.length,
      experimentEntries: experimentEntries.length - previousEntries.length,
      warnings,
      commit,
      duration: Date.now() - startTime,
    };
  }
}

/** A customer enters an experiment once: later triggers do not add entries. */
export function mergeExperimentEntries(existing: ExperimentEntry[], incoming: ExperimentEntry[]): ExperimentEntry[] {
  const seen = new Set(existing.map(entry => `${entry.customerId}\u0000${entry.experimentId}`));
  const merged = [...existing];
  for (const entry of incoming) {
    const key = `${entry.customerId}\u0000${entry.experimentId}`;
    if (seen.has(key)) continue;
    seen.add(key);
    merged.push(entry);
  }
  return merged;
}
