import type {
  ContactRecord, Customer, Identifier, IdentifierType, IdentityConflict, MatchConfidence,
} from '../types/index.js';
import { generateId, logger, toDate } from '../utils/index.js';
import { normalizeEmail, normalizeName, normalizePhone } from './normalize.js';
import { FuzzyEmailIndex } from './fuzzy-index.js';

export interface ResolverOptions {
  /** Minimum similarity for a fuzzy email match. */
  fuzzyThreshold?: number;
  /** Allocates the id of a customer seen for the first time. */
  assignId?: (seed: { email: string | null; phone: string | null }) => string;
  /** Timestamp used for records that carry no `firstSeen`. */
  now?: () => Date;
}

export interface MatchResult {
  customerId: string | null;
  confidence: MatchConfidence;
  reason: string;
  /** Set on an email hit whose phone points to the same customer. */
  corroborated?: boolean;
  conflict?: { emailCustomerId: string; phoneCustomerId: string };
}

export interface ResolutionResult {
  customers: Customer[];
  identifiers: Identifier[];
  conflicts: IdentityConflict[];
}

export interface ResolutionSummary {
  customers: number;
  identifiers: number;
  discarded: number;
  conflicts: number;
  byConfidence: Record<MatchConfidence, number>;
  bySource: Record<string, number>;
}

interface CustomerState {
  customerId: string;
  primaryEmail: string | null;
  primaryPhone: string | null;
  primaryName: string | null;
  firstSeen: Date;
  lastSeen: Date;
  sources: string[];
}

const NO_MATCH: MatchResult = { customerId: null, confidence: 'exact', reason: 'new_customer' };

/**
 * Builds a customer registry from per-source contact records.
 *
 * Matching is tiered: exact email, then exact phone, then a fuzzy email
 * match within the same typo-corrected domain. An email hit always wins and
 * is logged as `exact_email`, whether or not the phone agrees. Customers are
 * never merged once created.
 */
export class IdentityResolver {
  private customers = new Map<string, CustomerState>();
  private emailIndex = new Map<string, string>();
  private phoneIndex = new Map<string, string>();
  private fuzzyIndex = new FuzzyEmailIndex();
  private identifiers: Identifier[] = [];
  private conflicts: IdentityConflict[] = [];
  private discarded = 0;

  private readonly fuzzyThreshold: number;
  private readonly assignId: (seed: { email: string | null; phone: string | null }) => string;
  private readonly now: () => Date;

  constructor(options: ResolverOptions = {}) {
    this.fuzzyThreshold = options.fuzzyThreshold ?? 0.9;
    this.assignId = options.assignId ?? (() => generateId());
    this.now = options.now ?? (() => new Date());
  }

  /** Add one record. Returns the owning customer id, or null when the record carries no usable identifier. */
  addRecord(record: ContactRecord): string | null {
    const email = normalizeEmail(record.email);
    const phone = normalizePhone(record.phone);
    const name = normalizeName(record.name);

    if (!email && !phone) {
      this.discarded++;
      logger.debug('Discarding record without identifiers:', record.source, record.sourceId);
      return null;
    }

    const seen = record.firstSeen ? toDate(record.firstSeen) : this.now();
    const observedAt = Number.isNaN(seen.getTime()) ? this.now() : seen;

    const match = this.findMatch(email, phone);
    let customerId = match.customerId;
    let confidence = match.confidence;
    let reason = match.reason;

    if (match.corroborated) {
      logger.debug('Email match corroborated by phone:', record.source, record.sourceId);
    }
    if (match.conflict && email && phone) {
      this.conflicts.push({
        email,
        phone,
        emailCustomerId: match.conflict.emailCustomerId,
        phoneCustomerId: match.conflict.phoneCustomerId,
        source: record.source,
        sourceId: record.sourceId,
      });
      logger.warn('Email and phone resolve to different customers:', record.source, record.sourceId);
    }

    if (!customerId) {
      customerId = this.createCustomer(email, phone, name, record.source, observedAt);
      confidence = 'exact';
      reason = 'new_customer';
    } else {
      this.touchCustomer(customerId, record.source, observedAt);
    }

    if (email && !this.emailIndex.has(email)) {
      this.emailIndex.set(email, customerId);
      this.fuzzyIndex.add(email, customerId);
    }
    if (phone && !this.phoneIndex.has(phone)) {
      this.phoneIndex.set(phone, customerId);
    }

    if (email) {
      this.recordIdentifier(customerId, 'email', record.email ?? email, email, record, confidence, reason, observedAt);
    }
    if (phone) {
      this.recordIdentifier(customerId, 'phone', record.phone ?? phone, phone, record, confidence, reason, observedAt);
    }

    return customerId;
  }

  addRecords(records: Iterable<ContactRecord>): void {
    for (const record of records) this.addRecord(record);
  }

  /** Find an existing customer for normalized identifiers. */
  findMatch(email: string | null, phone: string | null): MatchResult {
    const emailCustomer = email ? this.emailIndex.get(email) : undefined;
    const phoneCustomer = phone ? this.phoneIndex.get(phone) : undefined;

    if (emailCustomer) {
      const result: MatchResult = { customerId: emailCustomer, confidence: 'high', reason: 'exact_email' };
      if (phoneCustomer === emailCustomer) {
        result.corroborated = true;
      } else if (phoneCustomer) {
        result.conflict = { emailCustomerId: emailCustomer, phoneCustomerId: phoneCustomer };
      }
      return result;
    }

    if (phoneCustomer) {
      return { customerId: phoneCustomer, confidence: 'high', reason: 'exact_phone' };
    }

    if (email) {
      const fuzzy = this.fuzzyIndex.findFirst(email, this.fuzzyThreshold);
      if (fuzzy) {
        return {
          customerId: fuzzy.customerId,
          confidence: 'low',
          reason: `fuzzy_email_${Math.floor(fuzzy.similarity * 100)}`,
        };
      }
    }

    return NO_MATCH;
  }

  /** Customers ordered by `firstSeen`; identifiers by customer then observation time. */
  build(): ResolutionResult {
    const customers = [...this.customers.values()]
      .sort((a, b) => a.firstSeen.getTime() - b.firstSeen.getTime())
      .map(toCustomer);

    const identifiers = [...this.identifiers].sort((a, b) =>
      a.customerId === b.customerId
        ? a.observedAt.localeCompare(b.observedAt)
        : a.customerId.localeCompare(b.customerId));

    return { customers, identifiers, conflicts: [...this.conflicts] };
  }

  summary(): ResolutionSummary {
    const byConfidence: Record<MatchConfidence, number> = { high: 0, medium: 0, low: 0, exact: 0 };
    for (const identifier of this.identifiers) byConfidence[identifier.matchConfidence]++;

    const bySource: Record<string, number> = {};
    for (const customer of this.customers.values()) {
      for (const source of customer.sources) bySource[source] = (bySource[source] ?? 0) + 1;
    }

    return {
      customers: this.customers.size,
      identifiers: this.identifiers.length,
      discarded: this.discarded,
      conflicts: this.conflicts.length,
      byConfidence,
      bySource,
    };
  }

  private createCustomer(
    email: string | null,
    phone: string | null,
    name: string | null,
    source: string,
    seen: Date,
  ): string {
    let customerId = this.assignId({ email, phone });
    if (this.customers.has(customerId)) {
      logger.warn('Id allocator returned a taken id, generating a fresh one:', customerId);
      customerId = generateId();
    }
    this.customers.set(customerId, {
      customerId,
      primaryEmail: email,
      primaryPhone: phone,
      primaryName: name,
      firstSeen: seen,
      lastSeen: seen,
      sources: [source],
    });
    return customerId;
  }

  /** Widens the customer's seen window to include `seen`; batches need not be date-ordered. */
  private touchCustomer(customerId: string, source: string, seen: Date): void {
    const customer = this.customers.get(customerId);
    if (!customer) return;
    if (seen < customer.firstSeen) customer.firstSeen = seen;
    if (seen > customer.lastSeen) customer.lastSeen = seen;
    if (!customer.sources.includes(source)) customer.sources.push(source);
  }

  private recordIdentifier(
    customerId: string,
    identifierType: IdentifierType,
    rawValue: string,
    normalizedValue: string,
    record: ContactRecord,
    matchConfidence: MatchConfidence,
    matchReason: string,
    observedAt: Date,
  ): void {
    const customer = this.customers.get(customerId);
    const primary = identifierType === 'email' ? customer?.primaryEmail : customer?.primaryPhone;
    this.identifiers.push({
      customerId,
      identifierType,
      rawValue,
      normalizedValue,
      source: record.source,
      sourceId: record.sourceId,
      matchConfidence,
      matchReason,
      observedAt: observedAt.toISOString(),
      isPrimary: normalizedValue === primary,
    });
  }
}

function toCustomer(state: CustomerState): Customer {
  return {
    customerId: state.customerId,
    primaryEmail: state.primaryEmail,
    primaryPhone: state.primaryPhone,
    primaryName: state.primaryName,
    firstSeen: state.firstSeen.toISOString(),
    lastSeen: state.lastSeen.toISOString(),
    sources: [...state.sources],
  };
}

/** Resolve a full batch in one call. */
export function resolveIdentities(records: Iterable<ContactRecord>, options: ResolverOptions = {}): ResolutionResult {
  const resolver = new IdentityResolver(options);
  resolver.addRecords(records);
  return resolver.build();
}

/**
 * Id allocator that keeps the ids of a previous registry stable: a new
 * customer whose primary email (or else phone) was a previous customer's
 * primary value gets that customer's id back.
 */
export function carryOverIds(previous: Customer[]): (seed: { email: string | null; phone: string | null }) => string {
  const byEmail = new Map<string, string>();
  const byPhone = new Map<string, string>();
  for (const customer of previous) {
    if (customer.primaryEmail && !byEmail.has(customer.primaryEmail)) byEmail.set(customer.primaryEmail, customer.customerId);
    if (customer.primaryPhone && !byPhone.has(customer.primaryPhone)) byPhone.set(customer.primaryPhone, customer.customerId);
  }
  const used = new Set<string>();

  return ({ email, phone }) => {
    const candidates = [email ? byEmail.get(email) : undefined, phone ? byPhone.get(phone) : undefined];
    for (const id of candidates) {
      if (id && !used.has(id)) {
        used.add(id);
        return id;
      }
    }
    return generateId();
  };
}
