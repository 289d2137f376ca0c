export type IdentifierType = 'email' | 'phone';

/** `exact` marks a newly created customer: nothing had to be matched. */
export type MatchConfidence = 'high' | 'medium' | 'low' | 'exact';

/** One contact record as delivered by an upstream system. */
export interface ContactRecord {
  email?: string | null;
  phone?: string | null;
  name?: string | null;
  source: string;
  sourceId: string;
  firstSeen?: string;
}

export interface Customer {
  customerId: string;
  primaryEmail: string | null;
  primaryPhone: string | null;
  primaryName: string | null;
  firstSeen: string;
  lastSeen: string;
  sources: string[];
}

export interface Identifier {
  customerId: string;
  identifierType: IdentifierType;
  rawValue: string;
  normalizedValue: string;
  source: string;
  sourceId: string;
  matchConfidence: MatchConfidence;
  matchReason: string;
  observedAt: string;
  isPrimary: boolean;
}

/**
 * A record whose email and phone resolved to two different customers.
 * Recorded for review; the customers are never merged automatically.
 */
export interface IdentityConflict {
  email: string;
  phone: string;
  emailCustomerId: string;
  phoneCustomerId: string;
  source: string;
  sourceId: string;
}

export interface FamilyEdge {
  childCustomerId: string;
  parentCustomerId: string;
}

export interface CustomerSummary {
  customerId: string;
  primaryEmail?: string;
  primaryPhone?: string;
  primaryName?: string;
  sources: string[];
}

export function toSummary(customer: Customer): CustomerSummary {
  return {
    customerId: customer.customerId,
    primaryEmail: customer.primaryEmail ?? undefined,
    primaryPhone: customer.primaryPhone ?? undefined,
    primaryName: customer.primaryName ?? undefined,
    sources: customer.sources,
  };
}
