import type { Customer, FamilyEdge } from '../types/index.js';

export interface ContactInfo {
  email?: string;
  phone?: string;
}

/**
 * Lookups the engine reads while evaluating. Built once per run and passed
 * in, so evaluation holds no mutable state of its own.
 */
export interface EvaluationContext {
  contacts: ReadonlyMap<string, ContactInfo>;
  /** child customer id -> parent customer ids, in edge order */
  parents: ReadonlyMap<string, readonly string[]>;
  /** parent customer id -> child customer ids */
  children: ReadonlyMap<string, readonly string[]>;
}

export interface ResolvedContact extends ContactInfo {
  usingParentContact: boolean;
}

export const EMPTY_CONTEXT: EvaluationContext = { contacts: new Map(), parents: new Map(), children: new Map() };

export function buildContactCache(customers: Customer[]): Map<string, ContactInfo> {
  const contacts = new Map<string, ContactInfo>();
  for (const customer of customers) {
    contacts.set(customer.customerId, {
      email: customer.primaryEmail ?? undefined,
      phone: customer.primaryPhone ?? undefined,
    });
  }
  return contacts;
}

function indexEdges(edges: FamilyEdge[], key: (edge: FamilyEdge) => string, value: (edge: FamilyEdge) => string): Map<string, string[]> {
  const index = new Map<string, string[]>();
  for (const edge of edges) {
    let list = index.get(key(edge));
    if (!list) {
      list = [];
      index.set(key(edge), list);
    }
    if (!list.includes(value(edge))) list.push(value(edge));
  }
  return index;
}

export function buildParentIndex(edges: FamilyEdge[]): Map<string, string[]> {
  return indexEdges(edges, edge => edge.childCustomerId, edge => edge.parentCustomerId);
}

export function buildChildIndex(edges: FamilyEdge[]): Map<string, string[]> {
  return indexEdges(edges, edge => edge.parentCustomerId, edge => edge.childCustomerId);
}

export function buildEvaluationContext(customers: Customer[], edges: FamilyEdge[]): EvaluationContext {
  return {
    contacts: buildContactCache(customers),
    parents: buildParentIndex(edges),
    children: buildChildIndex(edges),
  };
}

function hasContact(info: ContactInfo | undefined): info is ContactInfo {
  return !!(info && (info.email || info.phone));
}

/**
 * A customer's own contact details, or, when it has neither email nor
 * phone, those of the first linked parent that has some. One hop only.
 */
export function resolveContact(context: EvaluationContext, customerId: string): ResolvedContact {
  const own = context.contacts.get(customerId);
  if (hasContact(own)) {
    return { email: own.email, phone: own.phone, usingParentContact: false };
  }

  for (const parentId of context.parents.get(customerId) ?? []) {
    const parent = context.contacts.get(parentId);
    if (hasContact(parent)) {
      return { email: parent.email, phone: parent.phone, usingParentContact: true };
    }
  }

  return { usingParentContact: false };
}
