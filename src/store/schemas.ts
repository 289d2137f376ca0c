import { z } from 'zod';

const timestamp = z.string().refine(value => !Number.isNaN(Date.parse(value)), 'Invalid timestamp');
const nullableString = z.string().nullish();

export const ContactRecordSchema = z.object({
  email: nullableString,
  phone: nullableString,
  name: nullableString,
  source: z.string().min(1),
  sourceId: z.string().min(1),
  firstSeen: timestamp.optional(),
});

export const CustomerEventSchema = z.object({
  customerId: z.string().min(1),
  eventType: z.string().min(1),
  eventDate: timestamp,
  source: z.string().default('unknown'),
  payload: z.record(z.unknown()).default({}),
});

export const FamilyEdgeSchema = z.object({
  childCustomerId: z.string().min(1),
  parentCustomerId: z.string().min(1),
});

export const CustomerSchema = z.object({
  customerId: z.string(),
  primaryEmail: z.string().nullable(),
  primaryPhone: z.string().nullable(),
  primaryName: z.string().nullable(),
  firstSeen: z.string(),
  lastSeen: z.string(),
  sources: z.array(z.string()),
});

export const IdentifierSchema = z.object({
  customerId: z.string(),
  identifierType: z.enum(['email', 'phone']),
  rawValue: z.string(),
  normalizedValue: z.string(),
  source: z.string(),
  sourceId: z.string(),
  matchConfidence: z.enum(['high', 'medium', 'low', 'exact']),
  matchReason: z.string(),
  observedAt: z.string(),
  isPrimary: z.boolean(),
});

export const IdentityConflictSchema = z.object({
  email: z.string(),
  phone: z.string(),
  emailCustomerId: z.string(),
  phoneCustomerId: z.string(),
  source: z.string(),
  sourceId: z.string(),
});

export const FlagSchema = z.object({
  customerId: z.string(),
  flagType: z.string(),
  triggeredDate: timestamp,
  flagData: z.record(z.unknown()),
  priority: z.enum(['high', 'medium', 'low']),
  flagAddedDate: timestamp,
});

export const ExperimentEntrySchema = z.object({
  customerId: z.string(),
  experimentId: z.string(),
  group: z.string(),
  entryFlag: z.string(),
  entryDate: z.string(),
});
