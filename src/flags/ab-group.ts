import { createHash } from 'node:crypto';

export type AbGroup = 'A' | 'B';

export interface AbGroupInput {
  customerId: string;
  email?: string;
  phone?: string;
}

/**
 * Deterministic A/B assignment. Hashing the email (else the phone digits)
 * puts a household sharing contact details in the same group; the customer
 * id is the last resort. Last hex digit mod 10: 0-4 is A, 5-9 is B.
 */
export function getCustomerAbGroup(input: AbGroupInput, overrides: Readonly<Record<string, AbGroup>> = {}): AbGroup {
  const override = overrides[input.customerId];
  if (override) return override;

  const email = input.email?.trim().toLowerCase();
  const phoneDigits = input.phone?.replace(/\D/g, '');

  let seed: string;
  if (email) seed = email;
  else if (phoneDigits) seed = phoneDigits;
  else seed = input.customerId;

  return bucketOf(seed) <= 4 ? 'A' : 'B';
}

function bucketOf(seed: string): number {
  const digest = createHash('md5').update(seed).digest('hex');
  return parseInt(digest[digest.length - 1], 16) % 10;
}
