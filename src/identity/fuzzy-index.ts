import { emailDomain } from './normalize.js';
import { domainsMatchWithTypoTolerance, fixDomainTypo, similarity } from './similarity.js';

export interface FuzzyMatch {
  customerId: string;
  email: string;
  similarity: number;
}

/**
 * Emails bucketed by typo-corrected domain. A fuzzy match requires the
 * domains to agree, so only the incoming email's bucket is ever scanned.
 */
export class FuzzyEmailIndex {
  private buckets = new Map<string, Array<{ email: string; customerId: string }>>();

  add(email: string, customerId: string): void {
    const key = bucketKey(email);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = [];
      this.buckets.set(key, bucket);
    }
    bucket.push({ email, customerId });
  }

  /** First entry, in insertion order, scoring at least `threshold`. */
  findFirst(email: string, threshold: number): FuzzyMatch | null {
    const bucket = this.buckets.get(bucketKey(email));
    if (!bucket) return null;

    const domain = emailDomain(email);
    for (const entry of bucket) {
      // The '' bucket holds addresses without a domain; those never match.
      if (!domainsMatchWithTypoTolerance(domain, emailDomain(entry.email))) continue;
      const score = similarity(email, entry.email);
      if (score >= threshold) {
        return { customerId: entry.customerId, email: entry.email, similarity: score };
      }
    }
    return null;
  }

  get size(): number {
    let total = 0;
    for (const bucket of this.buckets.values()) total += bucket.length;
    return total;
  }
}

function bucketKey(email: string): string {
  const domain = emailDomain(email);
  return domain ? fixDomainTypo(domain) : '';
}
