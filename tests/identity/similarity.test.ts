import { describe, it, expect } from 'vitest';
import {
  DOMAIN_TYPO_CORRECTIONS, domainsMatchWithTypoTolerance, fixDomainTypo, levenshtein, similarity,
} from '../../src/identity/similarity.js';
import { FuzzyEmailIndex } from '../../src/identity/fuzzy-index.js';

describe('levenshtein', () => {
  it('should count edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});

describe('similarity', () => {
  it('should be 1 for identical strings', () => {
    expect(similarity('a@x.com', 'a@x.com')).toBe(1);
  });

  it('should be 0 when either side is empty', () => {
    expect(similarity('', 'a@x.com')).toBe(0);
    expect(similarity('a@x.com', '')).toBe(0);
  });

  it('should score one edit in ten characters as exactly 0.9', () => {
    expect(similarity('abc@xy.com', 'abd@xy.com')).toBe(0.9);
  });

  it('should score one edit in nine characters below 0.9', () => {
    expect(similarity('ab@xy.com', 'ac@xy.com')).toBeCloseTo(0.889, 3);
    expect(similarity('ab@xy.com', 'ac@xy.com')).toBeLessThan(0.9);
  });
});

describe('fixDomainTypo', () => {
  it('should correct a misspelled TLD', () => {
    expect(fixDomainTypo('gmail.con')).toBe('gmail.com');
    expect(fixDomainTypo('example.ogr')).toBe('example.org');
  });

  it('should work on a whole address', () => {
    expect(fixDomainTypo('Jane@Gmail.CON')).toBe('jane@gmail.com');
  });

  it('should leave correct and dotless domains alone', () => {
    expect(fixDomainTypo('example.org')).toBe('example.org');
    expect(fixDomainTypo('localhost')).toBe('localhost');
    expect(fixDomainTypo('')).toBe('');
  });

  it('should not treat inherited object keys as typos', () => {
    expect(fixDomainTypo('example.constructor')).toBe('example.constructor');
  });

  it('should map every known typo to its correct TLD', () => {
    for (const [typo, correct] of Object.entries(DOMAIN_TYPO_CORRECTIONS)) {
      expect(fixDomainTypo(`x@gmail.${typo}`)).toBe(fixDomainTypo(`x@gmail.${correct}`));
    }
  });
});

describe('domainsMatchWithTypoTolerance', () => {
  it('should match domains equal after correction', () => {
    expect(domainsMatchWithTypoTolerance('gmail.con', 'gmail.com')).toBe(true);
    expect(domainsMatchWithTypoTolerance('GMAIL.com', 'gmail.com')).toBe(true);
  });

  it('should not match different domains', () => {
    expect(domainsMatchWithTypoTolerance('gmail.com', 'yahoo.com')).toBe(false);
  });

  it('should not match missing domains', () => {
    expect(domainsMatchWithTypoTolerance(null, 'gmail.com')).toBe(false);
  });
});

describe('FuzzyEmailIndex', () => {
  it('should return the first entry over the threshold in insertion order', () => {
    const index = new FuzzyEmailIndex();
    index.add('abc@xy.com', 'first');
    index.add('abe@xy.com', 'second');

    const match = index.findFirst('abd@xy.com', 0.9);
    expect(match).toEqual({ customerId: 'first', email: 'abc@xy.com', similarity: 0.9 });
  });

  it('should only compare emails in the same corrected domain', () => {
    const index = new FuzzyEmailIndex();
    index.add('abc@xz.com', 'other-domain');
    expect(index.findFirst('abc@xy.com', 0.5)).toBeNull();
  });

  it('should bucket typo domains with their correct form', () => {
    const index = new FuzzyEmailIndex();
    index.add('jane.doe@gmail.com', 'c1');
    expect(index.findFirst('jane.doe@gmail.con', 0.9)?.customerId).toBe('c1');
    expect(index.size).toBe(1);
  });
});
