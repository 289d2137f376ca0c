import { describe, it, expect } from 'vitest';
import { getCustomerAbGroup } from '../../src/flags/ab-group.js';

describe('getCustomerAbGroup', () => {
  it('should bucket on the last hex digit of the email hash', () => {
    // md5 ends in "d" (13 % 10 = 3) and "f" (15 % 10 = 5)
    expect(getCustomerAbGroup({ customerId: 'c1', email: 'x@y.com' })).toBe('A');
    expect(getCustomerAbGroup({ customerId: 'c1', email: 'jane@example.com' })).toBe('B');
  });

  it('should ignore email casing and surrounding spaces', () => {
    expect(getCustomerAbGroup({ customerId: 'c1', email: '  Jane@Example.COM ' })).toBe('B');
  });

  it('should give customers sharing an email the same group', () => {
    const a = getCustomerAbGroup({ customerId: 'parent', email: 'pat@example.com' });
    const b = getCustomerAbGroup({ customerId: 'child', email: 'pat@example.com' });
    expect(a).toBe(b);
  });

  it('should hash phone digits when there is no email', () => {
    expect(getCustomerAbGroup({ customerId: 'c1', phone: '(555) 123-4567' })).toBe('A');
    expect(getCustomerAbGroup({ customerId: 'c2', phone: '555.123.4567' })).toBe('A');
  });

  it('should fall back to the customer id', () => {
    expect(getCustomerAbGroup({ customerId: 'c1' })).toBe('B');
    expect(getCustomerAbGroup({ customerId: 'cust-1' })).toBe('A');
  });

  it('should prefer an override', () => {
    expect(getCustomerAbGroup({ customerId: 'c1', email: 'x@y.com' }, { c1: 'B' })).toBe('B');
    expect(getCustomerAbGroup({ customerId: 'c2', email: 'x@y.com' }, { c1: 'B' })).toBe('A');
  });
});
