import { normalizeEmail } from './email';

describe('normalizeEmail', () => {
  it('trims and lowercases an address', () => {
    expect(normalizeEmail('  Asha@Campus.Test ')).toBe('asha@campus.test');
  });

  it('returns null for blanks, missing values and non-addresses', () => {
    expect(normalizeEmail('   ')).toBeNull();
    expect(normalizeEmail(undefined)).toBeNull();
    expect(normalizeEmail(null)).toBeNull();
    expect(normalizeEmail('asha.campus.test')).toBeNull();
  });
});
