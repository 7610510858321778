import { canonicalizeAddress, isValidAddress, shortAddress, toTopicAddress } from '../src/utils/address';
import { ValidationError } from '../src/utils/errors';

const CHECKSUMMED = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';

describe('isValidAddress', () => {
  it('should accept lowercase, uppercase hex and checksummed forms', () => {
    expect(isValidAddress(CHECKSUMMED)).toBe(true);
    expect(isValidAddress(CHECKSUMMED.toLowerCase())).toBe(true);
    expect(isValidAddress('0x' + CHECKSUMMED.slice(2).toUpperCase())).toBe(true);
  });

  it('should accept an address without the 0x prefix', () => {
    expect(isValidAddress('5aaeb6053f3e94c9b9a09f33669435e7ef1beaed')).toBe(true);
  });

  it('should reject mixed case with a wrong checksum', () => {
    expect(isValidAddress('0x5aaeb6053F3E94C9b9A09f33669435E7Ef1BeAed')).toBe(false);
  });

  it('should reject wrong length and non-hex input', () => {
    expect(isValidAddress('0x1234')).toBe(false);
    expect(isValidAddress('0x' + 'g'.repeat(40))).toBe(false);
    expect(isValidAddress('')).toBe(false);
  });
});

describe('canonicalizeAddress', () => {
  it('should produce the checksummed form', () => {
    expect(canonicalizeAddress(CHECKSUMMED.toLowerCase())).toBe(CHECKSUMMED);
  });

  it('should be idempotent', () => {
    const once = canonicalizeAddress(CHECKSUMMED.toLowerCase());
    expect(canonicalizeAddress(once)).toBe(once);
  });

  it('should map every case variant to the same string', () => {
    const variants = [
      CHECKSUMMED,
      CHECKSUMMED.toLowerCase(),
      '0x' + CHECKSUMMED.slice(2).toUpperCase(),
      '0x5aaeb6053F3E94C9b9A09f33669435E7Ef1BeAed',
      ' ' + CHECKSUMMED + ' ',
      CHECKSUMMED.slice(2)
    ];
    expect(new Set(variants.map(canonicalizeAddress))).toEqual(new Set([CHECKSUMMED]));
  });

  it('should throw ValidationError for malformed input', () => {
    expect(() => canonicalizeAddress('0x123')).toThrow(ValidationError);
  });
});

describe('address helpers', () => {
  it('should pad an address to a 32-byte topic', () => {
    expect(toTopicAddress(CHECKSUMMED)).toBe('0x000000000000000000000000' + CHECKSUMMED.slice(2).toLowerCase());
  });

  it('should shorten for display', () => {
    expect(shortAddress(CHECKSUMMED)).toBe('0x5aAe...eAed');
    expect(shortAddress('0x12')).toBe('0x12');
  });
});
