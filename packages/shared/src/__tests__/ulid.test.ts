import { describe, it, expect } from 'vitest';
import { generateUlid, generatePublicCode } from '../utils/ulid';

const CROCKFORD = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

function decode(code: string): number {
  return [...code].reduce((value, char) => value * 32 + CROCKFORD.indexOf(char), 0);
}

describe('ULID utilities', () => {
  describe('generateUlid', () => {
    it('generates a 26-character string', () => {
      expect(generateUlid()).toHaveLength(26);
    });

    it('generates unique IDs', () => {
      const ids = new Set(Array.from({ length: 100 }, () => generateUlid()));
      expect(ids.size).toBe(100);
    });

    it('generates sortable IDs', () => {
      const id1 = generateUlid();
      const id2 = generateUlid();
      expect(id2 >= id1).toBe(true);
    });
  });

  describe('generatePublicCode', () => {
    it('generates an 8-character Crockford code', () => {
      expect(generatePublicCode()).toMatch(/^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{8}$/);
    });

    it('rarely repeats', () => {
      const codes = new Set(Array.from({ length: 200 }, () => generatePublicCode()));
      expect(codes.size).toBe(200);
    });

    it('does not follow from the previous code', () => {
      // Codes made in the same millisecond must not count up from each other.
      const codes = Array.from({ length: 50 }, () => generatePublicCode());
      const steps = codes.slice(1).map((code, i) => decode(code) - decode(codes[i] ?? code));
      expect(steps.filter((step) => step === 1)).toEqual([]);
    });
  });
});
