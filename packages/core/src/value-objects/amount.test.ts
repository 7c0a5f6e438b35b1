import { describe, expect, it } from 'vitest';

import { ValidationError } from '../errors/index.js';

import { Amount } from './amount.js';

describe('Amount', () => {
  describe('parse', () => {
    it('should store four fractional digits as a scaled integer', () => {
      const amount = Amount.parse('5.1234')._unsafeUnwrap();

      expect(amount.scaled).toBe(51234n);
      expect(amount.toDecimalString()).toBe('5.1234');
    });

    it('should scale whole and short fractional values', () => {
      expect(Amount.parse('3')._unsafeUnwrap().scaled).toBe(30000n);
      expect(Amount.parse('3.0')._unsafeUnwrap().scaled).toBe(30000n);
      expect(Amount.parse('.5')._unsafeUnwrap().scaled).toBe(5000n);
      expect(Amount.parse('1e2')._unsafeUnwrap().scaled).toBe(1000000n);
    });

    it('should trim surrounding whitespace', () => {
      expect(Amount.parse('  2.5 ')._unsafeUnwrap().scaled).toBe(25000n);
    });

    it('should round to the nearest 1/10000 with ties away from zero', () => {
      expect(Amount.parse('1.23456')._unsafeUnwrap().scaled).toBe(12346n);
      expect(Amount.parse('1.23454')._unsafeUnwrap().scaled).toBe(12345n);
      expect(Amount.parse('1.23455')._unsafeUnwrap().scaled).toBe(12346n);
      expect(Amount.parse('-1.23455')._unsafeUnwrap().scaled).toBe(-12346n);
      expect(Amount.parse('0.00005')._unsafeUnwrap().scaled).toBe(1n);
    });

    it('should reject text that is not a decimal numeral', () => {
      const result = Amount.parse('abc');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.message).toBe('Invalid amount "abc"');
        expect(result.error.code).toBe('VALIDATION_ERROR');
      }
    });

    it('should reject empty, non-finite and non-decimal literals', () => {
      expect(Amount.parse('').isErr()).toBe(true);
      expect(Amount.parse('Infinity').isErr()).toBe(true);
      expect(Amount.parse('NaN').isErr()).toBe(true);
      expect(Amount.parse('0x10').isErr()).toBe(true);
      expect(Amount.parse('1,5').isErr()).toBe(true);
    });

    it('should reject amounts beyond the signed 64-bit scaled range', () => {
      const result = Amount.parse('1e30');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('Amount "1e30" is out of range');
      }
    });
  });

  describe('fromDecimalString', () => {
    it('should parse valid numerals like parse', () => {
      expect(Amount.fromDecimalString('7.25').scaled).toBe(72500n);
    });

    it('should fall back to zero for unparseable or missing input', () => {
      expect(Amount.fromDecimalString('not-a-number').isZero()).toBe(true);
      expect(Amount.fromDecimalString('').isZero()).toBe(true);
      expect(Amount.fromDecimalString(undefined).isZero()).toBe(true);
    });

    it('should reproduce inputs with at most four fractional digits', () => {
      for (const text of ['0.0001', '5.1234', '100.5000', '-42.0700', '123456789.9999']) {
        expect(Amount.fromDecimalString(text).toDecimalString()).toBe(text);
      }
    });
  });

  describe('arithmetic', () => {
    it('should add and subtract on the scaled integers', () => {
      const a = Amount.fromScaled(30000n);
      const b = Amount.fromScaled(12345n);

      expect(a.add(b).scaled).toBe(42345n);
      expect(a.subtract(b).scaled).toBe(17655n);
      expect(b.subtract(a).scaled).toBe(-17655n);
    });

    it('should not mutate the operands', () => {
      const a = Amount.fromScaled(10n);
      a.add(Amount.fromScaled(5n));

      expect(a.scaled).toBe(10n);
    });

    it('should compare amounts', () => {
      const small = Amount.fromScaled(1n);
      const large = Amount.fromScaled(2n);

      expect(small.compare(large)).toBe(-1);
      expect(large.compare(small)).toBe(1);
      expect(small.compare(Amount.fromScaled(1n))).toBe(0);
      expect(large.gte(small)).toBe(true);
      expect(small.gte(small)).toBe(true);
      expect(small.gte(large)).toBe(false);
      expect(small.equals(Amount.fromScaled(1n))).toBe(true);
    });
  });

  describe('toDecimalString', () => {
    it('should always render four fractional digits', () => {
      expect(Amount.zero().toDecimalString()).toBe('0.0000');
      expect(Amount.fromScaled(15000n).toDecimalString()).toBe('1.5000');
      expect(Amount.fromScaled(-30000n).toDecimalString()).toBe('-3.0000');
      expect(Amount.fromScaled(-5n).toDecimalString()).toBe('-0.0005');
    });

    it('should serialize to the decimal string in JSON', () => {
      expect(JSON.stringify({ amount: Amount.fromScaled(15000n) })).toBe('{"amount":"1.5000"}');
    });
  });
});
