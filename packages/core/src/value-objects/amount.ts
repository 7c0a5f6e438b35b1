import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { ValidationError } from '../errors/index.js';

/**
 * Amount value object
 *
 * Fixed-point money with four fractional digits, held as a bigint count of
 * 1/10,000 units. Decimal text is converted exactly once, on the way in, and all
 * arithmetic afterwards is integer arithmetic.
 */

const SCALE_DIGITS = 4;
const SCALE = 10n ** BigInt(SCALE_DIGITS);

// Plain decimal numerals only; decimal.js would also accept hex, binary and octal literals
const DECIMAL_NUMERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

// Largest magnitude a signed 64-bit count of 1/10,000 units can hold
const MAX_SCALED = '9223372036854775807';

const ScalingDecimal = Decimal.clone({
  precision: 64,
  rounding: Decimal.ROUND_HALF_UP,
});

export class Amount {
  /**
   * Parse a decimal numeral, rounding half away from zero to the nearest 1/10,000.
   * Rejects empty, non-numeric and non-finite input.
   */
  static parse(value: string): Result<Amount, ValidationError> {
    const trimmed = value.trim();

    if (!DECIMAL_NUMERAL.test(trimmed)) {
      return err(
        new ValidationError(`Invalid amount "${value}"`, {
          additionalContext: { value },
        })
      );
    }

    const scaled = new ScalingDecimal(trimmed).times(SCALE.toString()).toDecimalPlaces(0, Decimal.ROUND_HALF_UP);
    if (scaled.abs().greaterThan(MAX_SCALED)) {
      return err(
        new ValidationError(`Amount "${value}" is out of range`, {
          additionalContext: { value },
        })
      );
    }

    return ok(new Amount(BigInt(scaled.toFixed(0))));
  }

  /**
   * Lenient parse: anything that is not a decimal numeral becomes zero.
   */
  static fromDecimalString(value: string | undefined): Amount {
    if (value === undefined) {
      return Amount.zero();
    }
    return Amount.parse(value).unwrapOr(Amount.zero());
  }

  static fromScaled(scaled: bigint): Amount {
    return new Amount(scaled);
  }

  static zero(): Amount {
    return new Amount(0n);
  }

  private constructor(private readonly value: bigint) {}

  /**
   * Integer count of 1/10,000 units
   */
  get scaled(): bigint {
    return this.value;
  }

  add(other: Amount): Amount {
    return new Amount(this.value + other.value);
  }

  subtract(other: Amount): Amount {
    return new Amount(this.value - other.value);
  }

  compare(other: Amount): -1 | 0 | 1 {
    if (this.value === other.value) return 0;
    return this.value < other.value ? -1 : 1;
  }

  gte(other: Amount): boolean {
    return this.value >= other.value;
  }

  equals(other: Amount): boolean {
    return this.value === other.value;
  }

  isZero(): boolean {
    return this.value === 0n;
  }

  /**
   * Render with exactly four fractional digits, e.g. "5.1234", "0.0000", "-3.0000"
   */
  toDecimalString(): string {
    const negative = this.value < 0n;
    const magnitude = negative ? -this.value : this.value;
    const whole = magnitude / SCALE;
    const fraction = (magnitude % SCALE).toString().padStart(SCALE_DIGITS, '0');
    return `${negative ? '-' : ''}${whole.toString()}.${fraction}`;
  }

  toString(): string {
    return this.toDecimalString();
  }

  /**
   * For JSON serialization (bigint has no JSON form)
   */
  toJSON(): string {
    return this.toDecimalString();
  }
}
