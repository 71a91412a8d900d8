import { ApiError } from '../middleware/errorHandler.js';

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d{1,2}))?$/;
const MINOR_UNITS = 100n;

/**
 * Fixed-point amount with two decimal places, backed by a bigint count of
 * minor units (paise). Signed, so it doubles as a balance delta.
 */
export class Money {
  private constructor(private readonly minor: bigint) {}

  static zero(): Money {
    return new Money(0n);
  }

  static fromMinor(minor: bigint): Money {
    return new Money(minor);
  }

  /**
   * Parses "120", "120.5" or "-7.25". Numbers are accepted for request
   * bodies, but must not carry more than two decimals once printed.
   */
  static parse(value: string | number): Money {
    const text = typeof value === 'number' ? String(value) : value.trim();
    const match = DECIMAL_PATTERN.exec(text);

    if (!match) {
      throw ApiError.badRequest('WAL_002', `Invalid amount: ${text}`);
    }

    const [, sign, whole, fraction = ''] = match;
    const minor = BigInt(whole) * MINOR_UNITS + BigInt(fraction.padEnd(2, '0'));
    return new Money(sign ? -minor : minor);
  }

  add(other: Money): Money {
    return new Money(this.minor + other.minor);
  }

  subtract(other: Money): Money {
    return new Money(this.minor - other.minor);
  }

  negate(): Money {
    return new Money(-this.minor);
  }

  abs(): Money {
    return this.minor < 0n ? this.negate() : this;
  }

  isNegative(): boolean {
    return this.minor < 0n;
  }

  isPositive(): boolean {
    return this.minor > 0n;
  }

  isZero(): boolean {
    return this.minor === 0n;
  }

  isLessThan(other: Money): boolean {
    return this.minor < other.minor;
  }

  equals(other: Money): boolean {
    return this.minor === other.minor;
  }

  toMinor(): bigint {
    return this.minor;
  }

  toString(): string {
    const magnitude = this.minor < 0n ? -this.minor : this.minor;
    const whole = magnitude / MINOR_UNITS;
    const fraction = (magnitude % MINOR_UNITS).toString().padStart(2, '0');
    return `${this.minor < 0n ? '-' : ''}${whole}.${fraction}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export function sumMoney(amounts: Iterable<Money>): Money {
  let total = Money.zero();
  for (const amount of amounts) {
    total = total.add(amount);
  }
  return total;
}
