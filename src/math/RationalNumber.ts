import { DivideByZeroError, DomainError, FormatError } from "./errors";

/** Fractional digits rendered when no precision is given */
export const DEFAULT_PRECISION = 32;

/** Newton iteration stops once successive estimates differ by less than this */
const SQRT_TOLERANCE_DIGITS = 30n;
const SQRT_MAX_ITERATIONS = 50;
/** Square-root iterates live on a grid of 10^-32 */
const SQRT_GRID_DIGITS = 32n;

/** Largest |exponent| accepted in scientific notation */
const MAX_EXPONENT = 100_000;

const MANTISSA_PATTERN = /^([+-]?)(\d*)(?:\.(\d*))?$/;
const EXPONENT_PATTERN = /^[+-]?\d+$/;

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

function gcd(a: bigint, b: bigint): bigint {
  a = abs(a);
  b = abs(b);
  while (b !== 0n) {
    [a, b] = [b, a % b];
  }
  return a;
}

function bitLength(value: bigint): number {
  return value === 0n ? 0 : abs(value).toString(2).length;
}

/** floor(sqrt(value)) for value >= 0 */
function isqrt(value: bigint): bigint {
  if (value < 2n) return value;

  let x = 1n << BigInt(Math.ceil(bitLength(value) / 2));
  for (;;) {
    const y = (x + value / x) >> 1n;
    if (y >= x) return x;
    x = y;
  }
}

/**
 * RationalNumber - Immutable exact fraction of two arbitrary-precision integers
 *
 * Invariants held by every instance:
 * - denominator > 0 (the sign lives in the numerator)
 * - gcd(|numerator|, denominator) === 1
 *
 * +, -, *, / never round. Precision is only dropped when rendering with
 * toString(precision) or when converting to a double.
 */
export class RationalNumber {
  static readonly ZERO = new RationalNumber(0n, 1n);
  static readonly ONE = new RationalNumber(1n, 1n);

  readonly numerator: bigint;
  readonly denominator: bigint;

  private constructor(numerator: bigint, denominator: bigint) {
    this.numerator = numerator;
    this.denominator = denominator;
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  /**
   * Create a fraction from integer components, reduced to lowest terms.
   * @throws DivideByZeroError if the denominator is zero
   */
  static of(numerator: bigint | number, denominator: bigint | number = 1n): RationalNumber {
    const n = RationalNumber.toBigInt(numerator);
    let d = RationalNumber.toBigInt(denominator);
    if (d === 0n) {
      throw new DivideByZeroError("Denominator cannot be zero");
    }

    let num = n;
    if (d < 0n) {
      num = -num;
      d = -d;
    }

    const divisor = gcd(num, d);
    return new RationalNumber(num / divisor, d / divisor);
  }

  /**
   * Parse decimal or scientific-notation text ("-12.5", ".5", "1.2E-3").
   * @throws FormatError for anything that is not a single finite number
   */
  static parse(text: string): RationalNumber {
    const value = text.trim();
    if (value.length === 0) {
      throw new FormatError("Value cannot be empty");
    }

    const markers = value.match(/[eE]/g)?.length ?? 0;
    if (markers > 1) {
      throw new FormatError(`Invalid scientific notation format: "${value}"`);
    }
    if (markers === 0) {
      return RationalNumber.parseDecimal(value);
    }

    const markerIndex = value.search(/[eE]/);
    const mantissa = RationalNumber.parseDecimal(value.slice(0, markerIndex));
    const exponentText = value.slice(markerIndex + 1);
    if (!EXPONENT_PATTERN.test(exponentText)) {
      throw new FormatError(`Invalid exponent: "${exponentText}"`);
    }

    const exponent = Number(exponentText);
    if (Math.abs(exponent) > MAX_EXPONENT) {
      throw new FormatError(`Exponent out of range: ${exponentText}`);
    }

    const power = 10n ** BigInt(Math.abs(exponent));
    return exponent >= 0
      ? RationalNumber.of(mantissa.numerator * power, mantissa.denominator)
      : RationalNumber.of(mantissa.numerator, mantissa.denominator * power);
  }

  /**
   * Lift a double into the exact representation via its shortest round-trip text.
   * The result is exactly the decimal the double prints as, not its binary value.
   */
  static fromNumber(value: number): RationalNumber {
    if (!Number.isFinite(value)) {
      throw new DomainError("Result is not a finite number");
    }
    return RationalNumber.parse(String(value));
  }

  private static parseDecimal(text: string): RationalNumber {
    if ((text.match(/\./g)?.length ?? 0) > 1) {
      throw new FormatError(`Invalid decimal format: "${text}"`);
    }

    const match = MANTISSA_PATTERN.exec(text);
    if (!match) {
      throw new FormatError(`Invalid number format: "${text}"`);
    }

    const [, sign, integerDigits, fractionDigits = ""] = match;
    const digits = integerDigits + fractionDigits;
    if (digits.length === 0) {
      throw new FormatError(`Invalid number format: "${text}"`);
    }

    const numerator = BigInt(digits) * (sign === "-" ? -1n : 1n);
    return RationalNumber.of(numerator, 10n ** BigInt(fractionDigits.length));
  }

  private static toBigInt(value: bigint | number): bigint {
    if (typeof value === "bigint") return value;
    if (!Number.isInteger(value)) {
      throw new FormatError(`Expected an integer component, got ${value}`);
    }
    return BigInt(value);
  }

  // ===========================================================================
  // PREDICATES
  // ===========================================================================

  get isZero(): boolean {
    return this.numerator === 0n;
  }

  get isOne(): boolean {
    return this.numerator === 1n && this.denominator === 1n;
  }

  get isNegative(): boolean {
    return this.numerator < 0n;
  }

  get isInteger(): boolean {
    return this.denominator === 1n;
  }

  // ===========================================================================
  // ARITHMETIC
  // ===========================================================================

  add(other: RationalNumber): RationalNumber {
    return RationalNumber.of(
      this.numerator * other.denominator + other.numerator * this.denominator,
      this.denominator * other.denominator
    );
  }

  subtract(other: RationalNumber): RationalNumber {
    return RationalNumber.of(
      this.numerator * other.denominator - other.numerator * this.denominator,
      this.denominator * other.denominator
    );
  }

  multiply(other: RationalNumber): RationalNumber {
    return RationalNumber.of(this.numerator * other.numerator, this.denominator * other.denominator);
  }

  /**
   * @throws DivideByZeroError if other is zero
   */
  divide(other: RationalNumber): RationalNumber {
    if (other.isZero) {
      throw new DivideByZeroError();
    }
    return RationalNumber.of(this.numerator * other.denominator, this.denominator * other.numerator);
  }

  negate(): RationalNumber {
    return new RationalNumber(-this.numerator, this.denominator);
  }

  abs(): RationalNumber {
    return this.isNegative ? this.negate() : this;
  }

  /**
   * @throws DivideByZeroError for zero
   */
  reciprocal(): RationalNumber {
    return RationalNumber.ONE.divide(this);
  }

  /**
   * Square root by Newton-Raphson in exact arithmetic.
   *
   * Seeded with the integer square root of the value scaled by 10^64, so the
   * seed is within 10^-32 of the root at any magnitude. Each iterate is
   * rounded up to the 10^-32 grid: iterates stay at or above the root and
   * their size stays bounded. The tolerance is absolute (1e-30), so very
   * small values converge to fewer significant digits.
   *
   * @throws DomainError for negative values
   */
  sqrt(): RationalNumber {
    if (this.isNegative) {
      throw new DomainError("Cannot compute square root of negative number");
    }
    if (this.isZero) {
      return RationalNumber.ZERO;
    }

    const grid = 10n ** SQRT_GRID_DIGITS;
    const tolerance = RationalNumber.of(1n, 10n ** SQRT_TOLERANCE_DIGITS);
    const two = RationalNumber.of(2n);

    const seed = isqrt((this.numerator * grid * grid) / this.denominator);
    let estimate = RationalNumber.of(seed > 0n ? seed : 1n, grid);
    for (let i = 0; i < SQRT_MAX_ITERATIONS; i++) {
      const next = estimate.add(this.divide(estimate)).divide(two).ceilToGrid(grid);
      if (next.subtract(estimate).abs().lessThan(tolerance)) {
        return next;
      }
      estimate = next;
    }
    return estimate;
  }

  /** Smallest multiple of 1/grid not below this value */
  private ceilToGrid(grid: bigint): RationalNumber {
    const scaled = this.numerator * grid;
    const quotient = scaled / this.denominator;
    const ceiling = scaled % this.denominator > 0n ? quotient + 1n : quotient;
    return RationalNumber.of(ceiling, grid);
  }

  // ===========================================================================
  // COMPARISON
  // ===========================================================================

  /** Cross-multiplied comparison; valid because both denominators are positive */
  compareTo(other: RationalNumber): -1 | 0 | 1 {
    const left = this.numerator * other.denominator;
    const right = other.numerator * this.denominator;
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  }

  equals(other: RationalNumber): boolean {
    return this.compareTo(other) === 0;
  }

  lessThan(other: RationalNumber): boolean {
    return this.compareTo(other) < 0;
  }

  lessThanOrEqual(other: RationalNumber): boolean {
    return this.compareTo(other) <= 0;
  }

  greaterThan(other: RationalNumber): boolean {
    return this.compareTo(other) > 0;
  }

  greaterThanOrEqual(other: RationalNumber): boolean {
    return this.compareTo(other) >= 0;
  }

  /** Hash consistent with equals(), since instances are always reduced */
  hashCode(): number {
    const key = this.toFraction();
    let hash = 0;
    for (let i = 0; i < key.length; i++) {
      hash = (Math.imul(hash, 31) + key.charCodeAt(i)) | 0;
    }
    return hash;
  }

  // ===========================================================================
  // CONVERSION
  // ===========================================================================

  /** Nearest double; components too large for a double are scaled down first */
  toNumber(): number {
    const direct = Number(this.numerator) / Number(this.denominator);
    if (Number.isFinite(direct) && (direct !== 0 || this.isZero)) {
      return direct;
    }

    const shift = Math.max(bitLength(this.numerator), bitLength(this.denominator)) - 1000;
    if (shift <= 0) return direct;

    const scaledDenominator = this.denominator >> BigInt(shift);
    if (scaledDenominator === 0n) {
      return this.isNegative ? -Infinity : Infinity;
    }
    return Number(this.numerator >> BigInt(shift)) / Number(scaledDenominator);
  }

  /** "numerator/denominator", or just the numerator for integers */
  toFraction(): string {
    return this.isInteger ? this.numerator.toString() : `${this.numerator}/${this.denominator}`;
  }

  /**
   * Render as decimal text by long division.
   *
   * Emits at most `precision` fractional digits (truncating, not rounding),
   * stops early on an exact terminating decimal, and strips trailing zeros.
   */
  toString(precision: number = DEFAULT_PRECISION): string {
    if (this.isInteger) {
      return this.numerator.toString();
    }

    const digits = precision > 0 ? Math.floor(precision) : DEFAULT_PRECISION;
    const magnitude = abs(this.numerator);
    const quotient = magnitude / this.denominator;
    let remainder = magnitude % this.denominator;

    let fraction = "";
    for (let i = 0; i < digits && remainder !== 0n; i++) {
      remainder *= 10n;
      fraction += (remainder / this.denominator).toString();
      remainder %= this.denominator;
    }
    fraction = fraction.replace(/0+$/, "");

    const body = fraction.length > 0 ? `${quotient}.${fraction}` : quotient.toString();
    return this.isNegative && body !== "0" ? `-${body}` : body;
  }
}
