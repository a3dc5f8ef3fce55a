import { DivideByZeroError, DomainError, FormatError } from "@/math/errors";
import { RationalNumber } from "@/math/RationalNumber";
import { describe, expect, it } from "vitest";

const r = (text: string) => RationalNumber.parse(text);

describe("RationalNumber", () => {
  describe("of", () => {
    it("should reduce to lowest terms", () => {
      const value = RationalNumber.of(6n, 8n);
      expect(value.numerator).toBe(3n);
      expect(value.denominator).toBe(4n);
    });

    it("should move the sign to the numerator", () => {
      expect(RationalNumber.of(2, -4).toFraction()).toBe("-1/2");
      expect(RationalNumber.of(-3, -9).toFraction()).toBe("1/3");
    });

    it("should reject a zero denominator", () => {
      expect(() => RationalNumber.of(1n, 0n)).toThrow(DivideByZeroError);
      expect(() => RationalNumber.of(1n, 0n)).toThrow("Denominator cannot be zero");
    });

    it("should reject non-integer number components", () => {
      expect(() => RationalNumber.of(1.5)).toThrow(FormatError);
    });

    it("should normalize zero to 0/1", () => {
      const zero = RationalNumber.of(0n, -7n);
      expect(zero.numerator).toBe(0n);
      expect(zero.denominator).toBe(1n);
      expect(zero.isZero).toBe(true);
    });
  });

  describe("parse", () => {
    it("should parse integers and decimals", () => {
      expect(r("42").toFraction()).toBe("42");
      expect(r("3.14").toFraction()).toBe("157/50");
      expect(r("-0.5").toFraction()).toBe("-1/2");
      expect(r("+7").toFraction()).toBe("7");
    });

    it("should accept an empty side of the decimal point", () => {
      expect(r(".5").toFraction()).toBe("1/2");
      expect(r("5.").toFraction()).toBe("5");
    });

    it("should trim surrounding whitespace", () => {
      expect(r("  42  ").toFraction()).toBe("42");
    });

    it("should parse scientific notation", () => {
      expect(r("1.5E3").toFraction()).toBe("1500");
      expect(r("1.5e-3").toFraction()).toBe("3/2000");
      expect(r("-2E2").toFraction()).toBe("-200");
      expect(r("1e+21").toFraction()).toBe("1000000000000000000000");
    });

    it("should reject malformed text", () => {
      for (const text of ["", "   ", "abc", "1.2.3", "1e2e3", "1e", "e5", ".", "+", "1,5", "--1"]) {
        expect(() => r(text), text).toThrow(FormatError);
      }
    });

    it("should reject exponents beyond the supported range", () => {
      expect(() => r("1e100001")).toThrow("Exponent out of range: 100001");
      expect(r("1e-100000").isZero).toBe(false);
    });

    it("should report the empty-value message", () => {
      expect(() => r("")).toThrow("Value cannot be empty");
    });
  });

  describe("fromNumber", () => {
    it("should take the shortest decimal text of the double", () => {
      expect(RationalNumber.fromNumber(0.1).equals(r("0.1"))).toBe(true);
      expect(RationalNumber.fromNumber(-2.5e-7).toFraction()).toBe("-1/4000000");
      expect(RationalNumber.fromNumber(1e21).toFraction()).toBe("1000000000000000000000");
    });

    it("should reject non-finite values", () => {
      expect(() => RationalNumber.fromNumber(Number.NaN)).toThrow(DomainError);
      expect(() => RationalNumber.fromNumber(Number.POSITIVE_INFINITY)).toThrow(
        "Result is not a finite number"
      );
    });
  });

  describe("arithmetic", () => {
    it("should add without rounding", () => {
      expect(r("0.1").add(r("0.2")).equals(r("0.3"))).toBe(true);
    });

    it("should recover exact values through division and multiplication", () => {
      const third = RationalNumber.ONE.divide(RationalNumber.of(3n));
      expect(third.multiply(RationalNumber.of(3n)).equals(RationalNumber.ONE)).toBe(true);
    });

    it("should subtract to negative values", () => {
      expect(r("2.5").subtract(r("4")).toFraction()).toBe("-3/2");
    });

    it("should keep full precision on long operands", () => {
      const a = r("123.456789012345678901234567890");
      const b = r("987.654321098765432109876543210");
      expect(a.add(b).toString()).toBe("1111.1111101111111110111111111");
      expect(a.subtract(b).toString()).toBe("-864.19753208641975320864197532");
    });

    it("should be commutative and associative for add and multiply", () => {
      const a = r("1.25");
      const b = RationalNumber.of(-2n, 7n);
      const c = r("3e-4");

      expect(a.add(b).equals(b.add(a))).toBe(true);
      expect(a.multiply(b).equals(b.multiply(a))).toBe(true);
      expect(a.add(b).add(c).equals(a.add(b.add(c)))).toBe(true);
      expect(a.multiply(b).multiply(c).equals(a.multiply(b.multiply(c)))).toBe(true);
    });

    it("should throw when dividing by zero", () => {
      expect(() => r("5").divide(RationalNumber.ZERO)).toThrow(DivideByZeroError);
      expect(() => r("5").divide(r("0.000"))).toThrow("Cannot divide by zero");
    });

    it("should throw for the reciprocal of zero", () => {
      expect(() => RationalNumber.ZERO.reciprocal()).toThrow(DivideByZeroError);
    });

    it("should negate, take absolute values and reciprocals", () => {
      const value = RationalNumber.of(-2n, 3n);
      expect(value.negate().toFraction()).toBe("2/3");
      expect(value.abs().toFraction()).toBe("2/3");
      expect(value.reciprocal().toFraction()).toBe("-3/2");
    });
  });

  describe("predicates", () => {
    it("should classify values", () => {
      expect(RationalNumber.ONE.isOne).toBe(true);
      expect(r("1.0").isOne).toBe(true);
      expect(r("-0.5").isNegative).toBe(true);
      expect(RationalNumber.of(6n, 3n).isInteger).toBe(true);
      expect(r("0.5").isInteger).toBe(false);
    });
  });

  describe("comparison", () => {
    it("should order values", () => {
      const third = RationalNumber.of(1n, 3n);
      const half = RationalNumber.of(1n, 2n);

      expect(third.compareTo(half)).toBe(-1);
      expect(half.compareTo(third)).toBe(1);
      expect(half.compareTo(r("0.5"))).toBe(0);
      expect(RationalNumber.of(-1n, 2n).lessThan(third)).toBe(true);
      expect(half.greaterThanOrEqual(r("0.50"))).toBe(true);
      expect(third.lessThanOrEqual(half)).toBe(true);
      expect(third.greaterThan(half)).toBe(false);
    });

    it("should treat equal values from different sources as equal", () => {
      const a = r("0.50");
      const b = RationalNumber.of(2n, 4n);
      expect(a.equals(b)).toBe(true);
      expect(a.hashCode()).toBe(b.hashCode());
    });

    it("should distinguish a value from its negation in hashCode", () => {
      expect(r("0.5").hashCode()).not.toBe(r("-0.5").hashCode());
    });
  });

  describe("sqrt", () => {
    it("should return exact roots of perfect squares", () => {
      expect(RationalNumber.of(9n).sqrt().toString(10)).toBe("3");
      expect(RationalNumber.of(1n, 4n).sqrt().equals(RationalNumber.of(1n, 2n))).toBe(true);
    });

    it("should converge for irrational roots", () => {
      const root = RationalNumber.of(2n).sqrt();
      expect(root.multiply(root).toString(9)).toBe("2");
      expect(root.toString(20)).toBe("1.4142135623730950488");
    });

    it("should return zero for zero", () => {
      expect(RationalNumber.ZERO.sqrt().isZero).toBe(true);
    });

    it("should take roots of values beyond double range", () => {
      expect(r("1e400").sqrt().equals(r("1e200"))).toBe(true);

      const value = r("2e400");
      const root = value.sqrt();
      const relativeError = root.multiply(root).divide(value).subtract(RationalNumber.ONE).abs();
      expect(relativeError.lessThan(r("1e-30"))).toBe(true);
    });

    it("should stay within the absolute tolerance for tiny values", () => {
      const root = r("1e-400").sqrt();
      expect(root.lessThan(r("1e-30"))).toBe(true);
      expect(root.toString(30)).toBe("0");
    });

    it("should keep iterates on a bounded denominator", () => {
      expect(r("3.7").sqrt().denominator <= 10n ** 32n).toBe(true);
      expect(r("123456789.987654321").sqrt().toString(20)).toBe("11111.11110499999999887499");
    });

    it("should reject negative values", () => {
      expect(() => r("-4").sqrt()).toThrow(DomainError);
      expect(() => r("-4").sqrt()).toThrow("Cannot compute square root of negative number");
    });
  });

  describe("toString", () => {
    it("should print integers without a fraction", () => {
      expect(RationalNumber.of(-42n).toString(2)).toBe("-42");
    });

    it("should stop on terminating decimals", () => {
      expect(RationalNumber.of(1n, 8n).toString()).toBe("0.125");
      expect(RationalNumber.of(-7n, 2n).toString()).toBe("-3.5");
    });

    it("should truncate rather than round", () => {
      expect(RationalNumber.of(1n, 3n).toString(5)).toBe("0.33333");
      expect(RationalNumber.of(2n, 3n).toString(5)).toBe("0.66666");
      expect(RationalNumber.of(-1n, 3n).toString(3)).toBe("-0.333");
    });

    it("should print a negative value that truncates to zero as 0", () => {
      expect(RationalNumber.of(-1n, 10n ** 40n).toString(5)).toBe("0");
    });

    it("should fall back to 32 digits for a non-positive precision", () => {
      expect(RationalNumber.of(1n, 3n).toString(0)).toBe(`0.${"3".repeat(32)}`);
    });

    it("should render 1/3 to 50 digits", () => {
      expect(RationalNumber.of(1n, 3n).toString(50)).toBe(`0.${"3".repeat(50)}`);
    });

    it("should render small scientific values", () => {
      expect(r("1.23456789E-15").toString(20)).toBe("0.00000000000000123456");
    });
  });

  describe("round trip", () => {
    it("should print parsed decimals back to their normalized text at 30 digits", () => {
      const cases: [string, string][] = [
        ["0", "0"],
        ["42", "42"],
        ["-17", "-17"],
        ["3.14159", "3.14159"],
        ["-0.001", "-0.001"],
        ["0.30", "0.3"],
        ["12.500", "12.5"],
        ["-2.000", "-2"],
        ["0.123456789012345678901234567890", "0.12345678901234567890123456789"],
        ["-9.000000000000000000000000000001", "-9.000000000000000000000000000001"],
        ["0.000000000000000000000000000007", "0.000000000000000000000000000007"],
      ];

      for (const [input, expected] of cases) {
        expect(r(input).toString(30), input).toBe(expected);
      }
    });
  });

  describe("toNumber", () => {
    it("should convert ordinary fractions", () => {
      expect(RationalNumber.of(1n, 4n).toNumber()).toBe(0.25);
      expect(RationalNumber.of(-3n, 2n).toNumber()).toBe(-1.5);
    });

    it("should scale components that overflow a double", () => {
      const value = RationalNumber.of(10n ** 400n + 1n, 10n ** 399n);
      expect(value.toNumber()).toBeCloseTo(10, 10);
    });
  });

  describe("toFraction", () => {
    it("should print numerator over denominator", () => {
      expect(RationalNumber.of(-10n, 4n).toFraction()).toBe("-5/2");
      expect(RationalNumber.of(4n, 2n).toFraction()).toBe("2");
    });
  });
});
