/**
 * Tests for value formatting.
 */

import { describe, expect, it } from "vitest";
import { InvalidFormatError } from "../src/core/errors.js";
import {
  DEFAULT_FORMAT_OPTIONS,
  formatArrayWithRepeats,
  formatComplex,
  formatReal,
  formatString,
  formatValue,
  formatWithRepeat,
  resolveFormatOptions,
} from "../src/values/format.js";
import {
  NULL_VALUE,
  array,
  character,
  complex,
  integer,
  logical,
  real,
} from "../src/values/value.js";

describe("formatReal", () => {
  it("should always mark reals as reals", () => {
    expect(formatReal(2)).toBe("2.0");
    expect(formatReal(1.5)).toBe("1.5");
    expect(formatReal(-0.25)).toBe("-0.25");
    expect(formatReal(1e21)).toBe("1e21");
    expect(formatReal(1e-7)).toBe("1e-7");
  });

  it("should write non-finite values", () => {
    expect(formatReal(Number.POSITIVE_INFINITY)).toBe("+inf");
    expect(formatReal(Number.NEGATIVE_INFINITY)).toBe("-inf");
    expect(formatReal(Number.NaN)).toBe("nan");
  });

  it("should honour a fixed precision", () => {
    const options = resolveFormatOptions({ floatPrecision: 3 });
    expect(formatReal(1.23456, options)).toBe("1.235");
    expect(formatReal(2, options)).toBe("2.000");
  });

  it("should switch to exponents outside the threshold", () => {
    const options = resolveFormatOptions({ exponentialThreshold: [1e-3, 1e3] });
    expect(formatReal(12345.6, options)).toBe("1.23456e4");
    expect(formatReal(0.5, options)).toBe("0.5");
    expect(formatReal(0.0001, options)).toBe("1e-4");
    expect(
      formatReal(12345.6, resolveFormatOptions({ exponentialThreshold: [1e-3, 1e3], useFortranDouble: true }))
    ).toBe("1.23456d4");
  });
});

describe("formatComplex", () => {
  it("should use parentheses by default", () => {
    expect(formatComplex(1, -2)).toBe("(1.0, -2.0)");
  });

  it("should support mathematical notation", () => {
    const options = resolveFormatOptions({ complexFormat: "mathematical" });
    expect(formatComplex(1, 2, options)).toBe("1.0+2.0*i");
    expect(formatComplex(1, -2, options)).toBe("1.0-2.0*i");
  });
});

describe("formatString", () => {
  it("should double embedded quotes", () => {
    expect(formatString("it's")).toBe("'it''s'");
    expect(formatString('say "hi"', resolveFormatOptions({ quoteStyle: "double" }))).toBe(
      '"say ""hi"""'
    );
  });
});

describe("formatValue", () => {
  it("should write scalars", () => {
    expect(formatValue(integer(-4))).toBe("-4");
    expect(formatValue(logical(true))).toBe(".true.");
    expect(formatValue(logical(false), resolveFormatOptions({ uppercase: true }))).toBe(".FALSE.");
    expect(formatValue(character("hello"))).toBe("'hello'");
    expect(formatValue(complex(0.5, 1))).toBe("(0.5, 1.0)");
    expect(formatValue(NULL_VALUE)).toBe("");
  });

  it("should join array elements", () => {
    expect(formatValue(array([1, 2, 3]))).toBe("1, 2, 3");
    expect(formatValue(array([real(1), NULL_VALUE, real(3)]))).toBe("1.0, , 3.0");
  });

  it("should wrap arrays at the element width", () => {
    const options = resolveFormatOptions({ arrayElementWidth: 8 });
    expect(formatValue(array([100, 200, 300]), options)).toBe("100, 200,\n    300");
  });
});

describe("repeats", () => {
  it("should prefix counts", () => {
    expect(formatWithRepeat(integer(0), 3)).toBe("3*0");
    expect(formatWithRepeat(integer(0), 1)).toBe("0");
  });

  it("should collapse runs", () => {
    expect(formatArrayWithRepeats(array([1, 2, 2, 2, 3]).items)).toBe("1, 3*2, 3");
  });
});

describe("resolveFormatOptions", () => {
  it("should start from the defaults", () => {
    expect(resolveFormatOptions()).toEqual({ ...DEFAULT_FORMAT_OPTIONS });
  });

  it("should reject unusable settings", () => {
    expect(() => resolveFormatOptions({ floatPrecision: -1 })).toThrow(InvalidFormatError);
    expect(() => resolveFormatOptions({ exponentialThreshold: [10, 1] })).toThrow(
      InvalidFormatError
    );
  });
});
