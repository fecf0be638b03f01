/**
 * Tests for the value model: construction, parsing, conversion, equality.
 */

import { describe, expect, it } from "vitest";
import {
  InvalidSyntaxError,
  InvalidValueError,
  TypeConversionError,
  ValidationError,
} from "../src/core/errors.js";
import {
  asArray,
  asComplex,
  asInteger,
  asReal,
  canConvertTo,
} from "../src/values/convert.js";
import { valuesEqual } from "../src/values/equal.js";
import {
  inferType,
  looksLikeReal,
  parseInteger,
  parseLogical,
  MAX_REPEAT_COUNT,
  parseRepeatCount,
  parseRepeatExpression,
  parseValue,
  parseValueList,
  validateParsedValue,
} from "../src/values/parse.js";
import {
  NULL_VALUE,
  array,
  arrayLength,
  character,
  complex,
  derivedType,
  integer,
  isArray,
  logical,
  multiArray,
  real,
  summary,
  toValue,
} from "../src/values/value.js";

describe("toValue", () => {
  it("should lift native data", () => {
    expect(toValue(3)).toEqual(integer(3));
    expect(toValue(2.5)).toEqual(real(2.5));
    expect(toValue(true)).toEqual(logical(true));
    expect(toValue("abc")).toEqual(character("abc"));
    expect(toValue(null)).toBe(NULL_VALUE);
    expect(toValue([1, "a"])).toEqual(array([integer(1), character("a")]));
  });

  it("should keep values as they are", () => {
    const value = real(2);
    expect(toValue(value)).toBe(value);
  });
});

describe("inspection", () => {
  it("should summarise values", () => {
    expect(summary(real(1.5))).toBe("real(1.500000)");
    expect(summary(integer(7))).toBe("integer(7)");
    expect(summary(character("abcdefghijklmnopqrstuvwxyz"))).toBe(
      'character("abcdefghijklmnopq...")'
    );
    expect(summary(multiArray([1, 2, 3, 4, 5, 6], [2, 3]))).toBe("multi_array[2x3]");
    expect(summary(derivedType([["a", 1], ["b", 2]]))).toBe("derived_type(2 fields)");
  });

  it("should report array lengths", () => {
    expect(arrayLength(array([1, 2, 3]))).toBe(3);
    expect(arrayLength(integer(1))).toBeUndefined();
    expect(isArray(multiArray([1, 2], [2, 1]))).toBe(true);
    expect(isArray(character("x"))).toBe(false);
  });

  it("should lower-case derived type field names", () => {
    expect([...derivedType([["Mass", 1]]).fields.keys()]).toEqual(["mass"]);
  });
});

describe("parseValue", () => {
  it("should auto-detect each type", () => {
    expect(parseValue("42")).toEqual(integer(42));
    expect(parseValue("-3")).toEqual(integer(-3));
    expect(parseValue("1.5")).toEqual(real(1.5));
    expect(parseValue("1d5")).toEqual(real(100000));
    expect(parseValue("2.5e-1_dp")).toEqual(real(0.25));
    expect(parseValue(".true.")).toEqual(logical(true));
    expect(parseValue("f")).toEqual(logical(false));
    expect(parseValue("(1.0, 2.0)")).toEqual(complex(1, 2));
    expect(parseValue("(1, -2)")).toEqual(complex(1, -2));
    expect(parseValue("'it''s'")).toEqual(character("it's"));
    expect(parseValue("hello")).toEqual(character("hello"));
    expect(parseValue("  ")).toBe(NULL_VALUE);
  });

  it("should read special reals", () => {
    expect(parseValue("inf")).toEqual(real(Number.POSITIVE_INFINITY));
    expect(parseValue("-inf")).toEqual(real(Number.NEGATIVE_INFINITY));
    const nan = parseValue("nan");
    expect(nan.kind).toBe("real");
    expect(nan.kind === "real" && Number.isNaN(nan.value)).toBe(true);
  });

  it("should dispatch on a type hint", () => {
    expect(parseValue("7", "integer")).toEqual(integer(7));
    expect(parseValue("t", "character")).toEqual(character("t"));
    expect(() => parseValue("7", "real")).toThrow(InvalidValueError);
    expect(() => parseValue("abc", "logical")).toThrow(InvalidValueError);
  });

  it("should enforce the 64-bit integer range", () => {
    expect(parseInteger("9223372036854775807")).toEqual(integer(9223372036854775807n));
    expect(() => parseInteger("9223372036854775808")).toThrow(InvalidValueError);
  });

  it("should accept abbreviated dotted logicals", () => {
    expect(parseLogical(".Tru")).toEqual(logical(true));
    expect(parseLogical(".fals.")).toEqual(logical(false));
  });
});

describe("value lists", () => {
  it("should split outside quotes and parentheses", () => {
    expect(parseValueList("1, 'a,b', (1.0, 2.0),")).toEqual([
      integer(1),
      character("a,b"),
      complex(1, 2),
      NULL_VALUE,
    ]);
  });

  it("should give nulls for empty items", () => {
    expect(parseValueList("1,,3")).toEqual([integer(1), NULL_VALUE, integer(3)]);
    expect(parseValueList("")).toEqual([]);
  });

  it("should reject an unbalanced parenthesis", () => {
    expect(() => parseValueList("1, 2)")).toThrow(InvalidSyntaxError);
    expect(() => parseValueList("(1, 2")).toThrow(InvalidSyntaxError);
  });

  it("should parse repeat expressions", () => {
    expect(parseRepeatExpression("3*42")).toEqual([3, integer(42)]);
    expect(parseRepeatExpression("2*")).toEqual([2, NULL_VALUE]);
    expect(parseRepeatExpression("abc")).toEqual([1, character("abc")]);
    expect(() => parseRepeatExpression("-2*5")).toThrow(InvalidValueError);
    expect(parseRepeatCount(String(MAX_REPEAT_COUNT))).toBe(MAX_REPEAT_COUNT);
    expect(() => parseRepeatCount(String(MAX_REPEAT_COUNT + 1))).toThrow(InvalidValueError);
  });
});

describe("classification", () => {
  it("should infer type names", () => {
    expect(inferType("")).toBe("null");
    expect(inferType(".true.")).toBe("logical");
    expect(inferType("(1, 2)")).toBe("complex");
    expect(inferType("'x'")).toBe("character");
    expect(inferType("1.5")).toBe("real");
    expect(inferType("7")).toBe("integer");
    expect(inferType("abc")).toBe("character");
  });

  it("should recognise real-looking text", () => {
    expect(looksLikeReal("1e5")).toBe(true);
    expect(looksLikeReal("3.")).toBe(true);
    expect(looksLikeReal("abc")).toBe(false);
  });
});

describe("validateParsedValue", () => {
  it("should enforce ranges and lengths", () => {
    expect(() => validateParsedValue(integer(5), { integerRange: [0n, 3n] })).toThrow(
      ValidationError
    );
    expect(() => validateParsedValue(array([1, 2, 3]), { maxArrayLength: 2 })).toThrow(
      "Validation error: Array length 3 exceeds maximum 2"
    );
    expect(() => validateParsedValue(array([1, 9]), { integerRange: [0n, 5n] })).toThrow(
      ValidationError
    );
    expect(() => validateParsedValue(character("abc"), { maxStringLength: 3 })).not.toThrow();
  });
});

describe("conversions", () => {
  it("should widen numbers", () => {
    expect(asReal(integer(2))).toBe(2);
    expect(asComplex(integer(2))).toEqual([2, 0]);
    expect(asComplex(real(1.5))).toEqual([1.5, 0]);
    expect(asInteger(real(3))).toBe(3n);
  });

  it("should refuse lossy narrowing", () => {
    expect(() => asInteger(real(3.5))).toThrow(TypeConversionError);
    expect(() => asInteger(real(3.5))).toThrow("Cannot convert '3.5' from real to integer");
    expect(() => asReal(complex(1, 1))).toThrow(TypeConversionError);
    expect(() => asReal(character("1.0"))).toThrow(TypeConversionError);
  });

  it("should predict conversions", () => {
    expect(canConvertTo(real(2), "integer")).toBe(true);
    expect(canConvertTo(real(2.5), "integer")).toBe(false);
    expect(canConvertTo(integer(1), "complex")).toBe(true);
    expect(canConvertTo(logical(true), "integer")).toBe(false);
    expect(canConvertTo(character("a"), "character")).toBe(true);
  });

  it("should refuse whole reals outside the integer range", () => {
    expect(canConvertTo(real(1e30), "integer")).toBe(false);
    expect(() => asInteger(real(1e30))).toThrow(TypeConversionError);
    expect(canConvertTo(real(-(2 ** 63)), "integer")).toBe(true);
    expect(asInteger(real(-(2 ** 63)))).toBe(-(2n ** 63n));
  });

  it("should flatten multi-dimensional arrays", () => {
    const grid = multiArray([1, 2, 3, 4], [2, 2]);
    expect(canConvertTo(grid, "array")).toBe(true);
    expect(canConvertTo(grid, "multi_array")).toBe(true);
    expect(asArray(grid)).toEqual([integer(1), integer(2), integer(3), integer(4)]);
    expect(canConvertTo(array([1]), "multi_array")).toBe(false);
  });
});

describe("valuesEqual", () => {
  it("should compare structurally", () => {
    expect(valuesEqual(array([1, 2]), array([1, 2]))).toBe(true);
    expect(valuesEqual(array([1, 2]), array([1, 3]))).toBe(false);
    expect(valuesEqual(integer(1), real(1))).toBe(false);
    expect(
      valuesEqual(derivedType([["a", 1]]), derivedType([["A", 1]]))
    ).toBe(true);
  });

  it("should treat NaN as unequal to itself", () => {
    expect(valuesEqual(real(Number.NaN), real(Number.NaN))).toBe(false);
  });
});
