/**
 * Explicit, fallible conversions between value kinds.
 *
 * Widening (integer to real or complex, real to complex) always works.
 * Real to integer needs a whole, finite, in-range number. Complex never
 * narrows.
 */

import { TypeConversionError } from "../core/errors.js";
import { formatValue } from "./format.js";
import type { Value, ValueKind } from "./value.js";

const TWO_POW_63 = 2 ** 63;

function conversionError(value: Value, to: string): TypeConversionError {
  return new TypeConversionError(value.kind, to, formatValue(value));
}

function isWholeNumber(value: number): boolean {
  return Number.isFinite(value) && Math.trunc(value) === value;
}

function fitsInteger(value: number): boolean {
  return isWholeNumber(value) && value >= -TWO_POW_63 && value < TWO_POW_63;
}

export function asInteger(value: Value): bigint {
  if (value.kind === "integer") {
    return value.value;
  }
  if (value.kind === "real" && fitsInteger(value.value)) {
    return BigInt(value.value);
  }
  throw conversionError(value, "integer");
}

export function asReal(value: Value): number {
  switch (value.kind) {
    case "real":
      return value.value;
    case "integer":
      return Number(value.value);
    default:
      throw conversionError(value, "real");
  }
}

export function asComplex(value: Value): [number, number] {
  switch (value.kind) {
    case "complex":
      return [value.re, value.im];
    case "real":
      return [value.value, 0];
    case "integer":
      return [Number(value.value), 0];
    default:
      throw conversionError(value, "complex");
  }
}

export function asLogical(value: Value): boolean {
  if (value.kind === "logical") {
    return value.value;
  }
  throw conversionError(value, "logical");
}

export function asCharacter(value: Value): string {
  if (value.kind === "character") {
    return value.value;
  }
  throw conversionError(value, "character");
}

/**
 * Elements of an Array, or the flat elements of a MultiArray.
 */
export function asArray(value: Value): readonly Value[] {
  if (value.kind === "array" || value.kind === "multi_array") {
    return value.items;
  }
  throw conversionError(value, "array");
}

/**
 * Whether the matching `as*` conversion would succeed for this value's kind.
 */
export function canConvertTo(value: Value, target: ValueKind): boolean {
  switch (value.kind) {
    case "integer":
      return target === "integer" || target === "real" || target === "complex";
    case "real":
      if (target === "integer") return fitsInteger(value.value);
      return target === "real" || target === "complex";
    case "multi_array":
      return target === "multi_array" || target === "array";
    default:
      return value.kind === target;
  }
}
