/**
 * Parsing raw value text into typed values.
 *
 * Auto-detection tries Logical, Complex, Real, Integer and then falls
 * back to Character. Logical goes first so `t`/`f` are not read as
 * names; Real goes before Integer so that `1d5` is never truncated to 1.
 */

import {
  InvalidSyntaxError,
  InvalidValueError,
  ValidationError,
} from "../core/errors.js";
import {
  INT64_MAX,
  INT64_MIN,
  NULL_VALUE,
  character,
  complex,
  integer,
  logical,
  real,
  type CharacterValue,
  type ComplexValue,
  type IntegerValue,
  type LogicalValue,
  type RealValue,
  type Value,
} from "./value.js";

export type TypeHint = "integer" | "real" | "complex" | "logical" | "character";

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/;

function stripKind(text: string): string {
  const underscore = text.indexOf("_");
  return underscore === -1 ? text : text.slice(0, underscore);
}

/**
 * Sign and digits only, ignoring a kind suffix.
 */
export function looksLikeInteger(text: string): boolean {
  return INTEGER_TEXT.test(stripKind(text.trim()));
}

/**
 * Parse any numeric literal (integer-looking text included) as a float.
 */
function parseFloatText(text: string): number | undefined {
  let normalized = stripKind(text.trim()).toLowerCase();

  switch (normalized) {
    case "inf":
    case "+inf":
    case "infinity":
    case "+infinity":
      return Number.POSITIVE_INFINITY;
    case "-inf":
    case "-infinity":
      return Number.NEGATIVE_INFINITY;
    case "nan":
    case "+nan":
    case "-nan":
      return Number.NaN;
  }

  normalized = normalized.replace("d", "e");
  return FLOAT_TEXT.test(normalized) ? Number(normalized) : undefined;
}

// ============================================================================
// Typed parsers
// ============================================================================

export function parseInteger(text: string): IntegerValue {
  const clean = stripKind(text.trim());
  if (INTEGER_TEXT.test(clean)) {
    const value = BigInt(clean);
    if (value >= INT64_MIN && value <= INT64_MAX) {
      return integer(value);
    }
  }
  throw new InvalidValueError("", text, "integer");
}

/**
 * Integer-looking text is rejected so the Real and Integer parsers
 * never both accept the same literal.
 */
export function parseReal(text: string): RealValue {
  if (!looksLikeInteger(text)) {
    const value = parseFloatText(text);
    if (value !== undefined) {
      return real(value);
    }
  }
  throw new InvalidValueError("", text, "real");
}

export function parseComplex(text: string): ComplexValue {
  const trimmed = text.trim();
  if (trimmed.length >= 2 && trimmed.startsWith("(") && trimmed.endsWith(")")) {
    const parts = trimmed.slice(1, -1).split(",");
    if (parts.length === 2) {
      const re = parseFloatText(parts[0] ?? "");
      const im = parseFloatText(parts[1] ?? "");
      if (re !== undefined && im !== undefined) {
        return complex(re, im);
      }
    }
  }
  throw new InvalidValueError("", text, "complex");
}

export function parseLogical(text: string): LogicalValue {
  const lower = text.trim().toLowerCase();
  switch (lower) {
    case ".true.":
    case ".t.":
    case "true":
    case "t":
      return logical(true);
    case ".false.":
    case ".f.":
    case "false":
    case "f":
      return logical(false);
  }
  if (lower.startsWith(".t")) return logical(true);
  if (lower.startsWith(".f")) return logical(false);
  throw new InvalidValueError("", text, "logical");
}

/**
 * Strip matching quotes and collapse doubled quote characters.
 */
export function parseCharacter(text: string): CharacterValue {
  const trimmed = text.trim();
  const quote = trimmed[0];
  if (
    trimmed.length >= 2 &&
    (quote === "'" || quote === '"') &&
    trimmed.endsWith(quote)
  ) {
    return character(trimmed.slice(1, -1).replaceAll(quote + quote, quote));
  }
  return character(trimmed);
}

/**
 * Parse value text, either as the hinted type or by auto-detection.
 */
export function parseValue(text: string, hint?: TypeHint): Value {
  const trimmed = text.trim();
  if (trimmed === "") {
    return NULL_VALUE;
  }

  switch (hint) {
    case "integer":
      return parseInteger(trimmed);
    case "real":
      return parseReal(trimmed);
    case "complex":
      return parseComplex(trimmed);
    case "logical":
      return parseLogical(trimmed);
    case "character":
      return parseCharacter(trimmed);
  }

  const detectors: ReadonlyArray<(t: string) => Value> = [
    parseLogical,
    parseComplex,
    parseReal,
    parseInteger,
  ];
  for (const detect of detectors) {
    try {
      return detect(trimmed);
    } catch (err) {
      if (!(err instanceof InvalidValueError)) {
        throw err;
      }
    }
  }
  return parseCharacter(trimmed);
}

// ============================================================================
// Classification helpers
// ============================================================================

/**
 * Heuristic: does the text read like a real literal?
 */
export function looksLikeReal(text: string): boolean {
  const lower = text.trim().toLowerCase();

  if (lower.includes("inf") || lower.includes("nan")) {
    return true;
  }

  const dot = lower.indexOf(".");
  if (dot !== -1) {
    // .true. / .false.
    if (lower.startsWith(".") && /[tf]/.test(lower)) {
      return false;
    }
    if (/\d/.test(lower.slice(0, dot)) || /\d/.test(lower.slice(dot + 1))) {
      return true;
    }
  }

  return /\d.*[ed]/.test(lower);
}

/**
 * Guess the type name a piece of text would parse as.
 */
export function inferType(text: string): TypeHint | "null" {
  const trimmed = text.trim();
  if (trimmed === "") return "null";

  try {
    parseLogical(trimmed);
    return "logical";
  } catch (err) {
    if (!(err instanceof InvalidValueError)) throw err;
  }

  if (trimmed.startsWith("(") && trimmed.endsWith(")") && trimmed.includes(",")) {
    return "complex";
  }
  if (
    (trimmed.startsWith("'") && trimmed.endsWith("'")) ||
    (trimmed.startsWith('"') && trimmed.endsWith('"'))
  ) {
    return "character";
  }
  if (looksLikeReal(trimmed)) return "real";
  if (looksLikeInteger(trimmed)) return "integer";
  return "character";
}

// ============================================================================
// Lists and repeats
// ============================================================================

/**
 * Split `"1, 'a,b', (1.0, 2.0)"` on commas outside quotes and
 * parentheses. Empty items, and a trailing comma, produce Null.
 */
export function parseValueList(text: string, hint?: TypeHint): Value[] {
  if (text.trim() === "") {
    return [];
  }

  const values: Value[] = [];
  let current = "";
  let quote: string | null = null;
  let depth = 0;

  const flush = (): void => {
    values.push(current.trim() === "" ? NULL_VALUE : parseValue(current, hint));
    current = "";
  };

  Array.from(text).forEach((ch, position) => {
    if (quote !== null) {
      if (ch === quote) quote = null;
      current += ch;
      return;
    }
    switch (ch) {
      case "'":
      case '"':
        quote = ch;
        break;
      case "(":
        depth++;
        break;
      case ")":
        depth--;
        if (depth < 0) {
          throw new InvalidSyntaxError("Unbalanced ')' in value list", position);
        }
        break;
      case ",":
        if (depth === 0) {
          flush();
          return;
        }
        break;
    }
    current += ch;
  });

  if (depth > 0) {
    throw new InvalidSyntaxError("Unclosed '(' in value list", text.length);
  }
  if (current.trim() !== "" || values.length > 0) {
    flush();
  }
  return values;
}

const REPEAT_COUNT = /^\d+$/;
const SIGNED_COUNT = /^[+-]\d+$/;

/** Largest `n` accepted in `n*value`; each repeat is expanded in memory. */
export const MAX_REPEAT_COUNT = 2 ** 24;

/**
 * Validate the count part of `n*value`.
 */
export function parseRepeatCount(text: string): number {
  const trimmed = text.trim();
  if (!REPEAT_COUNT.test(trimmed)) {
    throw new InvalidValueError("", trimmed, "repeat count");
  }
  const count = Number(trimmed);
  if (count > MAX_REPEAT_COUNT) {
    throw new InvalidValueError("", trimmed, `repeat count of at most ${MAX_REPEAT_COUNT}`);
  }
  return count;
}

/**
 * `"3*42"` gives `[3, 42]`, `"3*"` gives three nulls, and text without
 * a numeric `n*` prefix is a single value.
 */
export function parseRepeatExpression(text: string): [number, Value] {
  const star = text.indexOf("*");
  if (star !== -1) {
    const prefix = text.slice(0, star).trim();
    if (REPEAT_COUNT.test(prefix) || SIGNED_COUNT.test(prefix)) {
      const count = parseRepeatCount(prefix);
      return [count, parseValue(text.slice(star + 1))];
    }
  }
  return [1, parseValue(text)];
}

// ============================================================================
// Constraints
// ============================================================================

export interface ValueConstraints {
  integerRange?: readonly [bigint, bigint];
  realRange?: readonly [number, number];
  maxStringLength?: number;
  maxArrayLength?: number;
}

/**
 * Check a value (recursively, for arrays) against constraints.
 */
export function validateParsedValue(value: Value, constraints: ValueConstraints): void {
  switch (value.kind) {
    case "integer":
      if (constraints.integerRange) {
        const [min, max] = constraints.integerRange;
        if (value.value < min || value.value > max) {
          throw new ValidationError(
            `Integer ${value.value} is outside allowed range [${min}, ${max}]`
          );
        }
      }
      return;
    case "real":
      if (constraints.realRange) {
        const [min, max] = constraints.realRange;
        if (value.value < min || value.value > max) {
          throw new ValidationError(
            `Real ${value.value} is outside allowed range [${min}, ${max}]`
          );
        }
      }
      return;
    case "character": {
      const length = Array.from(value.value).length;
      if (constraints.maxStringLength !== undefined && length > constraints.maxStringLength) {
        throw new ValidationError(
          `String length ${length} exceeds maximum ${constraints.maxStringLength}`
        );
      }
      return;
    }
    case "array":
    case "multi_array":
      if (
        constraints.maxArrayLength !== undefined &&
        value.items.length > constraints.maxArrayLength
      ) {
        throw new ValidationError(
          `Array length ${value.items.length} exceeds maximum ${constraints.maxArrayLength}`
        );
      }
      for (const item of value.items) {
        validateParsedValue(item, constraints);
      }
      return;
    default:
      return;
  }
}
