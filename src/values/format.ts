/**
 * Rendering values as namelist literal text.
 */

import { InvalidFormatError } from "../core/errors.js";
import { valuesEqual } from "./equal.js";
import type { Value } from "./value.js";

export type ComplexFormat = "parentheses" | "mathematical";

/**
 * `preserve` has no original quote to preserve at this layer and
 * falls back to single quotes.
 */
export type QuoteStyle = "single" | "double" | "preserve";

export interface FormatOptions {
  /** Upper-case logical literals */
  uppercase: boolean;
  /** Fixed number of fraction digits for reals */
  floatPrecision?: number;
  /** Reals with magnitude outside [min, max] switch to exponential form */
  exponentialThreshold?: readonly [number, number];
  /** Write exponents with `d` instead of `e` */
  useFortranDouble: boolean;
  complexFormat: ComplexFormat;
  quoteStyle: QuoteStyle;
  /** Wrap array elements onto new lines past this width */
  arrayElementWidth?: number;
}

export const DEFAULT_FORMAT_OPTIONS: Readonly<FormatOptions> = Object.freeze({
  uppercase: false,
  useFortranDouble: false,
  complexFormat: "parentheses",
  quoteStyle: "single",
});

/**
 * Merge overrides onto the defaults, rejecting unusable numbers.
 */
export function resolveFormatOptions(options: Partial<FormatOptions> = {}): FormatOptions {
  const resolved: FormatOptions = { ...DEFAULT_FORMAT_OPTIONS, ...options };
  const precision = resolved.floatPrecision;
  if (
    precision !== undefined &&
    (!Number.isInteger(precision) || precision < 0 || precision > 100)
  ) {
    throw new InvalidFormatError(
      `floatPrecision=${precision}`,
      "precision must be an integer between 0 and 100"
    );
  }
  const threshold = resolved.exponentialThreshold;
  if (threshold !== undefined && !(threshold[0] >= 0 && threshold[0] <= threshold[1])) {
    throw new InvalidFormatError(
      `exponentialThreshold=[${threshold.join(", ")}]`,
      "threshold must satisfy 0 <= min <= max"
    );
  }
  return resolved;
}

// ============================================================================
// Scalars
// ============================================================================

function formatExponential(value: number, options: FormatOptions): string {
  const text = value.toExponential(options.floatPrecision).replace("e+", "e");
  return options.useFortranDouble ? text.replace("e", "d") : text;
}

export function formatReal(value: number, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "+inf" : "-inf";
  }

  const threshold = options.exponentialThreshold;
  if (threshold !== undefined) {
    const magnitude = Math.abs(value);
    if (magnitude !== 0 && (magnitude < threshold[0] || magnitude > threshold[1])) {
      return formatExponential(value, options);
    }
  }

  if (options.floatPrecision !== undefined) {
    return value.toFixed(options.floatPrecision);
  }

  const text = String(value).replace("e+", "e");
  // A bare `2` would read back as an integer
  return text.includes(".") || text.includes("e") ? text : `${text}.0`;
}

export function formatComplex(
  re: number,
  im: number,
  options: FormatOptions = DEFAULT_FORMAT_OPTIONS
): string {
  const reText = formatReal(re, options);
  const imText = formatReal(im, options);
  if (options.complexFormat === "mathematical") {
    return im >= 0 ? `${reText}+${imText}*i` : `${reText}${imText}*i`;
  }
  return `(${reText}, ${imText})`;
}

export function formatLogical(value: boolean, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
  const text = value ? ".true." : ".false.";
  return options.uppercase ? text.toUpperCase() : text;
}

export function formatString(value: string, options: FormatOptions = DEFAULT_FORMAT_OPTIONS): string {
  const quote = options.quoteStyle === "double" ? '"' : "'";
  return `${quote}${value.replaceAll(quote, quote + quote)}${quote}`;
}

// ============================================================================
// Values
// ============================================================================

function joinElements(parts: readonly string[], options: FormatOptions): string {
  const width = options.arrayElementWidth;
  if (width === undefined) {
    return parts.join(", ");
  }

  let result = "";
  let lineLength = 0;
  parts.forEach((part, i) => {
    if (i > 0) {
      if (lineLength + part.length + 2 > width) {
        result += ",\n    ";
        lineLength = 4;
      } else {
        result += ", ";
        lineLength += 2;
      }
    }
    result += part;
    lineLength += part.length;
  });
  return result;
}

/**
 * Literal text for a value. Derived types have no single-literal form
 * and are written field by field by the group formatter.
 */
export function formatValue(
  value: Value,
  options: FormatOptions = DEFAULT_FORMAT_OPTIONS
): string {
  switch (value.kind) {
    case "integer":
      return value.value.toString();
    case "real":
      return formatReal(value.value, options);
    case "complex":
      return formatComplex(value.re, value.im, options);
    case "logical":
      return formatLogical(value.value, options);
    case "character":
      return formatString(value.value, options);
    case "array":
    case "multi_array":
      return joinElements(value.items.map((item) => formatValue(item, options)), options);
    case "derived_type":
      return "<derived_type>";
    case "derived_type_array":
      return "<derived_type_array>";
    case "null":
      return "";
  }
}

/**
 * `n*value` for a run of n identical elements, or the plain literal.
 */
export function formatWithRepeat(
  value: Value,
  count: number,
  options: FormatOptions = DEFAULT_FORMAT_OPTIONS
): string {
  const text = formatValue(value, options);
  return count <= 1 ? text : `${count}*${text}`;
}

/**
 * Collapse runs of equal elements: `[1, 2, 2, 2, 3]` becomes
 * `"1, 3*2, 3"`. Presentation only; the structure is not kept.
 */
export function formatArrayWithRepeats(
  values: readonly Value[],
  options: FormatOptions = DEFAULT_FORMAT_OPTIONS
): string {
  const parts: string[] = [];
  let index = 0;
  while (index < values.length) {
    const current = values[index];
    if (current === undefined) break;
    let run = 1;
    for (let next = values[index + run]; next !== undefined && valuesEqual(next, current); next = values[index + run]) {
      run++;
    }
    parts.push(formatWithRepeat(current, run, options));
    index += run;
  }
  return parts.join(", ");
}
