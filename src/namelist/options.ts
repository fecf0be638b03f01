/**
 * Output options for canonical namelist text.
 */

import {
  resolveFormatOptions,
  type FormatOptions,
} from "../values/format.js";

export interface WriteOptions {
  /** Overwrite an existing output file */
  force: boolean;
  /** Wrap array values past this line width; 0 disables wrapping */
  columnWidth: number;
  /** Prefix for every assignment line */
  indent: string;
  /** Terminate each assignment with a comma */
  endComma: boolean;
  /** Upper-case names and logical literals */
  uppercase: boolean;
  floatPrecision?: number;
  sortGroups: boolean;
  sortVariables: boolean;
  /** Array origin written when a variable has no start index of its own */
  defaultStartIndex: number;
  /** Further value formatting (quote style, complex style, exponents) */
  format?: Partial<FormatOptions>;
}

export const DEFAULT_WRITE_OPTIONS: Readonly<WriteOptions> = Object.freeze({
  force: false,
  columnWidth: 72,
  indent: "    ",
  endComma: false,
  uppercase: false,
  sortGroups: false,
  sortVariables: false,
  defaultStartIndex: 1,
});

export function resolveWriteOptions(options: Partial<WriteOptions> = {}): WriteOptions {
  return { ...DEFAULT_WRITE_OPTIONS, ...options };
}

/**
 * Value formatting implied by write options; top-level `uppercase`
 * and `floatPrecision` win over the nested format block.
 */
export function valueFormatFor(options: WriteOptions): FormatOptions {
  const format = resolveFormatOptions({
    ...options.format,
    uppercase: options.uppercase,
  });
  if (options.floatPrecision !== undefined) {
    return resolveFormatOptions({ ...format, floatPrecision: options.floatPrecision });
  }
  return format;
}
