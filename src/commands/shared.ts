/**
 * Option parsing shared by the CLI commands.
 */

import { CustomError, InvalidFormatError } from "../core/errors.js";
import { MERGE_STRATEGIES, isMergeStrategy, type MergeStrategy } from "../namelist/merge.js";
import type { WriteOptions } from "../namelist/options.js";

/**
 * Raw formatting flags as commander delivers them.
 */
export interface WriteFlags {
  columnWidth?: string;
  indent?: string;
  uppercase?: boolean;
  sort?: boolean;
  endComma?: boolean;
  floatPrecision?: string;
  force?: boolean;
}

export function parseIntegerFlag(flag: string, text: string, min: number): number {
  const value = Number(text);
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidFormatError(`--${flag} ${text}`, `expected an integer >= ${min}`);
  }
  return value;
}

export function toWriteOptions(flags: WriteFlags): Partial<WriteOptions> {
  const options: Partial<WriteOptions> = {};
  if (flags.columnWidth !== undefined) {
    options.columnWidth = parseIntegerFlag("column-width", flags.columnWidth, 0);
  }
  if (flags.indent !== undefined) {
    options.indent = " ".repeat(parseIntegerFlag("indent", flags.indent, 0));
  }
  if (flags.floatPrecision !== undefined) {
    options.floatPrecision = parseIntegerFlag("float-precision", flags.floatPrecision, 0);
  }
  if (flags.uppercase) options.uppercase = true;
  if (flags.endComma) options.endComma = true;
  if (flags.force) options.force = true;
  if (flags.sort) {
    options.sortGroups = true;
    options.sortVariables = true;
  }
  return options;
}

/**
 * Split comma-separated glob lists; repeated flags accumulate.
 */
export function parseGlobList(values: readonly string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((value) => value.split(","))
    .map((glob) => glob.trim())
    .filter((glob) => glob !== "");
}

export function parseStrategy(name: string): MergeStrategy {
  if (!isMergeStrategy(name)) {
    throw new CustomError(
      `Unknown merge strategy '${name}'. Expected one of: ${MERGE_STRATEGIES.join(", ")}`
    );
  }
  return name;
}
