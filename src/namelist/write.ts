/**
 * Canonical text for variable assignments.
 */

import { formatValue, type FormatOptions } from "../values/format.js";
import type { Value } from "../values/value.js";
import type { WriteOptions } from "./options.js";

/**
 * Per-variable data kept beside the value.
 */
export interface VariableMetadata {
  /** Array origin per dimension, when not the default */
  startIndices?: readonly number[];
  /** Inline comment text without its `!` */
  comment?: string;
}

export function formatComment(comment: string): string {
  return comment.startsWith("!") ? `  ${comment}` : `  ! ${comment}`;
}

function indexSeparator(options: WriteOptions): string {
  return options.columnWidth > 0 ? ", " : ",";
}

/**
 * Lay out `header v1, v2, ...`, continuing under the first value once
 * a line would pass the column width.
 */
function wrapValues(header: string, texts: readonly string[], options: WriteOptions): string[] {
  const pieces = texts.map((text, i) => (i < texts.length - 1 ? `${text},` : text));
  const first = pieces[0];
  if (first === undefined) {
    return [header.trimEnd()];
  }

  const pad = " ".repeat(header.length);
  const lines: string[] = [];
  let line = header + first;
  for (const piece of pieces.slice(1)) {
    const width = options.indent.length + line.length + 1 + piece.length;
    if (options.columnWidth > 0 && width > options.columnWidth) {
      lines.push(line.trimEnd());
      line = pad + piece;
    } else {
      line += ` ${piece}`;
    }
  }
  lines.push(line.trimEnd());
  return lines;
}

/**
 * Each entry is one assignment, possibly spread over several lines.
 */
function assignments(
  name: string,
  value: Value,
  startIndices: readonly number[] | undefined,
  options: WriteOptions,
  format: FormatOptions
): string[][] {
  const display = options.uppercase ? name.toUpperCase() : name;
  const texts = (items: readonly Value[]): string[] =>
    items.map((item) => formatValue(item, format));

  switch (value.kind) {
    case "array": {
      if (value.items.length === 0) {
        return [[`${display} =`]];
      }
      const start = startIndices?.[0] ?? options.defaultStartIndex;
      const end = start + value.items.length - 1;
      return [wrapValues(`${display}(${start}:${end}) = `, texts(value.items), options)];
    }

    case "multi_array": {
      const index = value.dimensions
        .map((extent, rank) => {
          const start = value.startIndices[rank] ?? options.defaultStartIndex;
          return `${start}:${start + extent - 1}`;
        })
        .join(indexSeparator(options));
      return [wrapValues(`${display}(${index}) = `, texts(value.items), options)];
    }

    case "derived_type":
      return [...value.fields].flatMap(([field, fieldValue]) =>
        assignments(`${name}%${field}`, fieldValue, undefined, options, format)
      );

    case "derived_type_array": {
      const origin = startIndices?.[0] ?? options.defaultStartIndex;
      return value.elements.flatMap((fields, i) =>
        [...fields].flatMap(([field, fieldValue]) =>
          assignments(`${name}(${origin + i})%${field}`, fieldValue, undefined, options, format)
        )
      );
    }

    default: {
      const index =
        startIndices && startIndices.length > 0
          ? `(${startIndices.join(indexSeparator(options))})`
          : "";
      const text = formatValue(value, format);
      return [[text === "" ? `${display}${index} =` : `${display}${index} = ${text}`]];
    }
  }
}

/**
 * Indented lines for one variable, comment attached to the last line.
 */
export function formatVariable(
  name: string,
  value: Value,
  metadata: VariableMetadata,
  options: WriteOptions,
  format: FormatOptions
): string[] {
  const lines = assignments(name, value, metadata.startIndices, options, format).flatMap(
    (assignment) =>
      assignment.map((line, i) =>
        options.endComma && i === assignment.length - 1 ? `${line},` : line
      )
  );

  const result = lines.map((line) => options.indent + line);
  const last = result.length - 1;
  if (metadata.comment !== undefined && last >= 0) {
    result[last] += formatComment(metadata.comment);
  }
  return result;
}
