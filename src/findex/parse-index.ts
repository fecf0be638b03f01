/**
 * Parsing index-spec text such as `1:10:2` or `:, 3`.
 */

import { InvalidIndexError } from "../core/errors.js";
import { IndexBound } from "./bound.js";

const INDEX_TEXT = /^[+-]?\d+$/;

function parseComponent(text: string, source: string, what: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === "") {
    return undefined;
  }
  if (!INDEX_TEXT.test(trimmed)) {
    throw new InvalidIndexError("array", source, `Invalid ${what}`);
  }
  return Number(trimmed);
}

/**
 * Parse one dimension: `:`, `5`, `a:b` or `a:b:s` (any part may be empty).
 */
export function parseIndexString(text: string): IndexBound {
  const trimmed = text.trim();
  if (trimmed === ":") {
    return IndexBound.implicit();
  }

  const parts = trimmed.split(":");
  switch (parts.length) {
    case 1: {
      const index = parseComponent(trimmed, text, "integer index");
      if (index === undefined) {
        throw new InvalidIndexError("array", text, "Empty index");
      }
      return IndexBound.single(index);
    }
    case 2:
      return new IndexBound(
        parseComponent(parts[0] ?? "", text, "start index"),
        parseComponent(parts[1] ?? "", text, "end index")
      );
    case 3: {
      const stride = parseComponent(parts[2] ?? "", text, "stride");
      if (stride === 0) {
        throw new InvalidIndexError("array", text, "Stride cannot be zero");
      }
      return new IndexBound(
        parseComponent(parts[0] ?? "", text, "start index"),
        parseComponent(parts[1] ?? "", text, "end index"),
        stride
      );
    }
    default:
      throw new InvalidIndexError("array", text, "Too many colons in index specification");
  }
}

/**
 * Parse a comma-separated list of dimensions, e.g. `1:3, 2`.
 */
export function parseIndexSpec(text: string): IndexBound[] {
  return text.split(",").map(parseIndexString);
}
