/**
 * Applying one parsed assignment to a group.
 *
 * Handles the left-hand side forms `x`, `x(i)`, `x(a:b:s)`,
 * `x(i, j:k)`, `x%f` and `x(i)%f`. Repeated element assignments build
 * up a single array.
 */

import {
  DimensionMismatchError,
  InvalidIndexError,
  ParseError,
  UnexpectedEofError,
} from "../core/errors.js";
import { FIndex } from "../findex/findex.js";
import { IndexBound } from "../findex/bound.js";
import { parseIndexSpec } from "../findex/parse-index.js";
import type { NamelistGroup } from "../namelist/group.js";
import { TokenType, isNameToken, type Token } from "../scanner/token.js";
import {
  NULL_VALUE,
  array,
  derivedType,
  derivedTypeArray,
  multiArray,
  type DerivedFields,
  type Value,
} from "../values/value.js";
import { readParenthesized, skipWhitespace } from "./tokens.js";

export interface AssignmentTarget {
  /** Variable name, lower-case */
  name: string;
  /** Index on the variable itself */
  bounds?: IndexBound[];
  /** Index text as written, for diagnostics */
  indexText?: string;
  /** Component path after `%`, lower-case; empty for plain variables */
  fields: string[];
}

function parseBounds(name: string, text: string): IndexBound[] {
  try {
    return parseIndexSpec(text);
  } catch (err) {
    if (err instanceof InvalidIndexError) {
      throw new InvalidIndexError(name, err.index, err.detail);
    }
    throw err;
  }
}

/**
 * Read the left-hand side starting at a name token. Returns the target
 * and the index of its `=` token.
 */
export function readTarget(
  tokens: readonly Token[],
  index: number,
  group: string
): { target: AssignmentTarget; assignIndex: number } {
  const nameToken = tokens[index];
  if (nameToken === undefined) {
    throw new UnexpectedEofError(group);
  }
  const target: AssignmentTarget = { name: nameToken.lexeme.toLowerCase(), fields: [] };
  let i = skipWhitespace(tokens, index + 1);

  if (tokens[i]?.type === TokenType.LeftParen) {
    const { text, end } = readParenthesized(tokens, i, group);
    target.indexText = text;
    target.bounds = parseBounds(target.name, text);
    i = skipWhitespace(tokens, end);
  }

  while (tokens[i]?.type === TokenType.Percent) {
    i = skipWhitespace(tokens, i + 1);
    const field = tokens[i];
    if (field === undefined || !isNameToken(field)) {
      const at = field ?? nameToken;
      throw new ParseError("Expected component name after '%'", at.line, at.column);
    }
    target.fields.push(field.lexeme.toLowerCase());
    i = skipWhitespace(tokens, i + 1);
    // Component indices are not tracked
    if (tokens[i]?.type === TokenType.LeftParen) {
      i = skipWhitespace(tokens, readParenthesized(tokens, i, group).end);
    }
  }

  const assign = tokens[i];
  if (assign === undefined || assign.type === TokenType.Eof) {
    throw new UnexpectedEofError(group);
  }
  if (assign.type !== TokenType.Assign) {
    throw new ParseError(
      `Expected '=' after variable name '${target.name}'`,
      assign.line,
      assign.column
    );
  }
  return { target, assignIndex: i };
}

// ============================================================================
// Derived types
// ============================================================================

function setField(fields: DerivedFields, path: readonly string[], value: Value): DerivedFields {
  const [head, ...rest] = path;
  if (head === undefined) {
    return fields;
  }
  const updated = new Map(fields);
  if (rest.length === 0) {
    updated.set(head, value);
  } else {
    const current = fields.get(head);
    const inner = current?.kind === "derived_type" ? current.fields : new Map<string, Value>();
    updated.set(head, derivedType(setField(inner, rest, value)));
  }
  return updated;
}

function assignComponent(group: NamelistGroup, target: AssignmentTarget, value: Value): void {
  const existing = group.get(target.name);
  const bounds = target.bounds;

  if (bounds === undefined) {
    const fields = existing?.kind === "derived_type" ? existing.fields : new Map<string, Value>();
    group.insert(target.name, derivedType(setField(fields, target.fields, value)));
    return;
  }

  const [bound] = bounds;
  if (bounds.length !== 1 || bound?.start === undefined || bound.start !== bound.end) {
    throw new InvalidIndexError(
      target.name,
      target.indexText ?? "",
      "Derived type arrays take a single element index"
    );
  }

  const elements = existing?.kind === "derived_type_array" ? [...existing.elements] : [];
  const origin =
    existing?.kind === "derived_type_array" ? group.getStartIndices(target.name)?.[0] ?? 1 : 1;
  const position = bound.start - origin;
  if (position < 0) {
    throw new InvalidIndexError(
      target.name,
      target.indexText ?? "",
      `Index below array origin ${origin}`
    );
  }
  while (elements.length <= position) {
    elements.push(new Map());
  }
  elements[position] = setField(elements[position] ?? new Map(), target.fields, value);
  group.insert(target.name, derivedTypeArray(elements));
}

// ============================================================================
// Arrays
// ============================================================================

function listItems(value: Value): readonly Value[] {
  return value.kind === "array" ? value.items : [value];
}

/**
 * `x(i) = ...` fills consecutive elements from `i`. An explicit range
 * `x(a:b:s)` takes at most its size in values and always covers its
 * whole extent, padding with Null.
 */
function assignVector(
  group: NamelistGroup,
  target: AssignmentTarget,
  bound: IndexBound,
  value: Value
): void {
  const existing = group.get(target.name);
  const existingOrigin = group.getStartIndices(target.name)?.[0] ?? 1;
  const start = bound.start ?? existingOrigin;
  const stride = bound.effectiveStride();
  const items = listItems(value);

  const capacity = bound.element || bound.end === undefined ? undefined : bound.size(start);
  if (capacity !== undefined && items.length > capacity) {
    throw new DimensionMismatchError(
      `at most ${capacity} values`,
      `${items.length} values`,
      target.name
    );
  }

  // First element assignment of a scalar stays a scalar at its index
  if (existing === undefined && value.kind !== "array" && bound.element) {
    group.insert(target.name, value);
    if (start === 1) group.clearStartIndices(target.name);
    else group.setStartIndices(target.name, [start]);
    return;
  }

  let origin = start;
  let elements: Value[] = [];
  if (existing !== undefined) {
    origin = existingOrigin;
    elements = existing.kind === "array" ? [...existing.items] : [existing];
  }

  const reach = (position: number): number => {
    if (position < origin) {
      elements = [...Array.from({ length: origin - position }, () => NULL_VALUE), ...elements];
      origin = position;
    }
    while (elements.length <= position - origin) {
      elements.push(NULL_VALUE);
    }
    return position - origin;
  };

  items.forEach((item, k) => {
    elements[reach(start + k * stride)] = item;
  });
  if (capacity !== undefined && capacity > 0) {
    reach(start + (capacity - 1) * stride);
  }

  group.insert(target.name, array(elements));
  if (origin === 1) group.clearStartIndices(target.name);
  else group.setStartIndices(target.name, [origin]);
}

function assignMatrix(
  group: NamelistGroup,
  target: AssignmentTarget,
  bounds: readonly IndexBound[],
  value: Value
): void {
  const existing = group.get(target.name);
  let dimensions: number[];
  let origins: number[];
  let items: Value[];

  if (existing?.kind === "multi_array" && existing.dimensions.length === bounds.length) {
    dimensions = [...existing.dimensions];
    origins = [...existing.startIndices];
    items = [...existing.items];
  } else {
    dimensions = [];
    origins = [];
    for (const bound of bounds) {
      if (bound.start === undefined || bound.end === undefined) {
        throw new InvalidIndexError(
          target.name,
          target.indexText ?? "",
          "Cannot infer the extent of an open dimension"
        );
      }
      dimensions.push(Math.abs(bound.end - bound.start) + 1);
      origins.push(Math.min(bound.start, bound.end));
    }
    items = Array.from({ length: dimensions.reduce((a, b) => a * b, 1) }, () => NULL_VALUE);
  }

  const filled = bounds.map((bound, rank) => {
    const origin = origins[rank] ?? 1;
    const last = origin + (dimensions[rank] ?? 1) - 1;
    return new IndexBound(bound.start ?? origin, bound.end ?? last, bound.stride);
  });
  const geometry = new FIndex(
    origins.map((origin, rank) => IndexBound.range(origin, origin + (dimensions[rank] ?? 1) - 1))
  );

  const incoming = listItems(value);
  let next = 0;
  for (const indices of new FIndex(filled)) {
    const item = incoming[next];
    if (item === undefined) break;
    try {
      items[geometry.toLinearIndex(indices, dimensions)] = item;
    } catch (err) {
      if (err instanceof InvalidIndexError) {
        throw new InvalidIndexError(target.name, err.index, err.detail);
      }
      throw err;
    }
    next++;
  }
  if (next < incoming.length) {
    throw new DimensionMismatchError(
      `at most ${next} values`,
      `${incoming.length} values`,
      target.name
    );
  }

  group.insert(target.name, multiArray(items, dimensions, origins));
  group.clearStartIndices(target.name);
}

/**
 * Store `value` in `group` according to the target's index and
 * component path.
 */
export function assignValue(group: NamelistGroup, target: AssignmentTarget, value: Value): void {
  if (target.fields.length > 0) {
    assignComponent(group, target, value);
    return;
  }

  const bounds = target.bounds;
  const [first] = bounds ?? [];
  if (bounds === undefined || first === undefined) {
    group.insert(target.name, value);
    group.clearStartIndices(target.name);
    return;
  }
  if (bounds.length === 1) {
    assignVector(group, target, first, value);
  } else {
    assignMatrix(group, target, bounds, value);
  }
}
