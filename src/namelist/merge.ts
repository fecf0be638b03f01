/**
 * Merging values when one document is applied onto another.
 */

import {
  array,
  derivedType,
  type Value,
} from "../values/value.js";

/**
 * Named strategies for group and document merges.
 *
 * - replace / update: overwrite unconditionally
 * - append: concatenate onto existing arrays, promote scalars to arrays
 * - skip_existing: only add names the target does not have
 */
export type MergeStrategy = "replace" | "update" | "append" | "skip_existing";

export const MERGE_STRATEGIES: readonly MergeStrategy[] = [
  "replace",
  "update",
  "append",
  "skip_existing",
];

export function isMergeStrategy(name: string): name is MergeStrategy {
  return MERGE_STRATEGIES.some((strategy) => strategy === name);
}

/**
 * Default merge used by patching.
 *
 * Scalars overwrite. An incoming array replaces an existing array but
 * is appended after an existing scalar. Derived types merge field by
 * field with incoming fields winning.
 */
export function mergeValues(existing: Value, incoming: Value): Value {
  if (existing.kind === "derived_type" && incoming.kind === "derived_type") {
    return derivedType([...existing.fields, ...incoming.fields]);
  }
  if (incoming.kind !== "array") {
    return incoming;
  }
  switch (existing.kind) {
    case "array":
    case "multi_array":
    case "derived_type":
    case "derived_type_array":
    case "null":
      return incoming;
    default:
      return array([existing, ...incoming.items]);
  }
}

/**
 * Merge for the `append` strategy.
 */
export function appendValues(existing: Value, incoming: Value): Value {
  if (existing.kind === "array") {
    return incoming.kind === "array"
      ? array([...existing.items, ...incoming.items])
      : array([...existing.items, incoming]);
  }
  switch (existing.kind) {
    case "multi_array":
    case "derived_type":
    case "derived_type_array":
    case "null":
      return incoming;
    default:
      return incoming.kind === "array"
        ? array([existing, ...incoming.items])
        : array([existing, incoming]);
  }
}
