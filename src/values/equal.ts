/**
 * Structural equality over values.
 */

import type { DerivedFields, Value } from "./value.js";

function itemsEqual(a: readonly Value[], b: readonly Value[]): boolean {
  return a.length === b.length && a.every((item, i) => {
    const other = b[i];
    return other !== undefined && valuesEqual(item, other);
  });
}

function numbersEqual(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((n, i) => n === b[i]);
}

export function fieldsEqual(a: DerivedFields, b: DerivedFields): boolean {
  if (a.size !== b.size) {
    return false;
  }
  for (const [name, value] of a) {
    const other = b.get(name);
    if (other === undefined || !valuesEqual(value, other)) {
      return false;
    }
  }
  return true;
}

/**
 * Deep equality. Reals compare with `===`, so NaN never equals NaN.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "integer":
      return b.kind === "integer" && b.value === a.value;
    case "real":
      return b.kind === "real" && b.value === a.value;
    case "logical":
      return b.kind === "logical" && b.value === a.value;
    case "character":
      return b.kind === "character" && b.value === a.value;
    case "complex":
      return b.kind === "complex" && b.re === a.re && b.im === a.im;
    case "array":
      return b.kind === "array" && itemsEqual(a.items, b.items);
    case "multi_array":
      return (
        b.kind === "multi_array" &&
        numbersEqual(a.dimensions, b.dimensions) &&
        numbersEqual(a.startIndices, b.startIndices) &&
        itemsEqual(a.items, b.items)
      );
    case "derived_type":
      return b.kind === "derived_type" && fieldsEqual(a.fields, b.fields);
    case "derived_type_array":
      return (
        b.kind === "derived_type_array" &&
        a.elements.length === b.elements.length &&
        a.elements.every((fields, i) => {
          const other = b.elements[i];
          return other !== undefined && fieldsEqual(fields, other);
        })
      );
    case "null":
      return b.kind === "null";
  }
}
