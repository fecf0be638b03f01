/**
 * Structural checks over variable values.
 */

import {
  DimensionMismatchError,
  InvalidValueError,
  type NamelistError,
} from "../core/errors.js";
import { formatValue } from "../values/format.js";
import type { Value } from "../values/value.js";

/**
 * Problems with one variable: mixed element types in an array (nulls
 * exempt) or a multi-dimensional array whose element count does not
 * match its extents. Derived type fields are checked recursively.
 */
export function findValueIssues(group: string, name: string, value: Value): NamelistError[] {
  const qualified = `${group}%${name}`;

  switch (value.kind) {
    case "array": {
      const first = value.items[0];
      if (first === undefined || first.kind === "null") {
        return [];
      }
      const mismatch = value.items.find(
        (item) => item.kind !== "null" && item.kind !== first.kind
      );
      return mismatch === undefined
        ? []
        : [new InvalidValueError(qualified, formatValue(mismatch), first.kind)];
    }

    case "multi_array": {
      const expected = value.dimensions.reduce((product, extent) => product * extent, 1);
      if (expected !== value.items.length) {
        return [
          new DimensionMismatchError(
            `${expected} elements for dimensions ${value.dimensions.join("x")}`,
            `${value.items.length}`,
            qualified
          ),
        ];
      }
      return [];
    }

    case "derived_type":
      return [...value.fields].flatMap(([field, fieldValue]) =>
        findValueIssues(group, `${name}%${field}`, fieldValue)
      );

    case "derived_type_array":
      return value.elements.flatMap((fields, i) =>
        [...fields].flatMap(([field, fieldValue]) =>
          findValueIssues(group, `${name}(${i + 1})%${field}`, fieldValue)
        )
      );

    default:
      return [];
  }
}
