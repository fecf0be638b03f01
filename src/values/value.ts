/**
 * The dynamic value model for namelist variables.
 */

// ============================================================================
// Variants
// ============================================================================

export interface IntegerValue {
  readonly kind: "integer";
  /** 64-bit signed range */
  readonly value: bigint;
}

export interface RealValue {
  readonly kind: "real";
  readonly value: number;
}

export interface ComplexValue {
  readonly kind: "complex";
  readonly re: number;
  readonly im: number;
}

export interface LogicalValue {
  readonly kind: "logical";
  readonly value: boolean;
}

export interface CharacterValue {
  readonly kind: "character";
  readonly value: string;
}

export interface ArrayValue {
  readonly kind: "array";
  readonly items: readonly Value[];
}

/**
 * Flat, column-major storage of a multi-dimensional array.
 * `items.length` should equal the product of `dimensions` (see validation).
 */
export interface MultiArrayValue {
  readonly kind: "multi_array";
  readonly items: readonly Value[];
  readonly dimensions: readonly number[];
  readonly startIndices: readonly number[];
}

export type DerivedFields = ReadonlyMap<string, Value>;

export interface DerivedTypeValue {
  readonly kind: "derived_type";
  readonly fields: DerivedFields;
}

export interface DerivedTypeArrayValue {
  readonly kind: "derived_type_array";
  readonly elements: readonly DerivedFields[];
}

export interface NullValue {
  readonly kind: "null";
}

export type Value =
  | IntegerValue
  | RealValue
  | ComplexValue
  | LogicalValue
  | CharacterValue
  | ArrayValue
  | MultiArrayValue
  | DerivedTypeValue
  | DerivedTypeArrayValue
  | NullValue;

export type ValueKind = Value["kind"];

/**
 * Plain JavaScript data accepted wherever a Value is expected.
 */
export type NativeValue =
  | bigint
  | number
  | boolean
  | string
  | null
  | readonly NativeValue[];

// ============================================================================
// Constructors
// ============================================================================

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export const NULL_VALUE: NullValue = Object.freeze({ kind: "null" });

export function integer(value: bigint | number): IntegerValue {
  return { kind: "integer", value: typeof value === "bigint" ? value : BigInt(Math.trunc(value)) };
}

export function real(value: number): RealValue {
  return { kind: "real", value };
}

export function complex(re: number, im: number): ComplexValue {
  return { kind: "complex", re, im };
}

export function logical(value: boolean): LogicalValue {
  return { kind: "logical", value };
}

export function character(value: string): CharacterValue {
  return { kind: "character", value };
}

export function array(items: readonly (Value | NativeValue)[]): ArrayValue {
  return { kind: "array", items: items.map(toValue) };
}

export function multiArray(
  items: readonly (Value | NativeValue)[],
  dimensions: readonly number[],
  startIndices: readonly number[] = dimensions.map(() => 1)
): MultiArrayValue {
  return {
    kind: "multi_array",
    items: items.map(toValue),
    dimensions: [...dimensions],
    startIndices: [...startIndices],
  };
}

export function derivedType(
  fields: Iterable<readonly [string, Value | NativeValue]>
): DerivedTypeValue {
  const map = new Map<string, Value>();
  for (const [name, value] of fields) {
    map.set(name.toLowerCase(), toValue(value));
  }
  return { kind: "derived_type", fields: map };
}

export function derivedTypeArray(elements: readonly DerivedFields[]): DerivedTypeArrayValue {
  return { kind: "derived_type_array", elements: elements.map((e) => new Map(e)) };
}

const VALUE_KINDS: ReadonlySet<string> = new Set<ValueKind>([
  "integer",
  "real",
  "complex",
  "logical",
  "character",
  "array",
  "multi_array",
  "derived_type",
  "derived_type_array",
  "null",
]);

export function isValue(input: unknown): input is Value {
  return (
    typeof input === "object" &&
    input !== null &&
    "kind" in input &&
    typeof input.kind === "string" &&
    VALUE_KINDS.has(input.kind)
  );
}

/**
 * Lift native data into a Value. Integral numbers become Integer and
 * other numbers Real; pass `real(2)` explicitly for a whole-valued real.
 */
export function toValue(input: Value | NativeValue): Value {
  if (input === null) return NULL_VALUE;
  if (isValue(input)) return input;

  switch (typeof input) {
    case "bigint":
      return integer(input);
    case "number":
      return Number.isSafeInteger(input) ? integer(input) : real(input);
    case "boolean":
      return logical(input);
    case "string":
      return character(input);
    default:
      return array(input);
  }
}

// ============================================================================
// Inspection
// ============================================================================

export function typeName(value: Value): ValueKind {
  return value.kind;
}

export function isNumeric(value: Value): boolean {
  return value.kind === "integer" || value.kind === "real" || value.kind === "complex";
}

export function isArray(value: Value): boolean {
  return (
    value.kind === "array" ||
    value.kind === "multi_array" ||
    value.kind === "derived_type_array"
  );
}

/**
 * Element count for array-like values, undefined for scalars.
 */
export function arrayLength(value: Value): number | undefined {
  switch (value.kind) {
    case "array":
    case "multi_array":
      return value.items.length;
    case "derived_type_array":
      return value.elements.length;
    default:
      return undefined;
  }
}

/**
 * Short human-readable description of a value.
 */
export function summary(value: Value): string {
  switch (value.kind) {
    case "integer":
      return `integer(${value.value})`;
    case "real":
      return `real(${value.value.toFixed(6)})`;
    case "complex":
      return `complex(${value.re.toFixed(3)}, ${value.im.toFixed(3)})`;
    case "logical":
      return `logical(${value.value})`;
    case "character": {
      const chars = Array.from(value.value);
      const text = chars.length > 20 ? `${chars.slice(0, 17).join("")}...` : value.value;
      return `character("${text}")`;
    }
    case "array":
      return `array[${value.items.length}]`;
    case "multi_array":
      return `multi_array[${value.dimensions.join("x")}]`;
    case "derived_type":
      return `derived_type(${value.fields.size} fields)`;
    case "derived_type_array":
      return `derived_type_array[${value.elements.length}]`;
    case "null":
      return "null";
  }
}
