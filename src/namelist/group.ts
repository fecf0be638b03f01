/**
 * A named, ordered collection of variable assignments.
 */

import {
  TypeConversionError,
  VariableNotFoundError,
  type NamelistError,
} from "../core/errors.js";
import {
  asArray,
  asCharacter,
  asComplex,
  asInteger,
  asLogical,
  asReal,
} from "../values/convert.js";
import { valuesEqual } from "../values/equal.js";
import { toValue, type NativeValue, type Value } from "../values/value.js";
import {
  appendValues,
  mergeValues,
  type MergeStrategy,
} from "./merge.js";
import { resolveWriteOptions, valueFormatFor, type WriteOptions } from "./options.js";
import { findValueIssues } from "./validate.js";
import { formatVariable, type VariableMetadata } from "./write.js";

const INT32_MIN = -(2n ** 31n);
const INT32_MAX = 2n ** 31n - 1n;

/**
 * Run a conversion, mapping a failed conversion to undefined.
 */
function attempt<T>(value: Value | undefined, convert: (value: Value) => T): T | undefined {
  if (value === undefined) {
    return undefined;
  }
  try {
    return convert(value);
  } catch (err) {
    if (err instanceof TypeConversionError) {
      return undefined;
    }
    throw err;
  }
}

export class NamelistGroup {
  readonly name: string;
  private readonly values = new Map<string, Value>();
  private readonly order: string[] = [];
  private readonly startIndices = new Map<string, readonly number[]>();
  private readonly comments = new Map<string, string>();

  /** Names are case-insensitive and stored lower-case. */
  constructor(name: string) {
    this.name = name.toLowerCase();
  }

  // ==========================================================================
  // Variables
  // ==========================================================================

  /**
   * Insert or overwrite a variable. Re-inserting keeps the original
   * position in the output order.
   */
  insert(name: string, value: Value | NativeValue): this {
    const key = name.toLowerCase();
    if (!this.values.has(key)) {
      this.order.push(key);
    }
    this.values.set(key, toValue(value));
    return this;
  }

  insertWithComment(name: string, value: Value | NativeValue, comment: string): this {
    this.insert(name, value);
    this.comments.set(name.toLowerCase(), comment);
    return this;
  }

  get(name: string): Value | undefined {
    return this.values.get(name.toLowerCase());
  }

  /**
   * Like get(), but a missing variable is an error.
   */
  require(name: string): Value {
    const value = this.get(name);
    if (value === undefined) {
      throw new VariableNotFoundError(name.toLowerCase(), this.name);
    }
    return value;
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase());
  }

  /**
   * Remove a variable and its metadata; returns whether it existed.
   */
  remove(name: string): boolean {
    const key = name.toLowerCase();
    if (!this.values.delete(key)) {
      return false;
    }
    this.order.splice(this.order.indexOf(key), 1);
    this.startIndices.delete(key);
    this.comments.delete(key);
    return true;
  }

  variableNames(): string[] {
    return [...this.order];
  }

  *entries(): IterableIterator<[string, Value]> {
    for (const key of this.order) {
      const value = this.values.get(key);
      if (value !== undefined) {
        yield [key, value];
      }
    }
  }

  get size(): number {
    return this.order.length;
  }

  isEmpty(): boolean {
    return this.order.length === 0;
  }

  // ==========================================================================
  // Metadata
  // ==========================================================================

  setStartIndices(name: string, indices: readonly number[]): void {
    this.startIndices.set(name.toLowerCase(), [...indices]);
  }

  getStartIndices(name: string): readonly number[] | undefined {
    return this.startIndices.get(name.toLowerCase());
  }

  clearStartIndices(name: string): void {
    this.startIndices.delete(name.toLowerCase());
  }

  setComment(name: string, comment: string): void {
    this.comments.set(name.toLowerCase(), comment);
  }

  getComment(name: string): string | undefined {
    return this.comments.get(name.toLowerCase());
  }

  metadata(name: string): VariableMetadata {
    const key = name.toLowerCase();
    const metadata: VariableMetadata = {};
    const indices = this.startIndices.get(key);
    const comment = this.comments.get(key);
    if (indices !== undefined) metadata.startIndices = indices;
    if (comment !== undefined) metadata.comment = comment;
    return metadata;
  }

  private copyMetadataFrom(other: NamelistGroup, name: string): void {
    const { startIndices, comment } = other.metadata(name);
    if (startIndices !== undefined) this.setStartIndices(name, startIndices);
    if (comment !== undefined) this.setComment(name, comment);
  }

  // ==========================================================================
  // Typed accessors (undefined when missing or not convertible)
  // ==========================================================================

  getInteger(name: string): bigint | undefined {
    return attempt(this.get(name), asInteger);
  }

  /** Integer narrowed to the 32-bit range, as a plain number. */
  getInt32(name: string): number | undefined {
    const value = this.getInteger(name);
    return value !== undefined && value >= INT32_MIN && value <= INT32_MAX
      ? Number(value)
      : undefined;
  }

  getReal(name: string): number | undefined {
    return attempt(this.get(name), asReal);
  }

  getComplex(name: string): [number, number] | undefined {
    return attempt(this.get(name), asComplex);
  }

  getLogical(name: string): boolean | undefined {
    return attempt(this.get(name), asLogical);
  }

  getCharacter(name: string): string | undefined {
    return attempt(this.get(name), asCharacter);
  }

  getArray(name: string): readonly Value[] | undefined {
    return attempt(this.get(name), asArray);
  }

  // ==========================================================================
  // Merging
  // ==========================================================================

  /**
   * Apply another group's variables with the default merge rules,
   * taking over its start indices and comments.
   */
  applyPatch(patch: NamelistGroup): void {
    for (const [name, value] of patch.entries()) {
      const existing = this.get(name);
      this.insert(name, existing === undefined ? value : mergeValues(existing, value));
      this.copyMetadataFrom(patch, name);
    }
  }

  mergeWithStrategy(other: NamelistGroup, strategy: MergeStrategy): void {
    for (const [name, value] of other.entries()) {
      const existing = this.get(name);
      if (existing !== undefined && strategy === "skip_existing") {
        continue;
      }
      if (existing !== undefined && strategy === "append") {
        this.insert(name, appendValues(existing, value));
      } else {
        this.insert(name, value);
      }
      this.copyMetadataFrom(other, name);
    }
  }

  /**
   * Variables of `other` that are new or differ from this group: the
   * patch that turns this group into `other` (deletions aside).
   */
  createPatchFrom(other: NamelistGroup): NamelistGroup {
    const patch = new NamelistGroup(other.name);
    for (const [name, value] of other.entries()) {
      const mine = this.get(name);
      if (mine === undefined || !valuesEqual(mine, value)) {
        patch.insert(name, value);
        patch.copyMetadataFrom(other, name);
      }
    }
    return patch;
  }

  // ==========================================================================
  // Validation, comparison, output
  // ==========================================================================

  findIssues(): NamelistError[] {
    return [...this.entries()].flatMap(([name, value]) =>
      findValueIssues(this.name, name, value)
    );
  }

  /**
   * Throw the first validation issue, if any.
   */
  validate(): void {
    const [issue] = this.findIssues();
    if (issue !== undefined) {
      throw issue;
    }
  }

  clone(name: string = this.name): NamelistGroup {
    const copy = new NamelistGroup(name);
    for (const [key, value] of this.entries()) {
      copy.insert(key, value);
      copy.copyMetadataFrom(this, key);
    }
    return copy;
  }

  /**
   * Same variables, in the same order, with equal values.
   */
  equals(other: NamelistGroup): boolean {
    const names = this.variableNames();
    const otherNames = other.variableNames();
    return (
      names.length === otherNames.length &&
      names.every((name, i) => {
        const mine = this.get(name);
        const theirs = other.get(name);
        return (
          name === otherNames[i] &&
          mine !== undefined &&
          theirs !== undefined &&
          valuesEqual(mine, theirs)
        );
      })
    );
  }

  /**
   * Assignment lines of the group body, each ending in a newline.
   */
  toText(options: Partial<WriteOptions> = {}): string {
    const resolved = resolveWriteOptions(options);
    const format = valueFormatFor(resolved);
    const names = resolved.sortVariables ? [...this.order].sort() : this.order;

    let text = "";
    for (const name of names) {
      const value = this.values.get(name);
      if (value === undefined) continue;
      for (const line of formatVariable(name, value, this.metadata(name), resolved, format)) {
        text += `${line}\n`;
      }
    }
    return text;
  }
}
