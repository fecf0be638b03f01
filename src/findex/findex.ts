/**
 * Column-major iteration over multi-dimensional index ranges.
 *
 * The first dimension advances fastest and carries into the next once
 * it runs past its end, so `(1:2, 1:3)` visits
 * (1,1) (2,1) (1,2) (2,2) (1,3) (2,3).
 */

import { InvalidIndexError } from "../core/errors.js";
import { IndexBound } from "./bound.js";

function describeIndices(indices: readonly number[]): string {
  return `[${indices.join(", ")}]`;
}

export class FIndex implements Iterable<number[]> {
  private readonly bounds: readonly IndexBound[];
  private readonly start: number[];
  private readonly end: number[];
  private readonly step: number[];
  private readonly first: number[];
  private current: number[];
  private exhausted: boolean;

  /**
   * @param globalStart - origin for dimensions without an explicit start;
   *   when given it also lowers each dimension's origin to at most itself
   */
  constructor(bounds: readonly IndexBound[], globalStart?: number) {
    const defaultStart = globalStart ?? 1;
    this.bounds = bounds;
    this.start = [];
    this.end = [];
    this.step = [];
    this.first = [];

    for (const bound of bounds) {
      const stride = bound.effectiveStride();
      if (stride === 0) {
        throw new InvalidIndexError("array", bound.toString(), "Stride cannot be zero");
      }
      const start = bound.effectiveStart(defaultStart);
      this.start.push(start);
      this.end.push(bound.end ?? defaultStart);
      this.step.push(stride);
      this.first.push(globalStart === undefined ? start : Math.min(start, globalStart));
    }

    this.current = [...this.start];
    this.exhausted = this.hasEmptyDimension();
  }

  static simple1d(start: number, end: number): FIndex {
    return new FIndex([IndexBound.range(start, end)]);
  }

  static implicit(dimensions: number): FIndex {
    return new FIndex(
      Array.from({ length: dimensions }, () => IndexBound.implicit()),
      1
    );
  }

  private hasEmptyDimension(): boolean {
    return this.start.some((start, rank) => {
      const end = this.end[rank] ?? start;
      const step = this.step[rank] ?? 1;
      return step > 0 ? start > end : start < end;
    });
  }

  getBounds(): readonly IndexBound[] {
    return this.bounds;
  }

  /** The index tuple the next call to advance() returns. */
  getCurrent(): readonly number[] {
    return this.current;
  }

  /** Per-dimension origins used for linear index conversion. */
  startIndices(): readonly number[] {
    return this.first;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  reset(): void {
    this.current = [...this.start];
    this.exhausted = this.hasEmptyDimension();
  }

  /**
   * Return the current index tuple and step to the next one.
   */
  advance(): number[] | undefined {
    if (this.exhausted) {
      return undefined;
    }

    const result = [...this.current];
    let carry = true;
    for (let rank = 0; rank < this.current.length && carry; rank++) {
      const step = this.step[rank] ?? 1;
      const end = this.end[rank] ?? 0;
      const next = (this.current[rank] ?? 0) + step;
      if ((step > 0 && next <= end) || (step < 0 && next >= end)) {
        this.current[rank] = next;
        carry = false;
      } else {
        this.current[rank] = this.start[rank] ?? 0;
      }
    }
    if (carry) {
      this.exhausted = true;
    }
    return result;
  }

  *[Symbol.iterator](): Iterator<number[]> {
    for (let indices = this.advance(); indices !== undefined; indices = this.advance()) {
      yield indices;
    }
  }

  /**
   * Column-major flat offset of an index tuple within arrays of the
   * given extents.
   */
  toLinearIndex(indices: readonly number[], dimensions: readonly number[]): number {
    if (indices.length !== dimensions.length) {
      throw new InvalidIndexError(
        "array",
        describeIndices(indices),
        `Index has ${indices.length} dimensions but array has ${dimensions.length}`
      );
    }

    let linear = 0;
    let multiplier = 1;
    dimensions.forEach((extent, rank) => {
      const index = indices[rank] ?? 0;
      const zeroBased = index - (this.first[rank] ?? 1);
      if (zeroBased < 0 || zeroBased >= extent) {
        throw new InvalidIndexError(
          "array",
          describeIndices(indices),
          `Index ${index} out of bounds for dimension ${rank} (size ${extent})`
        );
      }
      linear += zeroBased * multiplier;
      multiplier *= extent;
    });
    return linear;
  }

  fromLinearIndex(linear: number, dimensions: readonly number[]): number[] {
    const indices: number[] = [];
    let remaining = linear;
    dimensions.forEach((extent, rank) => {
      indices.push((remaining % extent) + (this.first[rank] ?? 1));
      remaining = Math.floor(remaining / extent);
    });
    return indices;
  }
}
