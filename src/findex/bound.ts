/**
 * One dimension of an index specification: `start:end:stride` with
 * every part optional. A bare element index such as `5` is kept apart
 * from the range `5:5`.
 */
export class IndexBound {
  constructor(
    public readonly start?: number,
    public readonly end?: number,
    public readonly stride?: number,
    public readonly element: boolean = false
  ) {}

  static range(start: number, end: number): IndexBound {
    return new IndexBound(start, end);
  }

  static single(index: number): IndexBound {
    return new IndexBound(index, index, undefined, true);
  }

  /** A bare `:` */
  static implicit(): IndexBound {
    return new IndexBound();
  }

  isImplicit(): boolean {
    return this.start === undefined && this.end === undefined && this.stride === undefined;
  }

  effectiveStart(defaultStart: number): number {
    return this.start ?? defaultStart;
  }

  effectiveStride(): number {
    return this.stride ?? 1;
  }

  /**
   * Number of indices covered, or undefined when the stride is zero or
   * the end cannot be determined.
   */
  size(defaultStart: number, defaultEnd?: number): number | undefined {
    const start = this.effectiveStart(defaultStart);
    const stride = this.effectiveStride();
    if (stride === 0) {
      return undefined;
    }
    const end = this.end ?? defaultEnd;
    if (end === undefined) {
      return undefined;
    }

    if (stride > 0 && end >= start) {
      return Math.floor((end - start) / stride) + 1;
    }
    if (stride < 0 && end <= start) {
      return Math.floor((start - end) / -stride) + 1;
    }
    return 0;
  }

  toString(): string {
    if (this.isImplicit()) return ":";
    if (this.element && this.start !== undefined) {
      return String(this.start);
    }
    const parts = [this.start ?? "", this.end ?? ""].map(String);
    if (this.stride !== undefined) {
      parts.push(String(this.stride));
    }
    return parts.join(":");
  }
}
