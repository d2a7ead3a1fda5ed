// ============================================
// Vector2
// Integer (x, y) pair used for tile positions and offsets
// ============================================

/**
 * Anything shaped like a point. Lets callers pass plain `{ x, y }` literals
 * where a Vector2 is accepted.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Immutable 2D integer vector.
 *
 * Components are plain numbers: add/sub stay exact while every component is
 * within Number.MAX_SAFE_INTEGER, and lose precision past it (no wrap, no clamp).
 */
export class Vector2 implements Point {
  /** (0, 0) */
  static readonly ZERO = new Vector2(0, 0);

  /** (1, 1) */
  static readonly ONE = new Vector2(1, 1);

  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  /** Copy any `{ x, y }` point into a Vector2 */
  static from(point: Point): Vector2 {
    return point instanceof Vector2 ? point : new Vector2(point.x, point.y);
  }

  /**
   * Row-major ordering: compares y first, then x.
   * Suitable as an Array.prototype.sort comparator.
   */
  static compare(a: Point, b: Point): number {
    return a.y - b.y || a.x - b.x;
  }

  /** Component-wise equality */
  equals(other: Point): boolean {
    return this.x === other.x && this.y === other.y;
  }

  /** New vector from adding `other` to this one */
  add(other: Point): Vector2 {
    return new Vector2(this.x + other.x, this.y + other.y);
  }

  /** New vector from subtracting `other` from this one */
  sub(other: Point): Vector2 {
    return new Vector2(this.x - other.x, this.y - other.y);
  }

  toString(): string {
    return `{ x: ${this.x}, y: ${this.y} }`;
  }
}
