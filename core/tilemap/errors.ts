// ============================================
// Tilemap Errors
// ============================================

import { Vector2, type Point } from '../math';

export type TilemapErrorCode = 'INVALID_DIMENSIONS' | 'OUT_OF_BOUNDS' | 'INVALID_CHARACTER';

/**
 * Base class for every error the tilemap throws.
 * Switch on `code` to tell them apart.
 */
export abstract class TilemapError extends Error {
  abstract readonly code: TilemapErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Width or height is not a positive integer, or the area is too large */
export class InvalidDimensionsError extends TilemapError {
  readonly code = 'INVALID_DIMENSIONS';

  constructor(
    readonly width: number,
    readonly height: number,
    reason: string
  ) {
    super(`Invalid tilemap dimensions ${width}x${height}: ${reason}`);
  }
}

/** A coordinate fell outside [0, width) x [0, height) */
export class OutOfBoundsError extends TilemapError {
  readonly code = 'OUT_OF_BOUNDS';
  readonly position: Vector2;

  constructor(
    position: Point,
    readonly width: number,
    readonly height: number
  ) {
    super(
      `Position ${Vector2.from(position).toString()} is out of bounds: expected x in [0, ${width}) and y in [0, ${height})`
    );
    this.position = Vector2.from(position);
  }
}

/** Tile content was not exactly one symbol */
export class InvalidCharacterError extends TilemapError {
  readonly code = 'INVALID_CHARACTER';

  constructor(readonly value: unknown) {
    super(`Invalid tile character ${describeValue(value)}: expected exactly one symbol`);
  }
}

export function isTilemapError(value: unknown): value is TilemapError {
  return value instanceof TilemapError;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value !== 'object' && typeof value !== 'function') return String(value);

  // Objects may have no prototype or a throwing toString
  try {
    return String(value);
  } catch {
    return `[${typeof value}]`;
  }
}
