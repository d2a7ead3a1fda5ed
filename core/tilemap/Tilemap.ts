// ============================================
// Tilemap
// Fixed-size rectangular grid of single-character tiles
// ============================================

import { TILEMAP_CONFIG } from '../constants';
import { logTileChanged, logTilemapCreated, logTilemapRejected } from '../logger';
import { Vector2, type Point } from '../math';
import { assertTileCharacter } from './character';
import { InvalidDimensionsError, OutOfBoundsError, TilemapError } from './errors';
import { Tile, type TileView } from './Tile';

export interface TilemapDimensions {
  readonly width: number;
  readonly height: number;
}

/**
 * Tilemap - owns width * height tiles stored in row-major order
 * (index = y * width + x), so storage order is top-to-bottom, left-to-right.
 *
 * Every coordinate-addressed call is bounds-checked before the index is
 * computed. A rejected call throws a TilemapError and leaves the grid as it was.
 */
export class Tilemap implements Iterable<TileView> {
  private readonly tileStore: Tile[];

  // `fill` must already have passed assertTileCharacter
  private constructor(
    readonly width: number,
    readonly height: number,
    fill: string
  ) {
    this.tileStore = new Array<Tile>(width * height);
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        this.tileStore[y * width + x] = Tile.unchecked(new Vector2(x, y), fill);
      }
    }
  }

  /**
   * Create a map with every cell set to `fill`.
   * Throws InvalidDimensionsError unless both dimensions are positive integers
   * whose product is at most TILEMAP_CONFIG.MAX_TILE_COUNT, and
   * InvalidCharacterError if `fill` is not exactly one symbol.
   */
  static create(width: number, height: number, fill: string = TILEMAP_CONFIG.DEFAULT_FILL): Tilemap {
    const map = guard('create', () => {
      assertDimensions(width, height);
      assertTileCharacter(fill);
      return new Tilemap(width, height, fill);
    });
    logTilemapCreated(width, height, fill);
    return map;
  }

  // ============================================
  // Dimensions
  // ============================================

  dimensions(): TilemapDimensions {
    return { width: this.width, height: this.height };
  }

  /** Dimensions as a vector: (width, height) */
  get size(): Vector2 {
    return new Vector2(this.width, this.height);
  }

  get tileCount(): number {
    return this.tileStore.length;
  }

  /**
   * Whether `position` addresses a tile of this map.
   * Non-integer components are never in bounds.
   */
  contains(position: Point): boolean {
    const { x, y } = position;
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  // ============================================
  // Tile Access
  // ============================================

  /**
   * Read-only view of the tile at `position`.
   * Throws OutOfBoundsError if the position is outside the grid.
   */
  getTile(position: Point): TileView {
    return guard('getTile', () => this.tileAt(position).snapshot());
  }

  getCharacter(position: Point): string {
    return guard('getCharacter', () => this.tileAt(position).character);
  }

  /**
   * Replace the character at `position`. Only that tile changes.
   * Throws OutOfBoundsError first, then InvalidCharacterError.
   */
  setCharacter(position: Point, character: string): void {
    const { tile, previous } = guard('setCharacter', () => {
      const target = this.tileAt(position);
      const before = target.character;
      target.setCharacter(character);
      return { tile: target, previous: before };
    });
    logTileChanged(tile.position, previous, character);
  }

  // ============================================
  // Iteration
  // ============================================

  /**
   * Lazy row-major sequence of tile views (y ascending, then x).
   * Every iteration starts a fresh pass over the grid.
   */
  tiles(): Iterable<TileView> {
    return { [Symbol.iterator]: () => this.iterateTiles() };
  }

  [Symbol.iterator](): Iterator<TileView> {
    return this.iterateTiles();
  }

  /** One string per row, top row first */
  rows(): string[] {
    const rows: string[] = [];
    for (let y = 0; y < this.height; y++) {
      const start = y * this.width;
      rows.push(
        this.tileStore
          .slice(start, start + this.width)
          .map((tile) => tile.character)
          .join('')
      );
    }
    return rows;
  }

  /** Whole map as text, rows separated by TILEMAP_CONFIG.ROW_SEPARATOR */
  render(): string {
    return this.rows().join(TILEMAP_CONFIG.ROW_SEPARATOR);
  }

  // ============================================
  // Internals
  // ============================================

  private *iterateTiles(): Generator<TileView, void, undefined> {
    for (const tile of this.tileStore) {
      yield tile.snapshot();
    }
  }

  private tileAt(position: Point): Tile {
    if (!this.contains(position)) {
      throw new OutOfBoundsError(position, this.width, this.height);
    }
    return this.tileStore[position.y * this.width + position.x];
  }
}

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height)) {
    throw new InvalidDimensionsError(width, height, 'width and height must be integers');
  }
  if (width <= 0 || height <= 0) {
    throw new InvalidDimensionsError(width, height, 'width and height must be greater than 0');
  }
  if (width * height > TILEMAP_CONFIG.MAX_TILE_COUNT) {
    throw new InvalidDimensionsError(width, height, `area exceeds ${TILEMAP_CONFIG.MAX_TILE_COUNT} tiles`);
  }
}

/**
 * Run a tilemap operation, logging any TilemapError before rethrowing it.
 */
function guard<T>(operation: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof TilemapError) {
      logTilemapRejected(operation, error);
    }
    throw error;
  }
}
