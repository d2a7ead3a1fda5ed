// ============================================
// Tile
// ============================================

import type { Vector2 } from '../math';
import { assertTileCharacter } from './character';

/**
 * Read-only copy of a tile, the only form in which tiles leave a Tilemap.
 */
export interface TileView {
  readonly position: Vector2;
  readonly character: string;
}

/**
 * One grid cell: a fixed position plus the character drawn there.
 *
 * Position is set once in the constructor and has no setter. Moving content
 * means changing characters at two positions, not relocating a Tile.
 */
export class Tile {
  // Set only while unchecked() runs; construction is synchronous
  private static skipValidation = false;

  private value: string;

  constructor(
    readonly position: Vector2,
    character: string
  ) {
    if (!Tile.skipValidation) {
      assertTileCharacter(character);
    }
    this.value = character;
  }

  /**
   * Build a tile from a character the caller has already validated.
   * Used by Tilemap to fill a grid after checking the fill character once.
   */
  static unchecked(position: Vector2, character: string): Tile {
    Tile.skipValidation = true;
    try {
      return new Tile(position, character);
    } finally {
      Tile.skipValidation = false;
    }
  }

  get character(): string {
    return this.value;
  }

  /**
   * Replace the character.
   * Throws InvalidCharacterError (and leaves the tile unchanged) if
   * `character` is not exactly one symbol.
   */
  setCharacter(character: string): void {
    assertTileCharacter(character);
    this.value = character;
  }

  snapshot(): TileView {
    return Object.freeze({ position: this.position, character: this.value });
  }
}
