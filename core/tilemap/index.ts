// ============================================
// Tilemap Package Exports
// ============================================

export { Tilemap } from './Tilemap';
export type { TilemapDimensions } from './Tilemap';
export { Tile } from './Tile';
export type { TileView } from './Tile';
export { isTileCharacter, assertTileCharacter } from './character';
export {
  TilemapError,
  InvalidDimensionsError,
  OutOfBoundsError,
  InvalidCharacterError,
  isTilemapError,
} from './errors';
export type { TilemapErrorCode } from './errors';
