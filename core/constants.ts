/**
 * Tilemap configuration - limits and defaults shared by every map.
 */
export const TILEMAP_CONFIG = {
  // Fill character used when Tilemap.create() is called without one
  DEFAULT_FILL: '.',

  // Largest width * height a map may have (1024 x 1024)
  // Every tile is an object, so memory grows with the area
  MAX_TILE_COUNT: 1_048_576,

  // Joins rows in Tilemap.render()
  ROW_SEPARATOR: '\n',
} as const;
