// ============================================
// glyphgrid core
// Character tilemap and its coordinate type
// ============================================

// Coordinate type
export * from './math';

// Tilemap, tiles and errors
export * from './tilemap';

// Limits and defaults (TILEMAP_CONFIG)
export * from './constants';

// Logger and tilemap event helpers
export * from './logger';
