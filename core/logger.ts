import pino from 'pino';
import type { Point } from './math';
import type { TilemapError } from './tilemap/errors';

// ============================================
// Logger Configuration
// ============================================

const IS_TEST = process.env.NODE_ENV === 'test';
const IS_DEV = process.env.NODE_ENV !== 'production' && !IS_TEST;
const LOG_LEVEL = process.env.LOG_LEVEL || (IS_TEST ? 'silent' : 'info');

/**
 * Create a logger tagged with a component name
 * Pretty console output in development, JSON to stdout otherwise
 * @param component - Component name for filtering (e.g., 'tilemap')
 */
export function createLogger(component: string): pino.Logger {
  const options: pino.LoggerOptions = {
    level: LOG_LEVEL,
    base: { component }, // Add component field to all log entries
  };

  if (!IS_DEV) {
    return pino(options);
  }

  return pino(
    options,
    pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    })
  );
}

// ============================================
// Logger Instances
// ============================================

export const logger = createLogger('tilemap');

// ============================================
// Convenience Methods for Tilemap Events
// ============================================

/**
 * Log a tilemap creation
 */
export function logTilemapCreated(width: number, height: number, fill: string) {
  if (!logger.isLevelEnabled('debug')) return;
  logger.debug({ width, height, fill, event: 'tilemap_created' }, `Created ${width}x${height} tilemap`);
}

/**
 * Log a tile character change
 */
export function logTileChanged(position: Point, previous: string, character: string) {
  // Runs on every setCharacter; skip building the message when debug is off
  if (!logger.isLevelEnabled('debug')) return;
  logger.debug(
    { x: position.x, y: position.y, previous, character, event: 'tile_changed' },
    `Tile (${position.x}, ${position.y}) changed '${previous}' -> '${character}'`
  );
}

/**
 * Log a rejected tilemap operation (the error is still thrown to the caller)
 */
export function logTilemapRejected(operation: string, error: TilemapError) {
  logger.warn({ operation, code: error.code, event: 'tilemap_rejected' }, `${operation} rejected: ${error.message}`);
}
