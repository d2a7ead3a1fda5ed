export { Vector2 } from './Vector2';
export type { Point } from './Vector2';
