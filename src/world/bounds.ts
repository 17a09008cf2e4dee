import { MathUtils } from 'three';
import { GAME_CONFIG } from '../config/appConfig';

/**
 * Clamp a velocity component to [-limit, limit].
 *
 * Note: default limit is the map size, so a single tick never moves the
 * player more than one map width when dt <= 1s.
 */
export function clampVelocity(v: number, limit: number = GAME_CONFIG.MAP_SIZE): number {
  return MathUtils.clamp(v, -limit, limit);
}

/**
 * Single-step toroidal wrap. 0 and `size` are both valid resting values;
 * anything beyond is shifted by exactly one map width.
 */
export function wrapCoordinate(p: number, size: number = GAME_CONFIG.MAP_SIZE): number {
  if (p > size) return p - size;
  if (p < 0) return p + size;
  return p;
}
