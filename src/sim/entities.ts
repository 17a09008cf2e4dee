import { GAME_CONFIG } from '../config/appConfig';
import { coords, type Coordinates } from '../game/coordinates';

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Held state of the four direction keys. Read-only to the simulation step. */
export type Keys = Readonly<Record<Direction, boolean>>;

export type Player = Readonly<{
  position: Coordinates;
  velocity: Coordinates;
}>;

/** Stationary obstacle. Never moved or destroyed during play. */
export type Asteroid = Readonly<{
  position: Coordinates;
}>;

export const NO_KEYS: Keys = Object.freeze({ up: false, down: false, left: false, right: false });

export function createPlayer(position: Coordinates = GAME_CONFIG.PLAYER_START): Player {
  return { position: coords(position.x, position.y), velocity: coords(0, 0) };
}

export function createAsteroids(
  positions: readonly Coordinates[] = GAME_CONFIG.ASTEROID_POSITIONS,
): readonly Asteroid[] {
  return positions.map(p => ({ position: coords(p.x, p.y) }));
}

export function withKey(keys: Keys, direction: Direction, pressed: boolean): Keys {
  if (keys[direction] === pressed) return keys;
  return { ...keys, [direction]: pressed };
}
