import { GAME_CONFIG } from '../../config/appConfig';
import { coords, distance, type Coordinates } from '../../game/coordinates';
import type { Asteroid, Keys, Player } from '../../sim/entities';
import type { GameState } from '../../sim/game';
import { clampVelocity, wrapCoordinate } from '../../world/bounds';

/**
 * Acceleration on one axis from its pair of opposing keys.
 * `negative` is up (y) or left (x); screen y grows downwards.
 */
export function axisAcceleration(negative: boolean, positive: boolean, velocity: number): number {
  if (negative && positive) return 0;
  if (negative) return -GAME_CONFIG.THRUST;
  if (positive) return GAME_CONFIG.THRUST;
  if (velocity === 0) return 0;
  const damping = GAME_CONFIG.THRUST / GAME_CONFIG.DAMPING_DIVISOR;
  return velocity > 0 ? -damping : damping;
}

function axisVelocity(negative: boolean, positive: boolean, velocity: number, dtSec: number): number {
  const next = velocity + axisAcceleration(negative, positive, velocity) * dtSec;
  // Damping stops at rest instead of reversing direction.
  const damped = !negative && !positive;
  if (damped && next * velocity < 0) return 0;
  return clampVelocity(next);
}

export function integratePlayer(player: Player, keys: Keys, dtSec: number): Player {
  const vx = axisVelocity(keys.left, keys.right, player.velocity.x, dtSec);
  const vy = axisVelocity(keys.up, keys.down, player.velocity.y, dtSec);
  return {
    velocity: coords(vx, vy),
    position: coords(
      wrapCoordinate(player.position.x + vx * dtSec),
      wrapCoordinate(player.position.y + vy * dtSec),
    ),
  };
}

export function hitsAsteroid(position: Coordinates, asteroids: readonly Asteroid[]): boolean {
  for (const a of asteroids) {
    if (distance(a.position, position) < GAME_CONFIG.COLLISION_RADIUS) return true;
  }
  return false;
}

/**
 * Advance the game by `dtSec` seconds of simulated time.
 * Pure: returns a new state, or the same state once the game is over.
 */
export function stepSim(state: GameState, dtSec: number): GameState {
  if (state.isGameOver) return state;
  const player = integratePlayer(state.player, state.keys, dtSec);
  return {
    ...state,
    player,
    survivedSec: state.survivedSec + dtSec,
    isGameOver: state.isGameOver || hitsAsteroid(player.position, state.asteroids),
  };
}
