import { describe, it, expect } from 'vitest';
import { reduce, type GameState } from '../src/sim/game';
import { mulberry32 } from './helpers/rng';
import { stateAt } from './helpers/state';

const ARROWS = [37, 38, 39, 40];

describe('simulation invariants', () => {
  it('velocity stays clamped and position stays on the map under random input', () => {
    const rnd = mulberry32(20261019);
    let s: GameState = stateAt(50, 50, { asteroids: [] });

    for (let i = 0; i < 600; i++) {
      const code = ARROWS[Math.floor(rnd() * ARROWS.length)];
      s = reduce(s, { type: rnd() < 0.6 ? 'keyDown' : 'keyUp', code });
      s = reduce(s, { type: 'tick', dtSec: rnd() / 30 });

      const { position, velocity } = s.player;
      expect(Math.abs(velocity.x)).toBeLessThanOrEqual(100);
      expect(Math.abs(velocity.y)).toBeLessThanOrEqual(100);
      expect(position.x).toBeGreaterThanOrEqual(0);
      expect(position.x).toBeLessThanOrEqual(100);
      expect(position.y).toBeGreaterThanOrEqual(0);
      expect(position.y).toBeLessThanOrEqual(100);
    }
    expect(s.isGameOver).toBe(false);
  });

  it('released keys bring the player to rest', () => {
    let s: GameState = stateAt(50, 50, { vx: 100, vy: -60, asteroids: [] });
    for (let i = 0; i < 11 * 60; i++) s = reduce(s, { type: 'tick', dtSec: 1 / 60 });
    expect(s.player.velocity).toEqual({ x: 0, y: 0 });
  });
});
