import { describe, it, expect } from 'vitest';
import { createInitialGameState, reduce, type GameState } from '../src/sim/game';
import { stepSim } from '../src/core/sim/stepSim';
import { stateAt } from './helpers/state';

describe('createInitialGameState', () => {
  it('starts at (10,10) at rest with the two asteroids', () => {
    const s = createInitialGameState();
    expect(s.player.position).toEqual({ x: 10, y: 10 });
    expect(s.player.velocity).toEqual({ x: 0, y: 0 });
    expect(s.asteroids.map(a => a.position)).toEqual([
      { x: 70, y: 30 },
      { x: 20, y: 50 },
    ]);
    expect(s.keys).toEqual({ up: false, down: false, left: false, right: false });
    expect(s.isGameOver).toBe(false);
    expect(s.survivedSec).toBe(0);
  });
});

describe('reduce', () => {
  it('key down and key up toggle a single direction flag', () => {
    const s0 = createInitialGameState();
    const s1 = reduce(s0, { type: 'keyDown', code: 38 });
    expect(s1.keys).toEqual({ up: true, down: false, left: false, right: false });
    const s2 = reduce(s1, { type: 'keyDown', code: 39 });
    expect(s2.keys).toEqual({ up: true, down: false, left: false, right: true });
    const s3 = reduce(s2, { type: 'keyUp', code: 38 });
    expect(s3.keys).toEqual({ up: false, down: false, left: false, right: true });
    expect(s0.keys.up).toBe(false);
  });

  it('ignores unbound keys and repeated presses', () => {
    const s0 = createInitialGameState();
    expect(reduce(s0, { type: 'keyDown', code: 65 })).toBe(s0);
    expect(reduce(s0, { type: 'keyUp', code: 32 })).toBe(s0);
    const s1 = reduce(s0, { type: 'keyDown', code: 40 });
    expect(reduce(s1, { type: 'keyDown', code: 40 })).toBe(s1);
  });

  it('tick delegates to the simulation step', () => {
    const s0 = stateAt(40, 40, { vx: 20 });
    expect(reduce(s0, { type: 'tick', dtSec: 0.1 })).toEqual(stepSim(s0, 0.1));
  });

  it('Enter does nothing while the game is running', () => {
    const s0 = reduce(createInitialGameState(), { type: 'keyDown', code: 39 });
    expect(reduce(s0, { type: 'keyDown', code: 13 })).toBe(s0);
  });

  it('crashing then pressing Enter restores the startup state', () => {
    let s: GameState = reduce(stateAt(70, 10), { type: 'keyDown', code: 40 });
    let ticks = 0;
    while (!s.isGameOver && ticks < 20) {
      s = reduce(s, { type: 'tick', dtSec: 0.1 });
      ticks++;
    }
    expect(s.isGameOver).toBe(true);
    expect(ticks).toBeLessThanOrEqual(6);

    const frozen = reduce(s, { type: 'tick', dtSec: 0.1 });
    expect(frozen).toBe(s);
    expect(reduce(s, { type: 'keyUp', code: 13 })).toBe(s);

    const restarted = reduce(s, { type: 'keyDown', code: 13 });
    expect(restarted).toEqual(createInitialGameState());
  });
});
