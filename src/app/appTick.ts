import type { AppContext } from './AppContext';
import { reduce, type GameMsg, type GameState } from '../sim/game';

export type FrameClockConfig = {
  maxFrameDtSec?: number;
};

/**
 * Converts rAF timestamps into per-frame elapsed seconds.
 * The first frame yields 0; long pauses are capped at `maxFrameDtSec`.
 * Pure and unit-testable.
 */
export function createFrameClock(config: FrameClockConfig = {}) {
  const maxFrameDtSec = config.maxFrameDtSec ?? 0.1;

  let lastNowSec = NaN;

  return {
    /** Advance the clock to a new timestamp (in seconds) and return the elapsed time. */
    advance(nowSec: number): number {
      if (!Number.isFinite(lastNowSec)) {
        lastNowSec = nowSec;
        return 0;
      }
      const dtSec = Math.max(0, Math.min(maxFrameDtSec, nowSec - lastNowSec));
      lastNowSec = nowSec;
      return dtSec;
    },

    reset(nowSec: number) {
      lastNowSec = nowSec;
    },
  };
}

function dispatch(ctx: AppContext, msg: GameMsg): GameState {
  const prev = ctx.state;
  const next = reduce(prev, msg);
  if (!prev.isGameOver && next.isGameOver) {
    ctx.log(`game over after ${next.survivedSec.toFixed(1)}s`);
  } else if (prev.isGameOver && !next.isGameOver) {
    ctx.log('restarted');
  }
  return next;
}

/**
 * Per-frame app tick.
 * Queued input first, in arrival order, then one time step, then output.
 */
export function appTick(ctx: AppContext, dtSec: number): void {
  for (const msg of ctx.dom.input.drain()) {
    ctx.state = dispatch(ctx, msg);
  }
  ctx.state = dispatch(ctx, { type: 'tick', dtSec });
  ctx.gfx.render(ctx.state);
  ctx.dom.hud.update(ctx.state);
}
