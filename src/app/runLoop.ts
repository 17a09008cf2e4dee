import type { AppContext } from './AppContext';
import { appTick, createFrameClock } from './appTick';
import { GAME_CONFIG } from '../config/appConfig';

export function startRunLoop(ctx: AppContext): { dispose(): void } {
  const clock = createFrameClock({ maxFrameDtSec: GAME_CONFIG.MAX_FRAME_DT_SEC });
  let handle = 0;
  let running = true;

  const frame: FrameRequestCallback = t => {
    if (!running) return;
    appTick(ctx, clock.advance(t / 1000));
    handle = ctx.raf(frame);
  };

  clock.reset(ctx.nowMs() / 1000);
  handle = ctx.raf(frame);

  return {
    dispose() {
      running = false;
      ctx.cancelRaf(handle);
    },
  };
}
