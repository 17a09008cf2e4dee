import type { AppContext } from './AppContext';
import { startRunLoop } from './runLoop';
import { DomKeyboardInput } from '../adapters/dom/DomKeyboardInput';
import { GAME_CONFIG } from '../config/appConfig';
import { SvgRenderPort } from '../render/svgScene';
import { createInitialGameState } from '../sim/game';
import { createHud } from '../ui/createHud';
import { requireEl } from '../ui/safeDom';

export type AppHandle = {
  ctx: AppContext;
  dispose(): void;
};

/**
 * Wire DOM input, SVG output and HUD around a fresh game and start the loop.
 */
export function createApp(win: Window = window): AppHandle {
  const doc = win.document;
  const host = requireEl<HTMLElement>('#app', doc);
  const hud = createHud(doc);
  const scene = new SvgRenderPort(host);
  const input = new DomKeyboardInput(win);

  const ctx: AppContext = {
    nowMs: () => win.performance.now(),
    raf: cb => win.requestAnimationFrame(cb),
    cancelRaf: id => win.cancelAnimationFrame(id),
    log: s => console.info(`${GAME_CONFIG.LOG_PREFIX} ${s}`),
    dom: { input, hud },
    gfx: { render: state => scene.render(state) },
    state: createInitialGameState(),
  };

  scene.render(ctx.state);
  hud.update(ctx.state);
  const loop = startRunLoop(ctx);

  return {
    ctx,
    dispose() {
      loop.dispose();
      input.dispose();
      scene.dispose();
    },
  };
}
