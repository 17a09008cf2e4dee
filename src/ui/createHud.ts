import type { HudPort } from '../app/AppContext';
import { magnitude } from '../game/coordinates';
import type { GameState } from '../sim/game';
import { requireEl } from './safeDom';

export type Hud = HudPort<GameState> & {
  status: HTMLElement;
};

export function formatStatus(state: GameState): string {
  const t = state.survivedSec.toFixed(1);
  if (state.isGameOver) return `Crashed after ${t}s · Enter to restart`;
  return `Time ${t}s · Speed ${magnitude(state.player.velocity).toFixed(1)}`;
}

export function createHud(root: ParentNode = document): Hud {
  const status = requireEl<HTMLElement>('#hud', root);
  let last = '';

  return {
    status,
    update(state) {
      const text = formatStatus(state);
      // Skip DOM writes when nothing visible changed.
      if (text === last) return;
      last = text;
      status.textContent = text;
    },
  };
}
