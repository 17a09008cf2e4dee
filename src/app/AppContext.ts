import type { GameMsg, GameState } from '../sim/game';

export interface InputPort {
  /** Returns queued messages in arrival order and empties the queue. */
  drain(): GameMsg[];
}

export interface HudPort<TState> {
  update(state: TState): void;
}

export interface RenderPort<TState> {
  render(state: TState): void;
}

export type DomPorts<TState> = {
  input: InputPort;
  hud: HudPort<TState>;
};

export type GfxPorts<TState> = {
  render: RenderPort<TState>['render'];
};

export type AppContext = {
  nowMs: () => number;
  raf: (cb: FrameRequestCallback) => number;
  cancelRaf: (id: number) => void;
  log: (s: string) => void;

  dom: DomPorts<GameState>;
  gfx: GfxPorts<GameState>;

  state: GameState;
};
