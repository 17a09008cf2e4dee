import { translateKeyCode } from '../controls/desktopKeymap';
import { stepSim } from '../core/sim/stepSim';
import { createAsteroids, createPlayer, NO_KEYS, withKey, type Asteroid, type Keys, type Player } from './entities';

export type GameState = Readonly<{
  player: Player;
  keys: Keys;
  asteroids: readonly Asteroid[];
  /** Sticky: only a reset clears it. */
  isGameOver: boolean;
  /** Simulated seconds while the game was running. */
  survivedSec: number;
}>;

export type GameMsg =
  | { type: 'keyDown'; code: number }
  | { type: 'keyUp'; code: number }
  | { type: 'tick'; dtSec: number };

export function createInitialGameState(): GameState {
  return {
    player: createPlayer(),
    keys: NO_KEYS,
    asteroids: createAsteroids(),
    isGameOver: false,
    survivedSec: 0,
  };
}

function assertNever(x: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(x)}`);
}

function applyKey(state: GameState, code: number, pressed: boolean): GameState {
  const command = translateKeyCode(code);
  if (!command) return state;
  switch (command.kind) {
    case 'direction': {
      const keys = withKey(state.keys, command.direction, pressed);
      return keys === state.keys ? state : { ...state, keys };
    }
    case 'reset':
      // Restart is a key-down signal, honoured only after a game over.
      return pressed && state.isGameOver ? createInitialGameState() : state;
    default:
      return assertNever(command);
  }
}

/** Single entry point for every event the game reacts to. */
export function reduce(state: GameState, msg: GameMsg): GameState {
  switch (msg.type) {
    case 'keyDown':
      return applyKey(state, msg.code, true);
    case 'keyUp':
      return applyKey(state, msg.code, false);
    case 'tick':
      return stepSim(state, msg.dtSec);
    default:
      return assertNever(msg);
  }
}
