import type { Direction } from '../sim/entities';

export type KeyCommand = { kind: 'direction'; direction: Direction } | { kind: 'reset' };

/**
 * Key code bindings (legacy `KeyboardEvent.keyCode` values).
 *
 * This is a public contract used by both the runtime and unit tests.
 */
export const KEY_CODE_BINDINGS: Readonly<Record<number, KeyCommand>> = {
  38: { kind: 'direction', direction: 'up' },
  40: { kind: 'direction', direction: 'down' },
  37: { kind: 'direction', direction: 'left' },
  39: { kind: 'direction', direction: 'right' },
  13: { kind: 'reset' },
};

/** `KeyboardEvent.key` names for the bound codes. */
export const KEY_NAME_CODES: Readonly<Record<string, number>> = Object.freeze({
  ArrowUp: 38,
  ArrowDown: 40,
  ArrowLeft: 37,
  ArrowRight: 39,
  Enter: 13,
});

/** Unbound codes translate to null and are ignored. */
export function translateKeyCode(code: number): KeyCommand | null {
  return KEY_CODE_BINDINGS[code] ?? null;
}
