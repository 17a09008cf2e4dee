import type { InputPort } from '../../app/AppContext';
import { KEY_NAME_CODES, translateKeyCode } from '../../controls/desktopKeymap';
import type { GameMsg } from '../../sim/game';

/** Numeric key code for an event: by `key` name first, legacy `keyCode` otherwise. */
export function resolveKeyCode(e: Pick<KeyboardEvent, 'key' | 'keyCode'>): number {
  return KEY_NAME_CODES[e.key] ?? e.keyCode;
}

/**
 * DOM keyboard adapter: queues key messages and provides an InputPort.
 * No import-time side effects: listeners are registered only on construction.
 */
export class DomKeyboardInput implements InputPort {
  private queue: GameMsg[] = [];
  private readonly onKeyDown = (e: KeyboardEvent) => this.enqueue(e, 'keyDown');
  private readonly onKeyUp = (e: KeyboardEvent) => this.enqueue(e, 'keyUp');

  constructor(private readonly win: Window) {
    this.win.addEventListener('keydown', this.onKeyDown);
    this.win.addEventListener('keyup', this.onKeyUp);
  }

  dispose(): void {
    this.win.removeEventListener('keydown', this.onKeyDown);
    this.win.removeEventListener('keyup', this.onKeyUp);
    this.queue = [];
  }

  drain(): GameMsg[] {
    const out = this.queue;
    this.queue = [];
    return out;
  }

  private enqueue(e: KeyboardEvent, type: 'keyDown' | 'keyUp'): void {
    const code = resolveKeyCode(e);
    // Arrow keys would otherwise scroll the page.
    if (translateKeyCode(code)) e.preventDefault();
    this.queue.push({ type, code });
  }
}
