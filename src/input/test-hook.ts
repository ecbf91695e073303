import { EventEmitter } from 'node:events';
import type { InputHook, KeyEvent, PointerEvent } from './types';

export const TEST_KEY_CODES = {
  Escape: 1,
  F2: 60,
  H: 35,
  S: 31,
  X: 45,
  Space: 57,
} as const;

/**
 * In-process stand-in for the native hook
 */
export class FakeInputHook implements InputHook {
  readonly keyCodes: Readonly<Record<string, number>> = TEST_KEY_CODES;
  readonly events = new EventEmitter();
  running = false;

  onKeyDown(listener: (event: KeyEvent) => void) {
    return this.listen('keydown', listener);
  }

  onMouseDown(listener: (event: PointerEvent) => void) {
    return this.listen('mousedown', listener);
  }

  onMouseUp(listener: (event: PointerEvent) => void) {
    return this.listen('mouseup', listener);
  }

  start() {
    this.running = true;
  }

  stop() {
    this.running = false;
  }

  press(keycode: number, modifiers: Partial<Omit<KeyEvent, 'keycode'>> = {}) {
    this.events.emit('keydown', {
      keycode,
      ctrlKey: false,
      shiftKey: false,
      altKey: false,
      metaKey: false,
      ...modifiers,
    });
  }

  mouse(type: 'mousedown' | 'mouseup', x: number, y: number, button = 1) {
    this.events.emit(type, { button, x, y });
  }

  private listen<E>(event: string, listener: (e: E) => void) {
    this.events.on(event, listener);
    return () => {
      this.events.off(event, listener);
    };
  }
}
