/**
 * Global input hook types.
 *
 * A thin view of the native hook: enough for hotkeys and drag selection, and
 * small enough to fake in tests.
 */

export interface KeyEvent {
  keycode: number;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

export interface PointerEvent {
  /** 1 is the primary (left) button */
  button: unknown;
  x: number;
  y: number;
}

export interface InputHook {
  /** Key name → keycode, as named by the native hook (`F2`, `Escape`, `A`, ...) */
  readonly keyCodes: Readonly<Record<string, number>>;
  onKeyDown(listener: (event: KeyEvent) => void): () => void;
  onMouseDown(listener: (event: PointerEvent) => void): () => void;
  onMouseUp(listener: (event: PointerEvent) => void): () => void;
  start(): void;
  stop(): void;
}
