/**
 * Drag overlay over the global input hook: left press marks the start, left
 * release the end, Escape or an aborted signal cancels.
 */

import { createLogger } from '../logging/logger';
import type { DragOverlay, DragResult, Point } from '../vision/types';
import type { InputHook } from './types';

const log = createLogger('overlay');

const PRIMARY_BUTTON = 1;

export class HookDragOverlay implements DragOverlay {
  constructor(private readonly hook: InputHook) {}

  awaitDrag(signal?: AbortSignal): Promise<DragResult> {
    if (signal?.aborted) return Promise.resolve({ kind: 'cancelled' });

    const escape = this.hook.keyCodes['Escape'];
    log.info('Drag to select a region, Escape to cancel');

    return new Promise<DragResult>((resolve) => {
      let start: Point | null = null;
      const unsubscribers: Array<() => void> = [];

      const finish = (result: DragResult) => {
        for (const unsubscribe of unsubscribers) unsubscribe();
        resolve(result);
      };

      const onAbort = () => finish({ kind: 'cancelled' });
      if (signal) {
        signal.addEventListener('abort', onAbort, { once: true });
        unsubscribers.push(() => signal.removeEventListener('abort', onAbort));
      }

      unsubscribers.push(
        this.hook.onMouseDown((event) => {
          if (event.button === PRIMARY_BUTTON) {
            start = { x: event.x, y: event.y };
          }
        }),
        this.hook.onMouseUp((event) => {
          if (event.button === PRIMARY_BUTTON && start) {
            finish({ kind: 'released', start, end: { x: event.x, y: event.y } });
          }
        }),
        this.hook.onKeyDown((event) => {
          if (event.keycode === escape) {
            finish({ kind: 'cancelled' });
          }
        })
      );
    });
  }
}
