/**
 * Native input hook backed by uiohook-napi.
 *
 * Loaded lazily so tests and `--check` runs never touch the native module.
 */

import type { UiohookKeyboardEvent, UiohookMouseEvent } from 'uiohook-napi';
import { createLogger } from '../logging/logger';
import type { InputHook } from './types';

const log = createLogger('input');

export async function createNativeInputHook(): Promise<InputHook> {
  const { uIOhook, UiohookKey } = await import('uiohook-napi');
  log.debug('uiohook-napi loaded');

  return {
    keyCodes: UiohookKey,
    onKeyDown: (listener) => {
      const handler = (event: UiohookKeyboardEvent) => listener(event);
      uIOhook.on('keydown', handler);
      return () => {
        uIOhook.off('keydown', handler);
      };
    },
    onMouseDown: (listener) => {
      const handler = (event: UiohookMouseEvent) => listener(event);
      uIOhook.on('mousedown', handler);
      return () => {
        uIOhook.off('mousedown', handler);
      };
    },
    onMouseUp: (listener) => {
      const handler = (event: UiohookMouseEvent) => listener(event);
      uIOhook.on('mouseup', handler);
      return () => {
        uIOhook.off('mouseup', handler);
      };
    },
    start: () => {
      uIOhook.start();
      log.info('Global input hook started');
    },
    stop: () => {
      uIOhook.stop();
      log.info('Global input hook stopped');
    },
  };
}
