export * from './types';
export * from './hook';
export * from './hotkeys';
export * from './drag-overlay';
