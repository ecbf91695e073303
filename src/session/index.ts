export * from './session-machine';
export * from './session-store';
