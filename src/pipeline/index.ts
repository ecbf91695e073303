export * from './run-journal';
export * from './orchestrator';
