export * from './types';
export * from './sync-planner';
export * from './run-state';
export * from './unit-worker';
export * from './sync-run';
export * from './snapshot-disk';
export * from './create-engine';
export * from './cli-args';
