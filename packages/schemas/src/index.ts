export * from './enums';
export * from './records';
export * from './scope';
export * from './snapshot';
