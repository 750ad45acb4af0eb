export * from './benchmark.js';
export * from './catalog.js';
export * from './classifier.js';
export * from './commandBuilder.js';
export * from './console.js';
export * from './evaluate.js';
export * from './executor.js';
export * from './metrics.js';
export * from './profiles.js';
export * from './report.js';
export * from './roundtrip.js';
export * from './runner.js';
export * from './shell.js';
export * from './targets.js';
export type * from './types.js';
