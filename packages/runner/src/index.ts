export * from './errors.js';
export * from './testCase.js';
export * from './measurement.js';
export * from './metric.js';
export * from './evaluate.js';
export * from './metrics/composite.js';
export * from './metrics/exactMatch.js';
export * from './metrics/rankingSimilarity.js';
export * from './mcpScorer.js';
export * from './registry.js';
export * from './pool.js';
export * from './testRunner.js';
export * from './report.js';
export * from './trace.js';
export * from './config.js';
export * from './dataset.js';
export * from './suite.js';
export * from './runner.js';
export type * from './types.js';
