export * from './types.js';
export * from './binary-detector.js';
export * from './output-sink.js';
export * from './tree-walker.js';
