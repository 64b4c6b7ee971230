export * from './types.js';
export * from './rule-parser.js';
export * from './pattern-matcher.js';
export * from './ignore-manager.js';
