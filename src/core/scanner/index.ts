export * from './types.js';
export * from './lines.js';
export * from './counter.js';
export * from './scanner.js';
