export * from './types.js';
export * from './tree.js';
export * from './validate.js';
export * from './display.js';
