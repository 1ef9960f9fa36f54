// Story generation: prompts, response parsing, fallbacks and the retrying generator

export * from './types.js';
export * from './prompts.js';
export * from './parse.js';
export * from './fallback.js';
export * from './generator.js';
