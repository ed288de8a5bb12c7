export * from './types.js';
export * from './parser.js';
export * from './sources.js';
export * from './loader.js';
