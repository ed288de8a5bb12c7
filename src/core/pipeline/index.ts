export * from './library.js';
export * from './pipeline.js';
