export * from './types.js';
export * from './schema.js';
export * from './loader.js';
export * from './checks/index.js';
