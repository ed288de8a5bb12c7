export * from './types.js';
export * from './placeholders.js';
export * from './injector.js';
export * from './providers.js';
