export * from './base.js';
export * from './forbid-pattern.js';
export * from './require-pattern.js';
export * from './line-limits.js';
export * from './first-line.js';
export * from './require-section.js';
export * from './registry.js';
