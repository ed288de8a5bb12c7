/**
 * promptsmith - compose AI-assistant prompts from Markdown templates and
 * review generated artifacts against checklists.
 */

// Configuration
export * from './core/config/index.js';

// Template loading
export * from './core/templates/index.js';

// Context injection
export * from './core/context/index.js';

// Checklists and review
export * from './core/checklists/index.js';
export * from './core/validation/index.js';

// Pipeline
export * from './core/pipeline/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
