/**
 * tsgrep - structural search for TypeScript and JavaScript code.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Patterns
export * from './core/pattern/index.js';

// Matching
export * from './core/match/index.js';

// Rendering
export * from './core/render/index.js';

// Corpus loading
export * from './core/corpus/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli, runCli } from './cli/index.js';
