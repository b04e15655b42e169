/**
 * sft-distill
 * Main library entry point
 */

// Re-export modules for programmatic use
export * from './archive/index.js';
export * from './config/index.js';
export * from './dataset/index.js';
export * from './utils/index.js';
export * from './window/index.js';
export { createProgram } from './cli/index.js';
export { version } from './version.js';
