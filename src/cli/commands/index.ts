/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export {
  configureDistillCommand,
  parseAuthorId,
  runDistill,
  type DistillOptions,
} from './distill.js';
