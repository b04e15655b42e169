#!/usr/bin/env node
/**
 * CLI entry point
 */

import { createProgram } from './cli/index.js';

createProgram()
  .parseAsync()
  .catch((err) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
