#!/usr/bin/env node
/**
 * tidemark CLI
 * Command-line interface for versioned migrations
 */

import { runCli } from './program';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  },
);
