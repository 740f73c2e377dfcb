#!/usr/bin/env node

// Main entry point for gridpick

import { describeError } from './errors.js';
import { main } from './main.js';
import { cleanupTerminal } from './tui/index.js';

// Restore the terminal however the process ends (no-op if already restored)
process.on('exit', () => {
  cleanupTerminal();
});
process.on('SIGTERM', () => {
  process.exit(0);
});

main().then(
  (code) => {
    process.exit(code);
  },
  (error: unknown) => {
    cleanupTerminal();
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exit(1);
  },
);
