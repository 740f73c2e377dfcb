// TUI module entry point
// Terminal backend used by the session runner

export { cleanupTerminal } from './terminal-cleanup.js';
export { openTerminal, type Terminal } from './terminal.js';
