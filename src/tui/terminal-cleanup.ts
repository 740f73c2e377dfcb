/**
 * Terminal acquire/restore
 *
 * Restoring is idempotent: after one successful acquire, the first call to
 * cleanupTerminal() restores the terminal and later calls do nothing. That lets
 * the entry point call it from both a `finally` block and an exit hook.
 */

import termKit from 'terminal-kit';
import { CLEAR_SCREEN, CURSOR_HOME, SHOW_CURSOR } from './constants.js';

const term = termKit.terminal;

let acquired = false;

/**
 * Enters fullscreen (alternate screen buffer), hides the cursor and grabs
 * keyboard input. The terminal counts as acquired before the first step runs,
 * so a failure part-way through is still restored by cleanupTerminal().
 */
export function acquireTerminal(): void {
  acquired = true;
  term.fullscreen(true);
  term.hideCursor();
  term.grabInput(true);
}

export function isTerminalAcquired(): boolean {
  return acquired;
}

/**
 * Fully reset the terminal to a clean state.
 *
 * Handles:
 * - Clearing the screen
 * - Releasing input grabbing
 * - Exiting fullscreen/alternate screen buffer
 * - Resetting styles and raw mode
 * - Showing cursor
 *
 * @returns true if this call restored the terminal, false if there was nothing to restore
 */
export function cleanupTerminal(): boolean {
  if (!acquired) return false;
  acquired = false;

  // Clear the alternate screen buffer before exiting
  term.clear();
  term.grabInput(false);
  term.fullscreen(false);
  term.styleReset();

  // Explicitly reset raw mode if it was set
  if (process.stdin.isTTY && process.stdin.setRawMode) {
    process.stdin.setRawMode(false);
  }

  // Written directly in case terminal-kit's own sequences did not complete
  process.stdout.write(SHOW_CURSOR);
  process.stdout.write(CLEAR_SCREEN);
  process.stdout.write(CURSOR_HOME);
  return true;
}
