/**
 * Shared constants for the TUI module
 */

// ============================================================================
// Size Gate
// ============================================================================

/** Below either of these the table is replaced by a warning */
export const MIN_WIDTH = 30;
export const MIN_HEIGHT = 10;

export const TOO_SMALL_MESSAGE = `Terminal size too small.\nMinimum size is ${MIN_WIDTH}x${MIN_HEIGHT}.`;

// ============================================================================
// Table Geometry
// ============================================================================

/** Width shared by the title and the table */
export const CONTENT_WIDTH = 30;
export const TITLE_HEIGHT = 1;
/** Each grid row is three lines tall with its value on the middle line */
export const ROW_HEIGHT = 3;
export const COLUMN_SPACING = 1;

// ============================================================================
// ANSI Escape Codes
// ============================================================================

export const RESET = '\x1b[0m';
export const REVERSE = '\x1b[7m';
export const SHOW_CURSOR = '\x1b[?25h';
export const CLEAR_SCREEN = '\x1b[2J';
export const CURSOR_HOME = '\x1b[H';
