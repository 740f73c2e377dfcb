/**
 * Input events and the key bindings for cursor movement
 */

import type { CursorAction } from '../state.js';

export type NamedKey = 'up' | 'down' | 'left' | 'right' | 'escape' | 'enter' | 'tab' | 'backspace' | 'other';

export type KeyCode = { kind: 'char'; char: string } | { kind: 'named'; name: NamedKey };

/**
 * A key press. terminal-kit reports presses only, never releases.
 */
export interface KeyEvent {
  type: 'key';
  code: KeyCode;
  ctrl: boolean;
}

export interface ResizeEvent {
  type: 'resize';
  width: number;
  height: number;
}

export type InputEvent = KeyEvent | ResizeEvent;

/**
 * What the loop should do in response to a key
 */
export type KeyAction = { type: 'quit' } | { type: 'move'; action: CursorAction } | { type: 'none' };

const NAMED_KEYS: Record<string, NamedKey> = {
  UP: 'up',
  DOWN: 'down',
  LEFT: 'left',
  RIGHT: 'right',
  ESCAPE: 'escape',
  ENTER: 'enter',
  TAB: 'tab',
  BACKSPACE: 'backspace',
};

export const char = (c: string, ctrl = false): KeyEvent => ({ type: 'key', code: { kind: 'char', char: c }, ctrl });
export const named = (name: NamedKey): KeyEvent => ({ type: 'key', code: { kind: 'named', name }, ctrl: false });

/**
 * Converts a terminal-kit key name ('UP', 'CTRL_C', 'q', ...) to a KeyEvent
 */
export function parseTermkitKey(name: string): KeyEvent {
  const ctrlMatch = /^CTRL_([A-Z])$/.exec(name);
  if (ctrlMatch) {
    return char(ctrlMatch[1].toLowerCase(), true);
  }
  if (Array.from(name).length === 1) {
    return char(name);
  }
  return named(NAMED_KEYS[name] ?? 'other');
}

/**
 * Maps a key to its action. First match wins.
 */
export function keyToAction(event: KeyEvent): KeyAction {
  const { code, ctrl } = event;

  if (code.kind === 'char') {
    if (ctrl) {
      return code.char === 'c' ? { type: 'quit' } : { type: 'none' };
    }
    switch (code.char) {
      case 'q':
        return { type: 'quit' };
      case 's':
        return { type: 'move', action: 'advanceRow' };
      case 'w':
        return { type: 'move', action: 'retreatRow' };
      case 'd':
        return { type: 'move', action: 'advanceColumn' };
      case 'a':
        return { type: 'move', action: 'retreatColumn' };
      default:
        return { type: 'none' };
    }
  }

  switch (code.name) {
    case 'escape':
      return { type: 'quit' };
    case 'down':
      return { type: 'move', action: 'advanceRow' };
    case 'up':
      return { type: 'move', action: 'retreatRow' };
    case 'right':
      return { type: 'move', action: 'advanceColumn' };
    case 'left':
      return { type: 'move', action: 'retreatColumn' };
    default:
      return { type: 'none' };
  }
}

/**
 * Short label for the debug log, e.g. "CTRL+c" or "down"
 */
export function describeKey(event: KeyEvent): string {
  const base = event.code.kind === 'char' ? event.code.char : event.code.name;
  return event.ctrl ? `CTRL+${base}` : base;
}
