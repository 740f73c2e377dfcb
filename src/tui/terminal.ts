/**
 * Terminal-kit backend
 *
 * Implements the two interfaces the app loop consumes: `draw` renders a frame
 * and writes the lines that changed since the previous one, and `readEvent`
 * waits for the next key press or resize.
 */

import termKit from 'terminal-kit';
import { InputReadError, TerminalInitError } from '../errors.js';
import { FrameBuffer } from './buffer.js';
import { InputQueue } from './input-queue.js';
import { type InputEvent, parseTermkitKey } from './keys.js';
import { BufferSurface, type Surface } from './surface.js';
import { acquireTerminal, cleanupTerminal } from './terminal-cleanup.js';

const term = termKit.terminal;

/**
 * What the app loop needs from a terminal
 */
export interface Terminal {
  /** Renders one frame from scratch */
  draw(render: (surface: Surface) => void): void;
  /** Resolves with the next input event; rejects if input fails */
  readEvent(): Promise<InputEvent>;
}

// Fallbacks when terminal-kit cannot report a size
const DEFAULT_WIDTH = 80;
const DEFAULT_HEIGHT = 24;

export function terminalSize(): { width: number; height: number } {
  let width = DEFAULT_WIDTH;
  let height = DEFAULT_HEIGHT;
  if (typeof term.width === 'number' && Number.isFinite(term.width) && term.width > 0) {
    width = term.width;
  }
  if (typeof term.height === 'number' && Number.isFinite(term.height) && term.height > 0) {
    height = term.height;
  }
  return { width, height };
}

export class TermkitTerminal implements Terminal {
  private readonly queue = new InputQueue();
  private previous: FrameBuffer | null = null;
  private closed = false;

  private readonly onKey = (name: string): void => {
    this.queue.push(parseTermkitKey(name));
  };

  private readonly onResize = (width: number, height: number): void => {
    // Force a full repaint on the next frame
    this.previous = null;
    this.queue.push({ type: 'resize', width, height });
  };

  private readonly onInputError = (err: unknown): void => {
    this.queue.fail(new InputReadError('Failed to read from stdin', { cause: err }));
  };

  constructor() {
    term.on('key', this.onKey);
    term.on('resize', this.onResize);
    process.stdin.on('error', this.onInputError);
  }

  draw(render: (surface: Surface) => void): void {
    const { width, height } = terminalSize();
    const buffer = new FrameBuffer(width, height);
    render(new BufferSurface(buffer));

    for (const y of buffer.changedLines(this.previous)) {
      term.moveTo(1, y + 1);
      process.stdout.write(buffer.renderLine(y));
    }
    this.previous = buffer;
  }

  readEvent(): Promise<InputEvent> {
    return this.queue.next();
  }

  /**
   * Detaches listeners and restores the terminal. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    term.removeAllListeners('key');
    term.removeAllListeners('resize');
    process.stdin.off('error', this.onInputError);
    cleanupTerminal();
  }
}

/**
 * Takes over the terminal. If anything fails the terminal is restored before
 * the TerminalInitError is thrown.
 */
export function openTerminal(): TermkitTerminal {
  if (!process.stdout.isTTY || !process.stdin.isTTY) {
    throw new TerminalInitError('gridpick needs an interactive terminal (stdin and stdout must be a TTY)');
  }
  try {
    acquireTerminal();
    return new TermkitTerminal();
  } catch (err) {
    cleanupTerminal();
    throw new TerminalInitError('Failed to take over the terminal', { cause: err });
  }
}
