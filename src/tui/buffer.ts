/**
 * In-memory frame of styled terminal cells
 *
 * Every frame is drawn from scratch into a FrameBuffer. The terminal backend
 * compares it with the previous frame and only rewrites the lines that
 * changed (minimal redraws, no flicker).
 */

import { RESET } from './constants.js';
import type { Rect } from './layout.js';
import { patchStyle, type Style, styleToAnsi, stylesEqual } from './style.js';

export interface Cell {
  symbol: string;
  style: Style;
}

export class FrameBuffer {
  readonly width: number;
  readonly height: number;
  private readonly cells: Cell[];

  constructor(width: number, height: number) {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
    this.cells = Array.from({ length: this.width * this.height }, () => ({ symbol: ' ', style: {} }));
  }

  /** The whole buffer as a rectangle at the origin */
  get area(): Rect {
    return { x: 0, y: 0, width: this.width, height: this.height };
  }

  cell(x: number, y: number): Cell | null {
    if (!this.contains(x, y)) return null;
    return this.cells[y * this.width + x];
  }

  /**
   * Writes text starting at (x, y), clipped to `maxWidth` cells and to the
   * buffer edge. The cells written take `style` patched over their current style.
   */
  setString(x: number, y: number, text: string, style: Style, maxWidth = Infinity): void {
    const chars = Array.from(text);
    const limit = Math.min(chars.length, maxWidth);
    for (let i = 0; i < limit; i++) {
      const cell = this.cell(x + i, y);
      if (!cell) continue;
      cell.symbol = chars[i];
      cell.style = patchStyle(cell.style, style);
    }
  }

  /**
   * Patches `style` onto every cell of `rect` without touching symbols
   */
  setStyle(rect: Rect, style: Style): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        const cell = this.cell(x, y);
        if (cell) {
          cell.style = patchStyle(cell.style, style);
        }
      }
    }
  }

  /** Plain text of one line, without styling */
  lineText(y: number): string {
    let line = '';
    for (let x = 0; x < this.width; x++) {
      line += this.cells[y * this.width + x].symbol;
    }
    return line;
  }

  /**
   * One line as an ANSI string, switching style only where it changes
   */
  renderLine(y: number): string {
    let out = '';
    let current: Style | null = null;
    for (let x = 0; x < this.width; x++) {
      const cell = this.cells[y * this.width + x];
      if (current === null || !stylesEqual(current, cell.style)) {
        out += RESET + styleToAnsi(cell.style);
        current = cell.style;
      }
      out += cell.symbol;
    }
    return out + RESET;
  }

  /**
   * Indexes of lines that differ from `previous`. Every line counts as
   * changed when there is no previous frame or its size differs.
   */
  changedLines(previous: FrameBuffer | null): number[] {
    const lines: number[] = [];
    for (let y = 0; y < this.height; y++) {
      if (
        previous === null ||
        previous.width !== this.width ||
        previous.height !== this.height ||
        this.lineDiffers(previous, y)
      ) {
        lines.push(y);
      }
    }
    return lines;
  }

  private lineDiffers(other: FrameBuffer, y: number): boolean {
    for (let x = 0; x < this.width; x++) {
      const i = y * this.width + x;
      const a = this.cells[i];
      const b = other.cells[i];
      if (a.symbol !== b.symbol || !stylesEqual(a.style, b.style)) {
        return true;
      }
    }
    return false;
  }

  private contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }
}
