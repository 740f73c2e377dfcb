/**
 * Drawing surface handed to the renderer for one frame
 */

import { FrameBuffer } from './buffer.js';
import type { Rect } from './layout.js';
import type { Style } from './style.js';
import { renderTable, type Table, type TableSelection } from './table.js';
import { centerOffset, truncate, wrapText } from './text.js';

/**
 * Block of text drawn into a rectangle
 */
export interface Paragraph {
  text: string;
  style?: Style;
  centered?: boolean;
  /** Word-wrap to the area width; `trim` drops leading whitespace on each line */
  wrap?: { trim: boolean };
}

/**
 * Primitive operations the renderer draws with
 */
export interface Surface {
  /** Full drawing area, in terminal cells */
  readonly area: Rect;
  drawParagraph(area: Rect, paragraph: Paragraph): void;
  drawTable(area: Rect, table: Table, selection: TableSelection): void;
}

/**
 * Lines a paragraph occupies in a region of the given width
 */
export function paragraphLines(paragraph: Paragraph, width: number): string[] {
  if (paragraph.wrap) {
    return wrapText(paragraph.text, width, paragraph.wrap.trim);
  }
  return paragraph.text.split('\n').map((line) => truncate(line, width));
}

/**
 * Surface that draws into a FrameBuffer
 */
export class BufferSurface implements Surface {
  readonly buffer: FrameBuffer;

  constructor(buffer: FrameBuffer) {
    this.buffer = buffer;
  }

  get area(): Rect {
    return this.buffer.area;
  }

  drawParagraph(area: Rect, paragraph: Paragraph): void {
    const style = paragraph.style ?? {};
    this.buffer.setStyle(area, style);
    const lines = paragraphLines(paragraph, area.width).slice(0, area.height);
    lines.forEach((line, i) => {
      const x = paragraph.centered ? area.x + centerOffset(line, area.width) : area.x;
      this.buffer.setString(x, area.y + i, line, style, area.width);
    });
  }

  drawTable(area: Rect, table: Table, selection: TableSelection): void {
    renderTable(this.buffer, area, table, selection);
  }
}
