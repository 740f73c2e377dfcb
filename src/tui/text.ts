// Text shaping for paragraphs and table cells
// Widths count code points, one terminal cell each, as FrameBuffer.setString does

/**
 * Number of cells `text` takes
 */
export function textWidth(text: string): number {
  return Array.from(text).length;
}

function sliceCells(text: string, start: number, end?: number): string {
  return Array.from(text).slice(start, end).join('');
}

/**
 * Word wrap text to fit within a maximum width
 * Explicit newlines always break. Words longer than the width are split.
 * Without `trim`, each paragraph keeps its leading indentation.
 * @param text - The text to wrap
 * @param maxWidth - Maximum width per line
 * @returns Array of wrapped lines
 */
export function wrapText(text: string, maxWidth: number, trim = true): string[] {
  if (maxWidth <= 0) {
    return [];
  }

  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    lines.push(...wrapParagraph(paragraph, maxWidth, !trim));
  }
  return lines;
}

function wrapParagraph(paragraph: string, maxWidth: number, keepIndent: boolean): string[] {
  const words = paragraph.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0) {
    return [''];
  }
  if (keepIndent) {
    words[0] = (/^\s*/.exec(paragraph)?.[0] ?? '') + words[0];
  }

  const lines: string[] = [];
  let currentLine = '';

  for (const word of words) {
    if (currentLine !== '' && textWidth(currentLine + ' ' + word) <= maxWidth) {
      currentLine += ' ' + word;
      continue;
    }
    if (currentLine !== '') {
      lines.push(currentLine);
    }
    // Word is longer than maxWidth, force break it
    let remaining = word;
    while (textWidth(remaining) > maxWidth) {
      lines.push(sliceCells(remaining, 0, maxWidth));
      remaining = sliceCells(remaining, maxWidth);
    }
    currentLine = remaining;
  }

  if (currentLine) {
    lines.push(currentLine);
  }
  return lines;
}

/**
 * Column offset that centers `text` in `width` cells (extra cell goes right)
 */
export function centerOffset(text: string, width: number): number {
  return Math.max(0, Math.floor((width - textWidth(text)) / 2));
}

/**
 * Cuts text to at most `width` cells
 */
export function truncate(text: string, width: number): string {
  return textWidth(text) > width ? sliceCells(text, 0, Math.max(0, width)) : text;
}
