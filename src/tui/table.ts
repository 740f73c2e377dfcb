/**
 * Table widget
 *
 * Rows carry their own base style (zebra striping is decided by the caller).
 * The selection is projected onto the table as up to three highlight layers,
 * always composed in the same order: row, then column, then cell.
 */

import type { FrameBuffer } from './buffer.js';
import { type Constraint, type Rect, splitColumns } from './layout.js';
import { composeStyles, layer, type Style, type StyleLayer } from './style.js';
import { centerOffset, textWidth, truncate } from './text.js';

export type HighlightLayer = 'row' | 'column' | 'cell';

/**
 * When to reserve the gutter that holds the highlight symbol
 * - always: reserved on every frame so the columns never shift
 * - whenSelected: only while a row is selected
 * - never: the symbol is not drawn
 */
export type HighlightSpacing = 'always' | 'whenSelected' | 'never';

export interface TableRow {
  /** Cell contents; `\n` starts a new line inside the cell */
  cells: string[];
  style: Style;
  height: number;
}

export interface Table {
  rows: TableRow[];
  widths: Constraint[];
  columnSpacing: number;
  /** Fills the whole table area before rows are drawn */
  style: Style;
  rowHighlightStyle: Style;
  columnHighlightStyle: Style;
  cellHighlightStyle: Style;
  highlightSymbol: string;
  highlightSpacing: HighlightSpacing;
}

export interface TableSelection {
  row: number | null;
  column: number | null;
}

/**
 * A cell after layout: where it goes, what it shows and which layers it carries
 */
export interface PlacedCell {
  row: number;
  column: number;
  rect: Rect;
  lines: string[];
  layers: HighlightLayer[];
  style: Style;
}

/**
 * Highlight layers carried by the cell at (row, column), in composition order
 */
export function highlightLayers(row: number, column: number, selection: TableSelection): HighlightLayer[] {
  const inRow = selection.row === row;
  const inColumn = selection.column === column;
  const layers: HighlightLayer[] = [];
  if (inRow) layers.push('row');
  if (inColumn) layers.push('column');
  if (inRow && inColumn) layers.push('cell');
  return layers;
}

function layerFor(table: Table, name: HighlightLayer): StyleLayer {
  switch (name) {
    case 'row':
      return layer(table.rowHighlightStyle);
    case 'column':
      return layer(table.columnHighlightStyle);
    case 'cell':
      return layer(table.cellHighlightStyle);
  }
}

/**
 * Final style of a cell: its row's base style with each layer applied in order
 */
export function cellStyle(table: Table, base: Style, layers: readonly HighlightLayer[]): Style {
  return composeStyles(
    base,
    layers.map((name) => layerFor(table, name)),
  );
}

function gutterWidth(table: Table, selection: TableSelection): number {
  const width = textWidth(table.highlightSymbol);
  switch (table.highlightSpacing) {
    case 'always':
      return width;
    case 'whenSelected':
      return selection.row !== null ? width : 0;
    case 'never':
      return 0;
  }
}

interface RowSlot {
  index: number;
  rect: Rect;
}

function rowSlots(area: Rect, rows: readonly TableRow[]): RowSlot[] {
  const slots: RowSlot[] = [];
  const bottom = area.y + area.height;
  let y = area.y;
  for (let index = 0; index < rows.length && y < bottom; index++) {
    const height = Math.min(rows[index].height, bottom - y);
    slots.push({ index, rect: { x: area.x, y, width: area.width, height } });
    y += height;
  }
  return slots;
}

/**
 * Places every visible cell. Rows that do not fit in `area` are cut off.
 */
export function layoutTable(area: Rect, table: Table, selection: TableSelection): PlacedCell[] {
  const gutter = gutterWidth(table, selection);
  const columnsArea = {
    x: area.x + gutter,
    y: area.y,
    width: Math.max(0, area.width - gutter),
    height: area.height,
  };
  const columns = splitColumns(columnsArea, table.widths, table.columnSpacing);

  const placed: PlacedCell[] = [];
  for (const slot of rowSlots(area, table.rows)) {
    const row = table.rows[slot.index];
    columns.forEach((columnRect, column) => {
      const layers = highlightLayers(slot.index, column, selection);
      placed.push({
        row: slot.index,
        column,
        rect: { x: columnRect.x, y: slot.rect.y, width: columnRect.width, height: slot.rect.height },
        lines: (row.cells[column] ?? '').split('\n').slice(0, slot.rect.height),
        layers,
        style: cellStyle(table, row.style, layers),
      });
    });
  }
  return placed;
}

/**
 * Draws the table into `buffer` within `area`
 */
export function renderTable(buffer: FrameBuffer, area: Rect, table: Table, selection: TableSelection): void {
  buffer.setStyle(area, table.style);

  const gutter = gutterWidth(table, selection);
  for (const slot of rowSlots(area, table.rows)) {
    const row = table.rows[slot.index];
    const selected = selection.row === slot.index;
    // Spacing between columns takes the row style and the row highlight, never the column one
    buffer.setStyle(slot.rect, selected ? cellStyle(table, row.style, ['row']) : row.style);
    if (selected && gutter > 0) {
      buffer.setString(slot.rect.x, slot.rect.y, table.highlightSymbol, {}, gutter);
    }
  }

  for (const cell of layoutTable(area, table, selection)) {
    buffer.setStyle(cell.rect, cell.style);
    cell.lines.forEach((line, i) => {
      const text = truncate(line, cell.rect.width);
      buffer.setString(cell.rect.x + centerOffset(text, cell.rect.width), cell.rect.y + i, text, {});
    });
  }
}
