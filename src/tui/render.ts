// TUI rendering logic - projects the app state onto the drawing surface
// Recomputes the whole frame every time; nothing is kept between frames

import type { AppState } from '../state.js';
import { COLUMN_SPACING, MIN_HEIGHT, MIN_WIDTH, ROW_HEIGHT, TOO_SMALL_MESSAGE } from './constants.js';
import { calculateLayout, center, length, percentage, type Rect } from './layout.js';
import type { TableColors } from './palettes.js';
import type { Surface } from './surface.js';
import type { Table, TableRow } from './table.js';

/**
 * Everything one frame needs. Passed in per draw call and never retained.
 */
export interface FrameView {
  state: AppState;
  colors: TableColors;
  title: string;
}

/**
 * Which of the two screens a frame shows
 */
export type FrameMode = 'tooSmall' | 'table';

export function isTooSmall(area: Rect): boolean {
  return area.width < MIN_WIDTH || area.height < MIN_HEIGHT;
}

/**
 * Draws one frame. Below the minimum size only the warning is drawn.
 * @returns The mode the frame was drawn in
 */
export function drawFrame(surface: Surface, view: FrameView): FrameMode {
  const area = surface.area;

  if (isTooSmall(area)) {
    surface.drawParagraph(center(area, percentage(100), length(2)), {
      text: TOO_SMALL_MESSAGE,
      style: { fg: 'red' },
      centered: true,
      wrap: { trim: true },
    });
    return 'tooSmall';
  }

  const { titleArea, tableArea } = calculateLayout(area, view.state.grid.length);
  surface.drawParagraph(titleArea, { text: view.title, centered: true });
  surface.drawTable(tableArea, buildTable(view), {
    row: view.state.cursor.row,
    column: view.state.cursor.column,
  });
  return 'table';
}

/**
 * Builds the table widget for the grid: zebra-striped rows, equal-width
 * columns and the three highlight styles.
 */
export function buildTable(view: FrameView): Table {
  const { colors, state } = view;
  const columnCount = state.grid.length > 0 ? state.grid[0].length : 0;

  const rows: TableRow[] = state.grid.map((values, i) => ({
    // Leading newline puts the value on the middle line of the 3-line row
    cells: values.map((value) => `\n${value}`),
    style: { fg: colors.rowFg, bg: i % 2 === 0 ? colors.normalRowBg : colors.altRowBg },
    height: ROW_HEIGHT,
  }));

  return {
    rows,
    widths: Array.from({ length: columnCount }, () => percentage(Math.floor(100 / columnCount))),
    columnSpacing: COLUMN_SPACING,
    style: { bg: colors.bufferBg },
    rowHighlightStyle: { reversed: true, fg: colors.selectedRowFg },
    columnHighlightStyle: { fg: colors.selectedColumnFg },
    cellHighlightStyle: { reversed: true, fg: colors.selectedCellFg },
    highlightSymbol: '',
    highlightSpacing: 'always',
  };
}
