// Layout helpers for the table screen
// Rectangles are in terminal cells with a 0-based origin

import { CONTENT_WIDTH, ROW_HEIGHT, TITLE_HEIGHT } from './constants.js';

/**
 * A rectangular region of the terminal
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Size rule for one side of a region
 * - length: exactly `value` cells (clamped to what is available)
 * - percentage: `value`% of the available cells, rounded down
 * - max: at most `value` cells
 */
export type Constraint =
  | { type: 'length'; value: number }
  | { type: 'percentage'; value: number }
  | { type: 'max'; value: number };

export const length = (value: number): Constraint => ({ type: 'length', value });
export const percentage = (value: number): Constraint => ({ type: 'percentage', value });
export const max = (value: number): Constraint => ({ type: 'max', value });

/**
 * Resolves a constraint against the number of cells available
 */
export function resolveConstraint(constraint: Constraint, available: number): number {
  const space = Math.max(0, available);
  switch (constraint.type) {
    case 'length':
    case 'max':
      return Math.min(Math.max(0, constraint.value), space);
    case 'percentage':
      return Math.min(Math.floor((space * constraint.value) / 100), space);
  }
}

/**
 * Leading share of `leftover` cells when centering; the odd cell goes first
 */
function leadingSpace(leftover: number): number {
  return Math.ceil(leftover / 2);
}

/**
 * Returns a sub-rectangle of the given size centered in `area`.
 * Odd leftover space puts the extra cell before the region.
 */
export function center(area: Rect, horizontal: Constraint, vertical: Constraint): Rect {
  const width = resolveConstraint(horizontal, area.width);
  const height = resolveConstraint(vertical, area.height);
  return {
    x: area.x + leadingSpace(area.width - width),
    y: area.y + leadingSpace(area.height - height),
    width,
    height,
  };
}

/**
 * Stacks regions vertically and centers the stack as a unit in `area`.
 * Regions that do not fit are shortened, last first.
 */
export function stackCentered(area: Rect, constraints: readonly Constraint[]): Rect[] {
  let remaining = area.height;
  const heights = constraints.map((constraint) => {
    const height = resolveConstraint(constraint, remaining);
    remaining -= height;
    return height;
  });
  const total = heights.reduce((sum, h) => sum + h, 0);

  let y = area.y + leadingSpace(area.height - total);
  return heights.map((height) => {
    const rect = { x: area.x, y, width: area.width, height };
    y += height;
    return rect;
  });
}

/**
 * Splits `area` into columns from the left, `spacing` cells apart.
 * Percentages are taken of the full width.
 */
export function splitColumns(area: Rect, widths: readonly Constraint[], spacing: number): Rect[] {
  let x = area.x;
  const right = area.x + area.width;
  return widths.map((constraint) => {
    const width = Math.min(resolveConstraint(constraint, area.width), Math.max(0, right - x));
    const rect = { x, y: area.y, width, height: area.height };
    x = Math.min(right, x + width + spacing);
    return rect;
  });
}

/**
 * Title and table regions of one frame
 */
export interface ScreenLayout {
  titleArea: Rect;
  tableArea: Rect;
}

/**
 * Stacks the title over the table, centers the pair vertically and pins both
 * to the content width.
 */
export function calculateLayout(area: Rect, rowCount: number): ScreenLayout {
  const tableHeight = rowCount * ROW_HEIGHT;
  const [titleSlot, tableSlot] = stackCentered(area, [max(TITLE_HEIGHT), max(tableHeight)]);
  return {
    titleArea: center(titleSlot, length(CONTENT_WIDTH), length(TITLE_HEIGHT)),
    tableArea: center(tableSlot, length(CONTENT_WIDTH), length(tableHeight)),
  };
}
