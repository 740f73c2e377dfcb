// Global state management for gridpick
// Tracks the grid being displayed and the row/column cursor moving across it

/**
 * Grid of display values, indexed [row][column]
 */
export type Grid = readonly (readonly string[])[];

/**
 * Grid dimensions (M rows × N columns)
 */
export interface GridSize {
  rows: number;
  columns: number;
}

/**
 * Cursor position. Both fields always lie within the grid bounds.
 */
export interface Cursor {
  row: number;
  column: number;
}

/**
 * Navigation actions the cursor understands
 */
export type CursorAction = 'advanceRow' | 'retreatRow' | 'advanceColumn' | 'retreatColumn';

/**
 * Main application state interface
 */
export interface AppState {
  grid: Grid;
  cursor: Cursor;
}

/**
 * The fixed 3×3 board
 */
export const DEFAULT_GRID: Grid = [
  ['1', '2', '3'],
  ['4', '5', '6'],
  ['7', '8', '9'],
];

/**
 * Creates a cursor at the top-left cell
 */
export function createCursor(): Cursor {
  return { row: 0, column: 0 };
}

/**
 * Creates the initial application state
 */
export function createInitialState(grid: Grid = DEFAULT_GRID): AppState {
  if (grid.length === 0 || grid[0].length === 0) {
    throw new Error('Grid must have at least one row and one column');
  }
  return {
    grid,
    cursor: createCursor(),
  };
}

/**
 * Returns the dimensions of a grid. Column count is taken from the first row.
 */
export function gridSize(grid: Grid): GridSize {
  return {
    rows: grid.length,
    columns: grid.length > 0 ? grid[0].length : 0,
  };
}

/**
 * Moves the cursor one row down, wrapping from the last row to the first
 */
export function advanceRow(cursor: Cursor, size: GridSize): void {
  cursor.row = cursor.row === size.rows - 1 ? 0 : cursor.row + 1;
}

/**
 * Moves the cursor one row up, wrapping from the first row to the last
 */
export function retreatRow(cursor: Cursor, size: GridSize): void {
  cursor.row = cursor.row === 0 ? size.rows - 1 : cursor.row - 1;
}

/**
 * Moves the cursor one column right, wrapping from the last column to the first
 */
export function advanceColumn(cursor: Cursor, size: GridSize): void {
  cursor.column = cursor.column === size.columns - 1 ? 0 : cursor.column + 1;
}

/**
 * Moves the cursor one column left, wrapping from the first column to the last
 */
export function retreatColumn(cursor: Cursor, size: GridSize): void {
  cursor.column = cursor.column === 0 ? size.columns - 1 : cursor.column - 1;
}

/**
 * Applies a navigation action to the state's cursor
 */
export function applyAction(state: AppState, action: CursorAction): void {
  const size = gridSize(state.grid);
  switch (action) {
    case 'advanceRow':
      advanceRow(state.cursor, size);
      break;
    case 'retreatRow':
      retreatRow(state.cursor, size);
      break;
    case 'advanceColumn':
      advanceColumn(state.cursor, size);
      break;
    case 'retreatColumn':
      retreatColumn(state.cursor, size);
      break;
  }
}

/**
 * Value of the cell under the cursor
 */
export function selectedValue(state: AppState): string {
  return state.grid[state.cursor.row][state.cursor.column];
}
