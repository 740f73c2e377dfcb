import { beforeEach, describe, expect, it } from 'vitest';
import {
  advanceColumn,
  advanceRow,
  type AppState,
  applyAction,
  createCursor,
  createInitialState,
  type Cursor,
  DEFAULT_GRID,
  type GridSize,
  gridSize,
  retreatColumn,
  retreatRow,
  selectedValue,
} from './state.js';

const SIZES: GridSize[] = [
  { rows: 1, columns: 1 },
  { rows: 3, columns: 3 },
  { rows: 2, columns: 5 },
  { rows: 4, columns: 1 },
];

function everyPosition(size: GridSize): Cursor[] {
  const positions: Cursor[] = [];
  for (let row = 0; row < size.rows; row++) {
    for (let column = 0; column < size.columns; column++) {
      positions.push({ row, column });
    }
  }
  return positions;
}

describe('state', () => {
  describe('createInitialState', () => {
    it('should start at the top-left cell of the default grid', () => {
      const state = createInitialState();

      expect(state.cursor).toEqual({ row: 0, column: 0 });
      expect(state.grid).toBe(DEFAULT_GRID);
      expect(gridSize(state.grid)).toEqual({ rows: 3, columns: 3 });
    });

    it('should create independent cursors', () => {
      const state1 = createInitialState();
      const state2 = createInitialState();

      state1.cursor.row = 2;
      expect(state2.cursor.row).toBe(0);
    });

    it('should reject an empty grid', () => {
      expect(() => createInitialState([])).toThrow('Grid must have at least one row and one column');
      expect(() => createInitialState([[]])).toThrow('Grid must have at least one row and one column');
    });
  });

  describe('wrap-around on a 3×3 grid', () => {
    const size = { rows: 3, columns: 3 };
    let cursor: Cursor;

    beforeEach(() => {
      cursor = createCursor();
    });

    it('should wrap from the last row to the first', () => {
      cursor.row = 2;
      advanceRow(cursor, size);
      expect(cursor.row).toBe(0);
    });

    it('should wrap from the first row to the last', () => {
      retreatRow(cursor, size);
      expect(cursor.row).toBe(2);
    });

    it('should wrap from the last column to the first', () => {
      cursor.column = 2;
      advanceColumn(cursor, size);
      expect(cursor.column).toBe(0);
    });

    it('should wrap from the first column to the last', () => {
      retreatColumn(cursor, size);
      expect(cursor.column).toBe(2);
    });

    it('should step without wrapping inside the grid', () => {
      advanceRow(cursor, size);
      advanceColumn(cursor, size);
      advanceColumn(cursor, size);
      retreatColumn(cursor, size);
      expect(cursor).toEqual({ row: 1, column: 1 });
    });
  });

  describe('cyclic transitions', () => {
    for (const size of SIZES) {
      it(`should return to the start after a full cycle on ${size.rows}×${size.columns}`, () => {
        for (const start of everyPosition(size)) {
          const cursor = { ...start };

          for (let i = 0; i < size.rows; i++) advanceRow(cursor, size);
          expect(cursor).toEqual(start);
          for (let i = 0; i < size.rows; i++) retreatRow(cursor, size);
          expect(cursor).toEqual(start);
          for (let i = 0; i < size.columns; i++) advanceColumn(cursor, size);
          expect(cursor).toEqual(start);
          for (let i = 0; i < size.columns; i++) retreatColumn(cursor, size);
          expect(cursor).toEqual(start);
        }
      });

      it(`should undo each step with its opposite on ${size.rows}×${size.columns}`, () => {
        for (const start of everyPosition(size)) {
          const cursor = { ...start };

          advanceRow(cursor, size);
          retreatRow(cursor, size);
          expect(cursor).toEqual(start);

          retreatRow(cursor, size);
          advanceRow(cursor, size);
          expect(cursor).toEqual(start);

          advanceColumn(cursor, size);
          retreatColumn(cursor, size);
          expect(cursor).toEqual(start);

          retreatColumn(cursor, size);
          advanceColumn(cursor, size);
          expect(cursor).toEqual(start);
        }
      });
    }
  });

  describe('axis independence', () => {
    const size = { rows: 3, columns: 3 };

    it('should leave the column alone when moving rows', () => {
      for (const start of everyPosition(size)) {
        const cursor = { ...start };
        advanceRow(cursor, size);
        expect(cursor.column).toBe(start.column);
        retreatRow(cursor, size);
        retreatRow(cursor, size);
        expect(cursor.column).toBe(start.column);
      }
    });

    it('should leave the row alone when moving columns', () => {
      for (const start of everyPosition(size)) {
        const cursor = { ...start };
        advanceColumn(cursor, size);
        expect(cursor.row).toBe(start.row);
        retreatColumn(cursor, size);
        retreatColumn(cursor, size);
        expect(cursor.row).toBe(start.row);
      }
    });
  });

  describe('applyAction', () => {
    let state: AppState;

    beforeEach(() => {
      state = createInitialState();
    });

    it('should dispatch each action to its transition', () => {
      applyAction(state, 'advanceRow');
      expect(state.cursor).toEqual({ row: 1, column: 0 });

      applyAction(state, 'advanceColumn');
      expect(state.cursor).toEqual({ row: 1, column: 1 });

      applyAction(state, 'retreatRow');
      expect(state.cursor).toEqual({ row: 0, column: 1 });

      applyAction(state, 'retreatColumn');
      expect(state.cursor).toEqual({ row: 0, column: 0 });
    });

    it('should report the value under the cursor', () => {
      applyAction(state, 'advanceRow');
      applyAction(state, 'advanceRow');
      applyAction(state, 'advanceColumn');

      expect(state.cursor).toEqual({ row: 2, column: 1 });
      expect(selectedValue(state)).toBe('8');
    });
  });
});
