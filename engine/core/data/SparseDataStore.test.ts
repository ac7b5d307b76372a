/**
 * CellBridge - SparseDataStore Unit Tests
 *
 * Covers:
 * - Cell CRUD operations
 * - Used range tracking
 * - Ctrl+Arrow jumps
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SparseDataStore } from './SparseDataStore.js';
import { MAX_COLS, MAX_ROWS } from '../types/index.js';

describe('SparseDataStore', () => {
  let store: SparseDataStore;

  beforeEach(() => {
    store = new SparseDataStore();
  });

  describe('Cell Operations', () => {
    it('should store and retrieve values', () => {
      store.setCell(1, 1, { value: 42 });
      store.setCell(2, 1, { value: 'text' });

      expect(store.getCell(1, 1)?.value).toBe(42);
      expect(store.getCell(2, 1)?.value).toBe('text');
      expect(store.getCell(3, 1)).toBeNull();
    });

    it('should drop blank cells without a formula', () => {
      store.setCell(1, 1, { value: 1 });
      store.setCell(1, 1, { value: null });

      expect(store.getCell(1, 1)).toBeNull();
      expect(store.getLastRow()).toBe(0);
    });

    it('should keep formula cells that compute to blank', () => {
      store.setCell(1, 1, { value: null, formula: '=""' });

      expect(store.getCell(1, 1)?.formula).toBe('=""');
      expect(store.getLastRow()).toBe(1);
    });
  });

  describe('Used Range', () => {
    it('should report an empty sheet as 0 x 0', () => {
      expect(store.getLastRow()).toBe(0);
      expect(store.getLastColumn()).toBe(0);
    });

    it('should grow and shrink with the data', () => {
      store.setCell(3, 2, { value: 1 });
      store.setCell(5, 6, { value: 2 });
      expect(store.getUsedRange()).toEqual({ startRow: 3, startCol: 2, endRow: 5, endCol: 6 });

      store.deleteCell(5, 6);
      expect(store.getUsedRange()).toEqual({ startRow: 3, startCol: 2, endRow: 3, endCol: 2 });

      store.deleteCell(3, 2);
      expect(store.getLastRow()).toBe(0);
      expect(store.getLastColumn()).toBe(0);
    });
  });

  describe('findNextNonEmpty()', () => {
    beforeEach(() => {
      // Column A: rows 1-4 filled, gap, rows 8-9 filled
      for (const row of [1, 2, 3, 4, 8, 9]) {
        store.setCell(row, 1, { value: row });
      }
    });

    it('should run to the end of a block', () => {
      expect(store.findNextNonEmpty(1, 1, 'down')).toEqual({ row: 4, column: 1 });
      expect(store.findNextNonEmpty(2, 1, 'down')).toEqual({ row: 4, column: 1 });
    });

    it('should jump over a gap to the next block', () => {
      expect(store.findNextNonEmpty(4, 1, 'down')).toEqual({ row: 8, column: 1 });
      expect(store.findNextNonEmpty(6, 1, 'down')).toEqual({ row: 8, column: 1 });
      expect(store.findNextNonEmpty(8, 1, 'up')).toEqual({ row: 4, column: 1 });
    });

    it('should stop at the sheet edge when nothing follows', () => {
      expect(store.findNextNonEmpty(9, 1, 'down')).toEqual({ row: MAX_ROWS, column: 1 });
      expect(store.findNextNonEmpty(1, 2, 'right')).toEqual({ row: 1, column: MAX_COLS });
      expect(store.findNextNonEmpty(1, 1, 'up')).toEqual({ row: 1, column: 1 });
    });

    it('should treat formula cells as content', () => {
      store.setCell(1, 2, { value: 'x' });
      store.setCell(1, 3, { value: null, formula: '=""' });
      store.setCell(1, 4, { value: 'y' });

      expect(store.findNextNonEmpty(1, 2, 'right')).toEqual({ row: 1, column: 4 });
    });
  });
});
