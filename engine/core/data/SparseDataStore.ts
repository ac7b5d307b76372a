/**
 * CellBridge - Sparse Data Store
 *
 * Cell storage for one sheet of the in-process host.
 * Only stores non-empty cells, so a 1M-row sheet costs nothing until written.
 *
 * Key features:
 * - O(1) cell access via Map
 * - Row/column indexes for Ctrl+Arrow style jumps
 * - Tracked used range (last row/column with data)
 *
 * All coordinates are 1-based, matching the host's address space.
 */

import {
  CellCoordinate,
  CellKey,
  CellValue,
  Direction,
  cellKey,
  parseKey,
  MAX_ROWS,
  MAX_COLS,
} from '../types/index.js';

/**
 * A stored cell. `value` is the computed value for formula cells.
 */
export interface StoredCell {
  value: CellValue;
  /** Formula text including the leading '=' */
  formula?: string;
}

export interface UsedRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

const DIRECTION_DELTA: Readonly<Record<Direction, { row: number; col: number }>> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

function inBounds(row: number, col: number): boolean {
  return row >= 1 && row <= MAX_ROWS && col >= 1 && col <= MAX_COLS;
}

export class SparseDataStore {
  /** Main cell storage: Map<"row_col", StoredCell> */
  private cells: Map<CellKey, StoredCell> = new Map();

  /** Row index: Map<row, Set<col>> for quick row iteration */
  private rowIndex: Map<number, Set<number>> = new Map();

  /** Column index: Map<col, Set<row>> for quick column iteration */
  private colIndex: Map<number, Set<number>> = new Map();

  /** Tracked bounds of used area; endRow 0 means no data */
  private _usedRange: UsedRange = { startRow: 1, startCol: 1, endRow: 0, endCol: 0 };

  /** Whether bounds need recalculation */
  private _boundsDirty: boolean = false;

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Get a cell by coordinates
   * @returns StoredCell or null if empty
   */
  getCell(row: number, col: number): StoredCell | null {
    return this.cells.get(cellKey(row, col)) ?? null;
  }

  /**
   * Set a cell
   * @param cell Cell data or null to clear
   */
  setCell(row: number, col: number, cell: StoredCell | null): void {
    if (cell === null || this.isCellEmpty(cell)) {
      this.deleteCell(row, col);
      return;
    }

    this.cells.set(cellKey(row, col), cell);

    let rowCols = this.rowIndex.get(row);
    if (!rowCols) {
      rowCols = new Set();
      this.rowIndex.set(row, rowCols);
    }
    rowCols.add(col);

    let colRows = this.colIndex.get(col);
    if (!colRows) {
      colRows = new Set();
      this.colIndex.set(col, colRows);
    }
    colRows.add(row);

    // Quick update, not full recalc
    const empty = this._usedRange.endRow === 0;
    if (empty || this._usedRange.startRow > row) this._usedRange.startRow = row;
    if (empty || this._usedRange.startCol > col) this._usedRange.startCol = col;
    if (this._usedRange.endRow < row) this._usedRange.endRow = row;
    if (this._usedRange.endCol < col) this._usedRange.endCol = col;
  }

  /**
   * Delete a cell
   */
  deleteCell(row: number, col: number): void {
    const key = cellKey(row, col);

    if (!this.cells.has(key)) return;

    this.cells.delete(key);

    const rowCols = this.rowIndex.get(row);
    if (rowCols) {
      rowCols.delete(col);
      if (rowCols.size === 0) {
        this.rowIndex.delete(row);
      }
    }

    const colRows = this.colIndex.get(col);
    if (colRows) {
      colRows.delete(row);
      if (colRows.size === 0) {
        this.colIndex.delete(col);
      }
    }

    // Mark bounds for recalculation if we deleted at the edge
    if (row === this._usedRange.endRow || col === this._usedRange.endCol ||
        row === this._usedRange.startRow || col === this._usedRange.startCol) {
      this._boundsDirty = true;
    }
  }

  /**
   * A blank value without a formula is not stored at all.
   */
  private isCellEmpty(cell: StoredCell): boolean {
    return cell.value === null && !cell.formula;
  }

  // ===========================================================================
  // Used Range & Bounds
  // ===========================================================================

  /**
   * Get the used range (area containing data)
   */
  getUsedRange(): UsedRange {
    if (this._boundsDirty) {
      this.recalculateBounds();
    }
    return { ...this._usedRange };
  }

  /**
   * Get the last row with data, 0 when the sheet is empty
   */
  getLastRow(): number {
    return this.getUsedRange().endRow;
  }

  /**
   * Get the last column with data, 0 when the sheet is empty
   */
  getLastColumn(): number {
    return this.getUsedRange().endCol;
  }

  private recalculateBounds(): void {
    if (this.cells.size === 0) {
      this._usedRange = { startRow: 1, startCol: 1, endRow: 0, endCol: 0 };
      this._boundsDirty = false;
      return;
    }

    let minRow = MAX_ROWS;
    let maxRow = 0;
    let minCol = MAX_COLS;
    let maxCol = 0;

    for (const key of this.cells.keys()) {
      const { row, column } = parseKey(key);
      if (row < minRow) minRow = row;
      if (row > maxRow) maxRow = row;
      if (column < minCol) minCol = column;
      if (column > maxCol) maxCol = column;
    }

    this._usedRange = { startRow: minRow, startCol: minCol, endRow: maxRow, endCol: maxCol };
    this._boundsDirty = false;
  }

  // ===========================================================================
  // Navigation Helpers
  // ===========================================================================

  /**
   * Ctrl+Arrow jump. Formula cells count as content even when they
   * compute to blank.
   *
   * 1. Current cell empty → first non-empty cell, or the sheet edge
   * 2. Current non-empty, next empty → next non-empty cell, or the edge
   * 3. Current and next non-empty → last non-empty cell before a gap
   */
  findNextNonEmpty(startRow: number, startCol: number, direction: Direction): CellCoordinate {
    const delta = DIRECTION_DELTA[direction];
    const vertical = delta.row !== 0;
    const forward = delta.row + delta.col > 0;

    const line = vertical
      ? [...(this.colIndex.get(startCol) ?? [])]
      : [...(this.rowIndex.get(startRow) ?? [])];
    line.sort((a, b) => a - b);

    const current = vertical ? startRow : startCol;
    const edge = forward ? (vertical ? MAX_ROWS : MAX_COLS) : 1;
    const toCoordinate = (pos: number): CellCoordinate =>
      vertical ? { row: pos, column: startCol } : { row: startRow, column: pos };

    const step = forward ? 1 : -1;
    const next = current + step;
    const nextInBounds = vertical ? inBounds(next, startCol) : inBounds(startRow, next);

    if (!nextInBounds) {
      return toCoordinate(current);
    }

    const occupied = new Set(line);
    if (occupied.has(current) && occupied.has(next)) {
      let pos = next;
      while (occupied.has(pos + step)) {
        pos += step;
      }
      return toCoordinate(pos);
    }

    // Jump over the gap to the next occupied cell
    const candidates = forward ? line.filter(p => p > current) : line.filter(p => p < current);
    if (candidates.length === 0) {
      return toCoordinate(edge);
    }
    return toCoordinate(forward ? candidates[0] : candidates[candidates.length - 1]);
  }
}
