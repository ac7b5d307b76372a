/**
 * CellBridge - Region
 *
 * Immutable, normalized rectangle of 1-based cell coordinates.
 * A Region owns no host resources; it is pure arithmetic.
 */

import { CellCoordinate, MAX_ROWS, MAX_COLS } from '../types/index.js';
import {
  IndexOutOfRangeError,
  InvalidArgumentsError,
  ZeroBasedAccessError,
} from '../errors/index.js';
import { formatAddress, parseAddress } from './notation.js';

/**
 * Validate a single 1-based coordinate.
 * 0 gets its own error since callers coming from 0-based indexing hit it first.
 */
export function assertCoordinate(row: number, column: number): void {
  if (!Number.isInteger(row) || !Number.isInteger(column)) {
    throw new InvalidArgumentsError(
      `Cell coordinates must be integers, got (${row}, ${column}).`
    );
  }
  if (row === 0 || column === 0) {
    throw new ZeroBasedAccessError();
  }
  if (row < 0 || row > MAX_ROWS) {
    throw new IndexOutOfRangeError(row, MAX_ROWS, 'Row');
  }
  if (column < 0 || column > MAX_COLS) {
    throw new IndexOutOfRangeError(column, MAX_COLS, 'Column');
  }
}

export class Region {
  readonly topLeft: Readonly<CellCoordinate>;
  readonly bottomRight: Readonly<CellCoordinate>;

  private constructor(topLeft: CellCoordinate, bottomRight: CellCoordinate) {
    this.topLeft = Object.freeze({ ...topLeft });
    this.bottomRight = Object.freeze({ ...bottomRight });
  }

  /**
   * Build a region from two opposite corners given in any order.
   */
  static of(a: CellCoordinate, b: CellCoordinate = a): Region {
    assertCoordinate(a.row, a.column);
    assertCoordinate(b.row, b.column);
    return new Region(
      { row: Math.min(a.row, b.row), column: Math.min(a.column, b.column) },
      { row: Math.max(a.row, b.row), column: Math.max(a.column, b.column) }
    );
  }

  /**
   * Parse an A1 address; a sheet prefix is accepted and dropped.
   */
  static parse(address: string): Region {
    const parsed = parseAddress(address);
    if (!parsed) {
      throw new InvalidArgumentsError(`'${address}' is not a cell address.`);
    }
    return parsed.region;
  }

  static cell(row: number, column: number): Region {
    return Region.of({ row, column });
  }

  /**
   * Rectangle anchored at (row, column) spanning rowCount x columnCount cells.
   */
  static fromSize(row: number, column: number, rowCount: number, columnCount: number): Region {
    if (!Number.isInteger(rowCount) || !Number.isInteger(columnCount) || rowCount < 1 || columnCount < 1) {
      throw new InvalidArgumentsError(
        `Region size must be positive, got ${rowCount} x ${columnCount}.`
      );
    }
    return Region.of(
      { row, column },
      { row: row + rowCount - 1, column: column + columnCount - 1 }
    );
  }

  // ===========================================================================
  // Accessors
  // ===========================================================================

  get rowCount(): number {
    return this.bottomRight.row - this.topLeft.row + 1;
  }

  get columnCount(): number {
    return this.bottomRight.column - this.topLeft.column + 1;
  }

  get size(): number {
    return this.rowCount * this.columnCount;
  }

  get isSingleCell(): boolean {
    return this.size === 1;
  }

  // ===========================================================================
  // Arithmetic
  // ===========================================================================

  contains(row: number, column: number): boolean {
    return (
      row >= this.topLeft.row &&
      row <= this.bottomRight.row &&
      column >= this.topLeft.column &&
      column <= this.bottomRight.column
    );
  }

  /** Smallest region covering both. */
  union(other: Region): Region {
    return Region.of(
      {
        row: Math.min(this.topLeft.row, other.topLeft.row),
        column: Math.min(this.topLeft.column, other.topLeft.column),
      },
      {
        row: Math.max(this.bottomRight.row, other.bottomRight.row),
        column: Math.max(this.bottomRight.column, other.bottomRight.column),
      }
    );
  }

  /**
   * Shift by whole rows and columns. Landing outside the sheet is an
   * IndexOutOfRangeError, including row or column 0.
   */
  offset(rowDelta: number, columnDelta: number): Region {
    if (!Number.isInteger(rowDelta) || !Number.isInteger(columnDelta)) {
      throw new InvalidArgumentsError(`Offsets must be integers, got (${rowDelta}, ${columnDelta}).`);
    }
    const top = this.topLeft.row + rowDelta;
    const bottom = this.bottomRight.row + rowDelta;
    const left = this.topLeft.column + columnDelta;
    const right = this.bottomRight.column + columnDelta;
    if (top < 1 || bottom > MAX_ROWS) {
      throw new IndexOutOfRangeError(top < 1 ? top : bottom, MAX_ROWS, 'Row');
    }
    if (left < 1 || right > MAX_COLS) {
      throw new IndexOutOfRangeError(left < 1 ? left : right, MAX_COLS, 'Column');
    }
    return Region.of(
      { row: this.topLeft.row + rowDelta, column: this.topLeft.column + columnDelta },
      { row: this.bottomRight.row + rowDelta, column: this.bottomRight.column + columnDelta }
    );
  }

  resize(rowCount: number = this.rowCount, columnCount: number = this.columnCount): Region {
    return Region.fromSize(this.topLeft.row, this.topLeft.column, rowCount, columnCount);
  }

  /**
   * Coordinate of the i-th cell in row-major order (0-based, no wraparound).
   */
  coordinateAt(index: number): CellCoordinate {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new IndexOutOfRangeError(index, this.size);
    }
    const columns = this.columnCount;
    return {
      row: this.topLeft.row + Math.floor(index / columns),
      column: this.topLeft.column + (index % columns),
    };
  }

  equals(other: Region): boolean {
    return (
      this.topLeft.row === other.topLeft.row &&
      this.topLeft.column === other.topLeft.column &&
      this.bottomRight.row === other.bottomRight.row &&
      this.bottomRight.column === other.bottomRight.column
    );
  }

  toA1(rowAbsolute: boolean = false, columnAbsolute: boolean = false): string {
    return formatAddress(this, { rowAbsolute, columnAbsolute });
  }

  toString(): string {
    return this.toA1();
  }
}
