/**
 * CellBridge - Range Indexer
 *
 * 0-based element access over a 1-based region, in the style of array
 * indexing: negative indices count from the end, slices are half-open.
 * Every function here is pure Region arithmetic; Range wraps the results.
 */

import { Region } from '../coordinates/index.js';
import {
  IndexOutOfRangeError,
  InvalidArgumentsError,
  UnsupportedSliceStepError,
} from '../errors/index.js';

export interface SliceSpec {
  start?: number;
  stop?: number;
  /** Only 1 is supported */
  step?: number;
}

/** One axis of a 2-D selection: a single index or a slice. */
export type AxisSelector = number | SliceSpec;

/** Half-open [start, stop) span along one axis, already normalized. */
interface AxisSpan {
  start: number;
  stop: number;
}

function assertInteger(value: number, what: string): void {
  if (!Number.isInteger(value)) {
    throw new InvalidArgumentsError(`${what} must be an integer, got ${value}.`);
  }
}

/**
 * Resolve a possibly negative index against a length.
 */
export function normalizeIndex(index: number, length: number, label: string = 'Index'): number {
  assertInteger(index, label);
  const resolved = index < 0 ? index + length : index;
  if (resolved < 0 || resolved >= length) {
    throw new IndexOutOfRangeError(index, length, label);
  }
  return resolved;
}

/**
 * Resolve a slice against a length. `start` must lie in [-n, n) and
 * `stop` in (-n, n]; a stop at or before start gives an empty span.
 */
function normalizeSlice(spec: SliceSpec, length: number, label: string): AxisSpan {
  const step = spec.step ?? 1;
  assertInteger(step, 'Slice step');
  if (step !== 1) {
    throw new UnsupportedSliceStepError(step);
  }

  let start = 0;
  if (spec.start !== undefined) {
    assertInteger(spec.start, `${label} slice start`);
    if (spec.start < -length || spec.start >= length) {
      throw new IndexOutOfRangeError(spec.start, length, label);
    }
    start = spec.start < 0 ? spec.start + length : spec.start;
  }

  let stop = length;
  if (spec.stop !== undefined) {
    assertInteger(spec.stop, `${label} slice stop`);
    if (spec.stop <= -length || spec.stop > length) {
      throw new IndexOutOfRangeError(spec.stop, length, label);
    }
    stop = spec.stop < 0 ? spec.stop + length : spec.stop;
  }

  return { start, stop };
}

function normalizeAxis(selector: AxisSelector, length: number, label: string): AxisSpan {
  if (typeof selector === 'number') {
    const index = normalizeIndex(selector, length, label);
    return { start: index, stop: index + 1 };
  }
  return normalizeSlice(selector, length, label);
}

// =============================================================================
// Element access
// =============================================================================

/**
 * Linear, row-major access. `-1` is the last cell.
 */
export function cellAtIndex(region: Region, index: number): Region {
  const coordinate = region.coordinateAt(normalizeIndex(index, region.size));
  return Region.cell(coordinate.row, coordinate.column);
}

/**
 * 2-D access, 0-based on each axis, negatives wrap per axis.
 */
export function cellAtPosition(region: Region, row: number, column: number): Region {
  const r = normalizeIndex(row, region.rowCount, 'Row index');
  const c = normalizeIndex(column, region.columnCount, 'Column index');
  return Region.cell(region.topLeft.row + r, region.topLeft.column + c);
}

// =============================================================================
// Slicing
// =============================================================================

/**
 * Linear slice. On a region with several rows and columns the result is
 * the rectangle whose opposite corners are the first and last selected
 * cells. Returns null for an empty selection.
 */
export function sliceLinear(region: Region, spec: SliceSpec): Region | null {
  const { start, stop } = normalizeSlice(spec, region.size, 'Index');
  if (stop <= start) {
    return null;
  }
  return Region.of(region.coordinateAt(start), region.coordinateAt(stop - 1));
}

/**
 * 2-D slice; each axis takes an index or a slice. Returns null when
 * either axis selects nothing.
 */
export function sliceGrid(region: Region, rows: AxisSelector, columns: AxisSelector): Region | null {
  const r = normalizeAxis(rows, region.rowCount, 'Row index');
  const c = normalizeAxis(columns, region.columnCount, 'Column index');
  if (r.stop <= r.start || c.stop <= c.start) {
    return null;
  }
  return Region.of(
    { row: region.topLeft.row + r.start, column: region.topLeft.column + c.start },
    { row: region.topLeft.row + r.stop - 1, column: region.topLeft.column + c.stop - 1 }
  );
}
