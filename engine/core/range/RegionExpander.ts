/**
 * CellBridge - Region Expander
 *
 * Grows an anchor cell into the contiguous non-empty block around it,
 * the way a user extends a selection with Ctrl+Shift+Arrow.
 *
 * Per axis, from the anchor:
 * 1. anchor+1 empty → the anchor alone
 * 2. anchor+2 empty → two cells
 * 3. otherwise → run from anchor+1 to the last non-empty cell before a gap,
 *    using the host's native jump when it has one
 *
 * Cells past the sheet edge count as empty, so an all-empty sheet gives
 * back the anchor.
 */

import { Region } from '../coordinates/index.js';
import {
  CellCoordinate,
  ExpandMode,
  SheetHandle,
  isBlankValue,
  MAX_ROWS,
  MAX_COLS,
} from '../types/index.js';
import type { AutomationHost } from '../host/index.js';

export interface ExpandOptions {
  /**
   * Treat a formula cell that computes to blank as empty, and scan cell by
   * cell instead of using the host's native jump.
   */
  strict?: boolean;
}

/**
 * Emptiness of one cell as expansion sees it.
 */
export function isEmptyCell(
  host: AutomationHost,
  sheet: SheetHandle,
  row: number,
  column: number,
  strict: boolean
): boolean {
  if (row > MAX_ROWS || column > MAX_COLS) {
    return true;
  }
  if (!isBlankValue(host.cellValue(sheet, row, column))) {
    return false;
  }
  return strict || host.cellFormula(sheet, row, column) === null;
}

/**
 * Last position of the contiguous run that starts at anchor+1 along one
 * axis, given anchor+1 and anchor+2 are both non-empty.
 */
function runEnd(
  host: AutomationHost,
  sheet: SheetHandle,
  anchor: CellCoordinate,
  vertical: boolean,
  strict: boolean
): number {
  if (host.end && !strict) {
    const hit = vertical
      ? host.end(sheet, anchor.row + 1, anchor.column, 'down')
      : host.end(sheet, anchor.row, anchor.column + 1, 'right');
    return vertical ? hit.row : hit.column;
  }

  // Scan, bounded by the used extent
  const limit = vertical ? host.rowCount(sheet) : host.columnCount(sheet);
  let position = (vertical ? anchor.row : anchor.column) + 2;
  while (position + 1 <= limit) {
    const empty = vertical
      ? isEmptyCell(host, sheet, position + 1, anchor.column, strict)
      : isEmptyCell(host, sheet, anchor.row, position + 1, strict);
    if (empty) break;
    position++;
  }
  return position;
}

function axisEnd(
  host: AutomationHost,
  sheet: SheetHandle,
  anchor: CellCoordinate,
  vertical: boolean,
  strict: boolean
): number {
  const start = vertical ? anchor.row : anchor.column;
  const emptyAt = (delta: number): boolean =>
    vertical
      ? isEmptyCell(host, sheet, anchor.row + delta, anchor.column, strict)
      : isEmptyCell(host, sheet, anchor.row, anchor.column + delta, strict);

  if (emptyAt(1)) return start;
  if (emptyAt(2)) return start + 1;
  return runEnd(host, sheet, anchor, vertical, strict);
}

/**
 * Expand from the region's top-left cell.
 *
 * - vertical: grows down, keeps the column count
 * - horizontal: grows right, keeps the row count
 * - table: both edges from the anchor, no diagonal scan
 */
export function expandRegion(
  host: AutomationHost,
  sheet: SheetHandle,
  region: Region,
  mode: ExpandMode,
  strict: boolean
): Region {
  const anchor = region.topLeft;

  switch (mode) {
    case 'vertical':
      return Region.of(anchor, {
        row: axisEnd(host, sheet, anchor, true, strict),
        column: region.bottomRight.column,
      });
    case 'horizontal':
      return Region.of(anchor, {
        row: region.bottomRight.row,
        column: axisEnd(host, sheet, anchor, false, strict),
      });
    case 'table':
      return Region.of(anchor, {
        row: axisEnd(host, sheet, anchor, true, strict),
        column: axisEnd(host, sheet, anchor, false, strict),
      });
  }
}
