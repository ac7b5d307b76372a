/**
 * CellBridge - A1 Notation
 *
 * Parsing and formatting of A1-style addresses:
 * - Cells: "A1", "$B$2", "b2"
 * - Blocks: "A1:C3", "$A1:C$3"
 * - Whole columns / rows: "A:C", "2:4"
 * - Optional sheet prefix: "Sheet1!A1", "'My Sheet'!A1:B2"
 */

import { CellCoordinate, MAX_ROWS, MAX_COLS } from '../types/index.js';
import { IndexOutOfRangeError, InvalidArgumentsError } from '../errors/index.js';
import { Region } from './Region.js';

export interface RegionBounds {
  readonly topLeft: Readonly<CellCoordinate>;
  readonly bottomRight: Readonly<CellCoordinate>;
}

export interface ParsedAddress {
  /** Sheet name from a "Sheet!" prefix, unquoted */
  sheetName?: string;
  region: Region;
}

export interface AddressFormat {
  rowAbsolute: boolean;
  columnAbsolute: boolean;
}

const CELL_OR_BLOCK = /^\$?([A-Z]{1,3})\$?(\d+)(?::\$?([A-Z]{1,3})\$?(\d+))?$/i;
const COLUMN_SPAN = /^\$?([A-Z]{1,3}):\$?([A-Z]{1,3})$/i;
const ROW_SPAN = /^\$?(\d+):\$?(\d+)$/;
const PLAIN_SHEET_NAME = /^[A-Za-z_][A-Za-z0-9_.]*$/;

// =============================================================================
// Column Letters
// =============================================================================

/**
 * Convert a 1-based column number to letters (1 → A, 27 → AA).
 */
export function columnLetters(column: number): string {
  if (!Number.isInteger(column) || column < 1) {
    throw new InvalidArgumentsError(`Invalid column number: ${column}`);
  }
  let letters = '';
  let c = column;
  while (c > 0) {
    const remainder = (c - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    c = Math.floor((c - 1) / 26);
  }
  return letters;
}

/**
 * Convert column letters to a 1-based column number (A → 1, AA → 27).
 */
export function columnNumber(letters: string): number {
  if (!/^[A-Z]+$/i.test(letters)) {
    throw new InvalidArgumentsError(`Invalid column letters: '${letters}'`);
  }
  const upper = letters.toUpperCase();
  let column = 0;
  for (let i = 0; i < upper.length; i++) {
    column = column * 26 + (upper.charCodeAt(i) - 64);
  }
  return column;
}

function parseColumn(letters: string): number {
  const column = columnNumber(letters);
  if (column > MAX_COLS) {
    throw new IndexOutOfRangeError(column, MAX_COLS, 'Column');
  }
  return column;
}

function parseRow(digits: string): number {
  // Range checks (including row 0) happen in Region.of
  return parseInt(digits, 10);
}

// =============================================================================
// Sheet Names
// =============================================================================

/**
 * Whether a token is shaped like a single A1 cell reference.
 */
export function looksLikeCellReference(token: string): boolean {
  return /^\$?[A-Z]{1,3}\$?\d+$/i.test(token) || /^R\d*C\d*$/i.test(token);
}

/**
 * Quote a sheet name for use in an address when it is not a plain identifier.
 */
export function quoteSheetName(name: string): string {
  if (PLAIN_SHEET_NAME.test(name) && !looksLikeCellReference(name)) {
    return name;
  }
  return `'${name.replace(/'/g, "''")}'`;
}

/**
 * Split "Sheet!Ref" into its parts. Handles quoted sheet names with
 * doubled quotes inside.
 */
function splitSheetPrefix(token: string): { sheetName?: string; reference: string } {
  if (token.startsWith("'")) {
    let i = 1;
    let name = '';
    while (i < token.length) {
      const ch = token[i];
      if (ch === "'") {
        if (token[i + 1] === "'") {
          name += "'";
          i += 2;
          continue;
        }
        break;
      }
      name += ch;
      i++;
    }
    if (i >= token.length || token[i + 1] !== '!') {
      throw new InvalidArgumentsError(`Malformed sheet-qualified address: ${token}`);
    }
    return { sheetName: name, reference: token.slice(i + 2) };
  }

  const bang = token.lastIndexOf('!');
  if (bang === -1) {
    return { reference: token };
  }
  return { sheetName: token.slice(0, bang), reference: token.slice(bang + 1) };
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse the reference part of an address (no sheet prefix).
 * Returns null when the token is not address-shaped, e.g. a defined name.
 */
export function parseReference(reference: string): Region | null {
  const cell = CELL_OR_BLOCK.exec(reference);
  if (cell) {
    const start = { row: parseRow(cell[2]), column: parseColumn(cell[1]) };
    if (cell[3] === undefined) {
      return Region.of(start);
    }
    return Region.of(start, { row: parseRow(cell[4]), column: parseColumn(cell[3]) });
  }

  const columns = COLUMN_SPAN.exec(reference);
  if (columns) {
    return Region.of(
      { row: 1, column: parseColumn(columns[1]) },
      { row: MAX_ROWS, column: parseColumn(columns[2]) }
    );
  }

  const rows = ROW_SPAN.exec(reference);
  if (rows) {
    return Region.of(
      { row: parseRow(rows[1]), column: 1 },
      { row: parseRow(rows[2]), column: MAX_COLS }
    );
  }

  return null;
}

/**
 * Parse an address token with optional sheet prefix.
 *
 * @returns null when the token is not an address (it may be a defined name)
 * @throws ZeroBasedAccessError for row 0, IndexOutOfRangeError past the sheet edge
 */
export function parseAddress(token: string): ParsedAddress | null {
  const trimmed = token.trim();
  if (trimmed === '') {
    throw new InvalidArgumentsError('Empty address');
  }
  const { sheetName, reference } = splitSheetPrefix(trimmed);
  const region = parseReference(reference);
  if (region === null) {
    return null;
  }
  return sheetName === undefined ? { region } : { sheetName, region };
}

// =============================================================================
// Formatting
// =============================================================================

function formatColumn(column: number, absolute: boolean): string {
  return (absolute ? '$' : '') + columnLetters(column);
}

function formatRow(row: number, absolute: boolean): string {
  return (absolute ? '$' : '') + row;
}

/**
 * Format a region as an A1 address. Whole rows and whole columns use the
 * "$1:$3" / "$A:$C" forms.
 */
export function formatAddress(
  region: RegionBounds,
  { rowAbsolute, columnAbsolute }: AddressFormat
): string {
  const { topLeft, bottomRight } = region;

  if (topLeft.column === 1 && bottomRight.column === MAX_COLS) {
    return `${formatRow(topLeft.row, rowAbsolute)}:${formatRow(bottomRight.row, rowAbsolute)}`;
  }
  if (topLeft.row === 1 && bottomRight.row === MAX_ROWS) {
    return `${formatColumn(topLeft.column, columnAbsolute)}:${formatColumn(bottomRight.column, columnAbsolute)}`;
  }

  const start = formatColumn(topLeft.column, columnAbsolute) + formatRow(topLeft.row, rowAbsolute);
  if (topLeft.row === bottomRight.row && topLeft.column === bottomRight.column) {
    return start;
  }
  const end = formatColumn(bottomRight.column, columnAbsolute) + formatRow(bottomRight.row, rowAbsolute);
  return `${start}:${end}`;
}
