/**
 * CellBridge - Value Conversion
 *
 * `Range.value` hands the Range itself to a converter on read and on
 * write, so a converter decides which cells it reads and where it writes.
 * Swap the converter through the `convert` range option.
 */

import { CellValue, isCellValue } from '../types/index.js';
import { InvalidArgumentsError } from '../errors/index.js';
import type { Range } from '../range/Range.js';

/** Range options that shape conversion. */
export interface ConversionOptions {
  ndim?: 1 | 2;
  numberType?: (value: number) => unknown;
  dateType?: (value: Date) => unknown;
  emptyValue?: unknown;
  transpose?: boolean;
}

export interface ValueConverter {
  /**
   * @param range - Already expanded when the `expand` option is set
   */
  read(range: Range, options: ConversionOptions): unknown;

  write(value: unknown, range: Range, options: ConversionOptions): void;
}

export function isValueConverter(value: unknown): value is ValueConverter {
  return (
    typeof value === 'object' &&
    value !== null &&
    'read' in value &&
    typeof value.read === 'function' &&
    'write' in value &&
    typeof value.write === 'function'
  );
}

export function transposeMatrix<T>(matrix: readonly (readonly T[])[]): T[][] {
  if (matrix.length === 0) return [];
  return matrix[0].map((_, col) => matrix.map(row => row[col]));
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return typeof value === 'object' ? Object.prototype.toString.call(value).slice(8, -1) : typeof value;
}

// =============================================================================
// BaseConverter
// =============================================================================

/**
 * Default conversion.
 *
 * Reading: a single cell is returned as a scalar, a single row or column
 * as a flat array, anything else as an array of rows. `ndim` forces 1 or
 * 2 dimensions.
 *
 * Writing: a scalar, a flat array (one row) or an array of equal-length
 * rows, written through `Range.rawValue`.
 */
export class BaseConverter implements ValueConverter {
  read(range: Range, options: ConversionOptions): unknown {
    return this.fromBlock(range.rawValue, options);
  }

  write(value: unknown, range: Range, options: ConversionOptions): void {
    range.rawValue = this.toBlock(value, options);
  }

  /** Shape a raw block the way `read` does. */
  fromBlock(raw: CellValue[][], options: ConversionOptions): unknown {
    const block = options.transpose ? transposeMatrix(raw) : raw;
    const values = block.map(row => row.map(cell => this.readCell(cell, options)));

    const rows = values.length;
    const columns = rows > 0 ? values[0].length : 0;

    if (options.ndim === 2) {
      return values;
    }
    if (options.ndim === 1) {
      if (rows === 1) return values[0];
      if (columns === 1) return values.map(row => row[0]);
      throw new InvalidArgumentsError(`Cannot read a ${rows}x${columns} block as one dimension.`);
    }

    if (rows === 1 && columns === 1) return values[0][0];
    if (rows === 1) return values[0];
    if (columns === 1) return values.map(row => row[0]);
    return values;
  }

  /** The block `write` would store for a value. */
  toBlock(value: unknown, options: ConversionOptions): CellValue[][] {
    const block = this.blockOf(value);
    return options.transpose ? transposeMatrix(block) : block;
  }

  protected readCell(value: CellValue, options: ConversionOptions): unknown {
    if (value === null) {
      return options.emptyValue === undefined ? null : options.emptyValue;
    }
    if (typeof value === 'number') {
      return options.numberType ? options.numberType(value) : value;
    }
    if (value instanceof Date) {
      return options.dateType ? options.dateType(value) : value;
    }
    return value;
  }

  protected writeCell(value: unknown): CellValue {
    if (value === undefined) {
      return null;
    }
    if (!isCellValue(value)) {
      throw new InvalidArgumentsError(`Cannot write a value of type ${describeValue(value)} to a cell.`);
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new InvalidArgumentsError(`Cannot write ${value} to a cell.`);
    }
    return value;
  }

  private blockOf(value: unknown): CellValue[][] {
    if (!Array.isArray(value)) {
      return [[this.writeCell(value)]];
    }

    const items: unknown[] = value;
    if (items.length === 0) {
      throw new InvalidArgumentsError('Cannot write an empty array.');
    }

    if (items.every((item): item is unknown[] => Array.isArray(item))) {
      const width = items[0].length;
      if (width === 0) {
        throw new InvalidArgumentsError('Cannot write an empty row.');
      }
      items.forEach((row, i) => {
        if (row.length !== width) {
          throw new InvalidArgumentsError(
            `All rows must have the same length: row ${i} has ${row.length} cells, expected ${width}.`
          );
        }
      });
      return items.map(row => row.map(cell => this.writeCell(cell)));
    }

    if (items.some(item => Array.isArray(item))) {
      throw new InvalidArgumentsError('Cannot mix nested arrays and scalars in one write.');
    }
    return [items.map(cell => this.writeCell(cell))];
  }
}
