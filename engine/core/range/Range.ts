/**
 * CellBridge - Range
 *
 * A rectangular block of cells on one sheet. A Range is a view: it holds
 * no cell data, and every read or write goes to the host at call time, so
 * two Ranges over the same cells see each other's writes immediately.
 *
 * Ranges are immutable. Navigation (offset, resize, indexing, expansion)
 * returns new Ranges that carry the same options.
 */

import {
  CellValue,
  DocumentHandle,
  ExpandMode,
  SheetHandle,
  sameSheet,
} from '../types/index.js';
import {
  InvalidArgumentsError,
  NotFoundError,
  StaleHandleError,
  ZeroBasedAccessError,
} from '../errors/index.js';
import { Region, quoteSheetName } from '../coordinates/index.js';
import type { AutomationHost, HostHyperlink } from '../host/index.js';
import { RangeOptions, converterOf, validateRangeOptions } from './RangeOptions.js';
import {
  AxisSelector,
  SliceSpec,
  cellAtIndex,
  cellAtPosition,
  sliceGrid,
  sliceLinear,
} from './RangeIndexer.js';
import { ExpandOptions, expandRegion } from './RegionExpander.js';

/**
 * What every Range needs from the bridge that created it.
 */
export interface RangeContext {
  readonly host: AutomationHost;
  /** Default for `strict` when expanding */
  readonly strictExpansion: boolean;
}

/**
 * Result of a slice that selects no cells.
 */
export class EmptySelection implements Iterable<Range> {
  readonly kind = 'empty';
  readonly count = 0;
  readonly sheet: SheetHandle;

  constructor(sheet: SheetHandle) {
    this.sheet = sheet;
  }

  [Symbol.iterator](): Iterator<Range> {
    const none: Range[] = [];
    return none.values();
  }

  toString(): string {
    return '<EmptySelection>';
  }
}

const PLAIN_DOCUMENT_NAME = /^[A-Za-z0-9_.]+$/;

/** First argument of a HYPERLINK formula, with doubled quotes inside */
const HYPERLINK_FORMULA = /^=\s*HYPERLINK\(\s*"((?:[^"]|"")*)"/i;

export class Range implements Iterable<Range> {
  readonly kind = 'range';
  readonly sheet: SheetHandle;
  readonly region: Region;

  private readonly context: RangeContext;
  private readonly rangeOptions: Readonly<RangeOptions>;

  constructor(context: RangeContext, sheet: SheetHandle, region: Region, options: RangeOptions = {}) {
    this.context = context;
    this.sheet = sheet;
    this.region = region;
    this.rangeOptions = validateRangeOptions(options);
  }

  private get host(): AutomationHost {
    return this.context.host;
  }

  private derive(region: Region): Range {
    return new Range(this.context, this.sheet, region, this.rangeOptions);
  }

  private assertAlive(): void {
    if (this.host.isAlive(this.sheet)) {
      return;
    }
    if (!this.host.isAlive(this.sheet.document)) {
      throw new StaleHandleError(this.sheet.document.key, 'document');
    }
    throw new StaleHandleError(this.sheet.key, 'sheet');
  }

  // ===========================================================================
  // Identity
  // ===========================================================================

  get document(): DocumentHandle {
    return this.sheet.document;
  }

  get sheetName(): string {
    this.assertAlive();
    return this.host.sheetName(this.sheet);
  }

  get documentName(): string {
    this.assertAlive();
    return this.host.documentName(this.sheet.document);
  }

  // ===========================================================================
  // Geometry
  // ===========================================================================

  /** 1-based row of the top-left cell */
  get row(): number {
    return this.region.topLeft.row;
  }

  /** 1-based column of the top-left cell */
  get column(): number {
    return this.region.topLeft.column;
  }

  get rowCount(): number {
    return this.region.rowCount;
  }

  get columnCount(): number {
    return this.region.columnCount;
  }

  get count(): number {
    return this.region.size;
  }

  get shape(): [number, number] {
    return [this.region.rowCount, this.region.columnCount];
  }

  get lastCell(): Range {
    const { row, column } = this.region.bottomRight;
    return this.derive(Region.cell(row, column));
  }

  /**
   * Cell at a 1-based position relative to the top-left cell. May reach
   * past the bottom-right corner.
   */
  cell(row: number, column: number): Range {
    for (const [value, axis] of [[row, 'row'], [column, 'column']] as const) {
      if (!Number.isInteger(value)) {
        throw new InvalidArgumentsError(`Cell ${axis} must be an integer, got ${value}.`);
      }
      if (value === 0) {
        throw new ZeroBasedAccessError('Range cell');
      }
      if (value < 0) {
        throw new InvalidArgumentsError(`Cell ${axis} must be positive, got ${value}.`);
      }
    }
    return this.derive(Region.cell(this.row + row - 1, this.column + column - 1));
  }

  offset(rowDelta: number = 0, columnDelta: number = 0): Range {
    return this.derive(this.region.offset(rowDelta, columnDelta));
  }

  resize(rowCount?: number, columnCount?: number): Range {
    return this.derive(this.region.resize(rowCount, columnCount));
  }

  // ===========================================================================
  // Indexing
  // ===========================================================================

  /**
   * 0-based access. One argument indexes row-major; two index row and
   * column. Negative indices count from the end.
   */
  at(index: number): Range;
  at(row: number, column: number): Range;
  at(first: number, second?: number): Range {
    return this.derive(
      second === undefined
        ? cellAtIndex(this.region, first)
        : cellAtPosition(this.region, first, second)
    );
  }

  /**
   * Half-open slice. One argument slices row-major; two select rows and
   * columns, each by index or slice.
   */
  slice(spec: SliceSpec): Range | EmptySelection;
  slice(rows: AxisSelector, columns: AxisSelector): Range | EmptySelection;
  slice(first: AxisSelector, second?: AxisSelector): Range | EmptySelection {
    let region: Region | null;
    if (second === undefined) {
      if (typeof first === 'number') {
        throw new InvalidArgumentsError('A linear slice takes { start, stop, step }; use at() for a single index.');
      }
      region = sliceLinear(this.region, first);
    } else {
      region = sliceGrid(this.region, first, second);
    }
    return region ? this.derive(region) : new EmptySelection(this.sheet);
  }

  *[Symbol.iterator](): Iterator<Range> {
    for (let i = 0; i < this.count; i++) {
      yield this.derive(cellAtIndex(this.region, i));
    }
  }

  // ===========================================================================
  // Expansion
  // ===========================================================================

  get table(): Range {
    return this.expand('table');
  }

  get vertical(): Range {
    return this.expand('vertical');
  }

  get horizontal(): Range {
    return this.expand('horizontal');
  }

  /**
   * Grow from the top-left cell into the surrounding non-empty block.
   */
  expand(mode: ExpandMode = 'table', options: ExpandOptions = {}): Range {
    this.assertAlive();
    const strict = options.strict ?? this.context.strictExpansion;
    return this.derive(expandRegion(this.host, this.sheet, this.region, mode, strict));
  }

  // ===========================================================================
  // Values
  // ===========================================================================

  get appliedOptions(): Readonly<RangeOptions> {
    return this.rangeOptions;
  }

  /**
   * Same cells, new options. The options replace the current ones.
   */
  options(options: RangeOptions): Range {
    return new Range(this.context, this.sheet, this.region, options);
  }

  /** Cell values as stored by the host, one array per row. */
  get rawValue(): CellValue[][] {
    this.assertAlive();
    return this.readBlock(this.region);
  }

  /**
   * Store a rectangular block as-is. A 1x1 block fills the whole Range;
   * a larger block is written from the top-left cell and may extend past
   * the Range.
   */
  set rawValue(block: CellValue[][]) {
    this.assertAlive();
    if (block.length === 0 || block[0].length === 0) {
      throw new InvalidArgumentsError('Cannot write an empty block.');
    }
    const width = block[0].length;
    block.forEach((cells, r) => {
      if (cells.length !== width) {
        throw new InvalidArgumentsError(
          `All rows must have the same length: row ${r} has ${cells.length} cells, expected ${width}.`
        );
      }
    });

    if (block.length === 1 && width === 1) {
      this.fill(this.region, block[0][0]);
      return;
    }

    const target = Region.fromSize(this.row, this.column, block.length, width);
    block.forEach((cells, r) => {
      cells.forEach((cell, c) => {
        this.host.setCellValue(this.sheet, target.topLeft.row + r, target.topLeft.column + c, cell);
      });
    });
  }

  /**
   * Converted value. With the `expand` option the converter reads the
   * expanded Range.
   */
  get value(): unknown {
    this.assertAlive();
    const { expand } = this.rangeOptions;
    const source = expand ? this.expand(expand) : this;
    return converterOf(this.rangeOptions).read(source, this.rangeOptions);
  }

  set value(value: unknown) {
    this.assertAlive();
    converterOf(this.rangeOptions).write(value, this, this.rangeOptions);
  }

  /**
   * Blank every cell. Only the part inside the sheet's used extent is
   * touched; the rest is blank already.
   */
  clearContents(): void {
    this.assertAlive();
    const lastRow = Math.min(this.region.bottomRight.row, this.host.rowCount(this.sheet));
    const lastColumn = Math.min(this.region.bottomRight.column, this.host.columnCount(this.sheet));
    if (lastRow < this.row || lastColumn < this.column) {
      return;
    }
    this.fill(Region.of(this.region.topLeft, { row: lastRow, column: lastColumn }), null);
  }

  // ===========================================================================
  // Hyperlinks
  // ===========================================================================

  /**
   * Target of the top-left cell's hyperlink. A `=HYPERLINK("...")`
   * formula counts too.
   */
  get hyperlink(): string {
    this.assertAlive();
    const link = this.host.cellHyperlink(this.sheet, this.row, this.column);
    if (link) {
      return link.address;
    }
    const formula = this.host.cellFormula(this.sheet, this.row, this.column);
    const match = formula === null ? null : HYPERLINK_FORMULA.exec(formula);
    if (match) {
      return match[1].replace(/""/g, '"');
    }
    throw new NotFoundError(
      `${this.getAddress(true, true, true)} does not contain a hyperlink.`,
      this.address
    );
  }

  /**
   * Anchor a hyperlink on every cell of the Range.
   *
   * @param textToDisplay - Shown in the cells; defaults to the address
   */
  addHyperlink(address: string, textToDisplay?: string, screenTip?: string): void {
    this.assertAlive();
    if (address === '') {
      throw new InvalidArgumentsError('Hyperlink address must not be empty.');
    }
    const link: HostHyperlink = { address, textToDisplay: textToDisplay ?? address };
    if (screenTip !== undefined) {
      link.screenTip = screenTip;
    }
    for (let r = this.region.topLeft.row; r <= this.region.bottomRight.row; r++) {
      for (let c = this.region.topLeft.column; c <= this.region.bottomRight.column; c++) {
        this.host.addHyperlink(this.sheet, r, c, link);
      }
    }
  }

  private readBlock(region: Region): CellValue[][] {
    const rows: CellValue[][] = [];
    for (let r = region.topLeft.row; r <= region.bottomRight.row; r++) {
      const row: CellValue[] = [];
      for (let c = region.topLeft.column; c <= region.bottomRight.column; c++) {
        row.push(this.host.cellValue(this.sheet, r, c));
      }
      rows.push(row);
    }
    return rows;
  }

  private fill(region: Region, value: CellValue): void {
    for (let r = region.topLeft.row; r <= region.bottomRight.row; r++) {
      for (let c = region.topLeft.column; c <= region.bottomRight.column; c++) {
        this.host.setCellValue(this.sheet, r, c, value);
      }
    }
  }

  // ===========================================================================
  // Addressing
  // ===========================================================================

  /**
   * A1 address of the Range.
   *
   * @example
   * range.getAddress()                         // '$A$1:$C$3'
   * range.getAddress(true, false, true)        // 'Sheet1!A$1:C$3'
   * range.getAddress(true, false, false, true) // '[Book1]Sheet1!A$1:C$3'
   */
  getAddress(
    rowAbsolute: boolean = true,
    columnAbsolute: boolean = true,
    includeSheetName: boolean = false,
    external: boolean = false
  ): string {
    const local = this.region.toA1(rowAbsolute, columnAbsolute);
    if (external) {
      const book = this.documentName;
      const sheet = this.sheetName;
      const prefix = `[${book}]${sheet}`;
      const quoted = quoteSheetName(sheet) !== sheet || !PLAIN_DOCUMENT_NAME.test(book);
      return quoted ? `'${prefix.replace(/'/g, "''")}'!${local}` : `${prefix}!${local}`;
    }
    if (includeSheetName) {
      return `${quoteSheetName(this.sheetName)}!${local}`;
    }
    return local;
  }

  get address(): string {
    return this.getAddress();
  }

  equals(other: Range): boolean {
    return sameSheet(this.sheet, other.sheet) && this.region.equals(other.region);
  }

  toString(): string {
    if (!this.host.isAlive(this.sheet)) {
      return `<Range (closed) ${this.region.toA1(true, true)}>`;
    }
    return `<Range ${this.getAddress(true, true, false, true)}>`;
  }
}
