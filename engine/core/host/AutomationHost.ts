/**
 * CellBridge - Automation Host Interface
 *
 * The transport to a running spreadsheet application. The core never talks
 * to the application directly; every read, write and lookup goes through
 * this interface, synchronously, at the moment it is needed.
 *
 * Implement this interface to bind CellBridge to a concrete host. The
 * in-process MemoryHost is the reference implementation.
 */

import {
  CellCoordinate,
  CellValue,
  Direction,
  DocumentHandle,
  HostHandle,
  InstanceHandle,
  SheetHandle,
} from '../types/index.js';

/** Path conventions of the machine the host runs on. */
export type PathStyle = 'win32' | 'posix';

/**
 * A defined name as stored in a document.
 */
export interface HostName {
  name: string;
  sheet: SheetHandle;
  topLeft: CellCoordinate;
  bottomRight: CellCoordinate;
}

/**
 * A hyperlink anchored on a cell.
 */
export interface HostHyperlink {
  address: string;
  /** Shown in the cell */
  textToDisplay: string;
  screenTip?: string;
}

/** Where a new sheet goes; the end of the tab order when omitted. */
export type SheetPlacement = { before: SheetHandle } | { after: SheetHandle };

/** 'shape' is any drawing object that is neither a chart nor a picture. */
export type ShapeKind = 'shape' | 'chart' | 'picture';

/**
 * A drawing object on a sheet. Geometry is in points.
 */
export interface HostShape {
  kind: ShapeKind;
  name: string;
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface AutomationHost {
  readonly pathStyle: PathStyle;

  // ===========================================================================
  // Instances & Documents
  // ===========================================================================

  /** Running instances, in no particular order. Reflects live state. */
  listInstances(): InstanceHandle[];

  listDocuments(instance: InstanceHandle): DocumentHandle[];

  /** Most recently focused instance, or null when none is running. */
  activeInstance(): InstanceHandle | null;

  /** Most recently focused document of an instance. */
  activeDocument(instance: InstanceHandle): DocumentHandle | null;

  activeSheet(document: DocumentHandle): SheetHandle | null;

  /** Launch a new instance. */
  startInstance(): InstanceHandle;

  /** Open a file from disk in the given instance. */
  open(instance: InstanceHandle, path: string): DocumentHandle;

  /** Create a blank document in the given instance. */
  create(instance: InstanceHandle): DocumentHandle;

  documentName(document: DocumentHandle): string;

  /** Full path, or '' for a document that was never saved. */
  documentFullName(document: DocumentHandle): string;

  /** Sheets in tab order. */
  sheets(document: DocumentHandle): SheetHandle[];

  sheetName(sheet: SheetHandle): string;

  /**
   * Insert a sheet. Without a name the host picks the next free
   * "SheetN".
   */
  addSheet(document: DocumentHandle, name?: string, placement?: SheetPlacement): SheetHandle;

  /** Remove a sheet together with the names that point into it. */
  deleteSheet(sheet: SheetHandle): void;

  /** False once the instance quit, the document closed or the sheet was deleted. */
  isAlive(handle: HostHandle): boolean;

  // ===========================================================================
  // Cells
  // ===========================================================================

  /** Computed value of a cell; null when blank. */
  cellValue(sheet: SheetHandle, row: number, column: number): CellValue;

  /** Formula text of a cell, or null when the cell holds no formula. */
  cellFormula(sheet: SheetHandle, row: number, column: number): string | null;

  setCellValue(sheet: SheetHandle, row: number, column: number, value: CellValue): void;

  /** Last used row, counted from row 1; 0 for an empty sheet. */
  rowCount(sheet: SheetHandle): number;

  /** Last used column, counted from column 1; 0 for an empty sheet. */
  columnCount(sheet: SheetHandle): number;

  /**
   * Native Ctrl+Arrow jump. Hosts without one leave it out and the core
   * scans cell by cell instead.
   */
  end?(sheet: SheetHandle, row: number, column: number, direction: Direction): CellCoordinate;

  cellHyperlink(sheet: SheetHandle, row: number, column: number): HostHyperlink | null;

  /** Anchor a hyperlink on a cell and show its text there. */
  addHyperlink(sheet: SheetHandle, row: number, column: number, link: HostHyperlink): void;

  // ===========================================================================
  // Names & Shapes
  // ===========================================================================

  names(document: DocumentHandle): HostName[];

  /** Define or redefine a workbook-level name; names are case-insensitive. */
  defineName(sheet: SheetHandle, name: string, topLeft: CellCoordinate, bottomRight: CellCoordinate): void;

  deleteName(document: DocumentHandle, name: string): void;

  shapes(sheet: SheetHandle): HostShape[];
}
