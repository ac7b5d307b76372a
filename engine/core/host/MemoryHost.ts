/**
 * CellBridge - In-Process Host
 *
 * An AutomationHost that keeps every instance, document and sheet in memory.
 * Used by the test suites and for headless scripting against workbook files.
 *
 * Features:
 * - Multiple instances with focus order (last focused = active)
 * - Untitled documents numbered per instance (Book1, Book2, ...)
 * - Sheets backed by SparseDataStore, formulas stored with their computed value
 * - Defined names, hyperlinks and drawing objects
 * - open() reads SpreadsheetML 2003 (.xml) workbooks from disk
 *
 * Handles are created once per object and never reused, so a handle to a
 * closed document or deleted sheet stays stale.
 */

import { posix, win32 } from 'node:path';
import { readWorkbookFile } from '../../../importer/src/main.js';
import {
  CellCoordinate,
  CellKey,
  CellValue,
  Direction,
  DocumentHandle,
  HostHandle,
  InstanceHandle,
  SheetHandle,
  cellKey,
} from '../types/index.js';
import { InvalidArgumentsError, NotFoundError, StaleHandleError } from '../errors/index.js';
import { Region } from '../coordinates/index.js';
import { SparseDataStore } from '../data/index.js';
import type {
  AutomationHost,
  HostHyperlink,
  HostName,
  HostShape,
  PathStyle,
  SheetPlacement,
} from './AutomationHost.js';

// =============================================================================
// Types
// =============================================================================

export interface MemoryHostConfig {
  /** Path conventions reported to the resolver */
  pathStyle: PathStyle;
  /** pid of the first instance; later instances count up */
  firstPid: number;
  /** Sheets in a newly created document */
  sheetsPerDocument: number;
  /** Offer the native Ctrl+Arrow jump; without it callers scan cell by cell */
  nativeEnd: boolean;
}

interface InstanceState {
  handle: InstanceHandle;
  documents: DocumentState[];
  focus: number;
  /** Counter for untitled document names */
  untitled: number;
}

interface DocumentState {
  handle: DocumentHandle;
  name: string;
  fullName: string;
  sheets: SheetState[];
  activeSheet: SheetState | null;
  names: NameState[];
  focus: number;
  /** Counter for default sheet names */
  sheetCounter: number;
}

interface SheetState {
  handle: SheetHandle;
  name: string;
  store: SparseDataStore;
  shapes: HostShape[];
  links: Map<CellKey, HostHyperlink>;
}

interface NameState {
  name: string;
  sheet: SheetState;
  region: Region;
}

// =============================================================================
// Default Configuration
// =============================================================================

const DEFAULT_CONFIG: MemoryHostConfig = {
  pathStyle: 'posix',
  firstPid: 1000,
  sheetsPerDocument: 1,
  nativeEnd: true,
};

// =============================================================================
// MemoryHost
// =============================================================================

export class MemoryHost implements AutomationHost {
  readonly pathStyle: PathStyle;
  readonly end?: (sheet: SheetHandle, row: number, column: number, direction: Direction) => CellCoordinate;

  private readonly config: Readonly<MemoryHostConfig>;
  private instances: InstanceState[] = [];
  private nextPid: number;
  private nextDocumentKey: number = 1;
  private nextSheetKey: number = 1;
  private focusClock: number = 0;

  constructor(config: Partial<MemoryHostConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_CONFIG, ...config });
    if (!Number.isInteger(this.config.sheetsPerDocument) || this.config.sheetsPerDocument < 1) {
      throw new InvalidArgumentsError(
        `sheetsPerDocument must be a positive integer, got ${this.config.sheetsPerDocument}`
      );
    }
    this.pathStyle = this.config.pathStyle;
    this.nextPid = this.config.firstPid;
    if (this.config.nativeEnd) {
      this.end = (sheet, row, column, direction) =>
        this.sheetState(sheet).store.findNextNonEmpty(row, column, direction);
    }
  }

  // ===========================================================================
  // Instances & Documents
  // ===========================================================================

  listInstances(): InstanceHandle[] {
    return this.instances.map(i => i.handle);
  }

  listDocuments(instance: InstanceHandle): DocumentHandle[] {
    return this.instanceState(instance).documents.map(d => d.handle);
  }

  activeInstance(): InstanceHandle | null {
    return mostRecent(this.instances)?.handle ?? null;
  }

  activeDocument(instance: InstanceHandle): DocumentHandle | null {
    return mostRecent(this.instanceState(instance).documents)?.handle ?? null;
  }

  activeSheet(document: DocumentHandle): SheetHandle | null {
    return this.documentState(document).activeSheet?.handle ?? null;
  }

  startInstance(): InstanceHandle {
    const handle: InstanceHandle = Object.freeze({ kind: 'instance', pid: this.nextPid++ });
    this.instances.push({ handle, documents: [], focus: this.tick(), untitled: 0 });
    return handle;
  }

  open(instance: InstanceHandle, path: string): DocumentHandle {
    const paths = this.pathStyle === 'win32' ? win32 : posix;
    const fullName = paths.resolve(path);
    const workbook = readWorkbookFile(fullName);
    const name = paths.basename(fullName);

    for (const defined of workbook.names) {
      if (!findByName(workbook.sheets, defined.sheetName)) {
        throw new NotFoundError(
          `Name '${defined.name}' refers to sheet '${defined.sheetName}', which is not in ${name}.`,
          defined.sheetName
        );
      }
    }

    const state = this.addDocument(instance, name, fullName, 0);
    for (const imported of workbook.sheets) {
      const sheet = this.addSheetState(state, imported.name);
      for (const cell of imported.cells) {
        if (cell.formula) {
          sheet.store.setCell(cell.row, cell.column, { value: cell.value, formula: cell.formula });
        } else if (cell.value !== '') {
          sheet.store.setCell(cell.row, cell.column, { value: cell.value });
        }
      }
    }
    for (const defined of workbook.names) {
      const sheet = findByName(state.sheets, defined.sheetName);
      if (sheet) {
        state.names.push({
          name: defined.name,
          sheet,
          region: Region.of(defined.topLeft, defined.bottomRight),
        });
      }
    }
    state.activeSheet = state.sheets[0] ?? null;
    return state.handle;
  }

  create(instance: InstanceHandle): DocumentHandle {
    const owner = this.instanceState(instance);
    owner.untitled++;
    const state = this.addDocument(instance, `Book${owner.untitled}`, '', this.config.sheetsPerDocument);
    return state.handle;
  }

  documentName(document: DocumentHandle): string {
    return this.documentState(document).name;
  }

  documentFullName(document: DocumentHandle): string {
    return this.documentState(document).fullName;
  }

  sheets(document: DocumentHandle): SheetHandle[] {
    return this.documentState(document).sheets.map(s => s.handle);
  }

  sheetName(sheet: SheetHandle): string {
    return this.sheetState(sheet).name;
  }

  isAlive(handle: HostHandle): boolean {
    switch (handle.kind) {
      case 'instance':
        return this.findInstance(handle) !== undefined;
      case 'document':
        return this.findDocument(handle) !== undefined;
      case 'sheet':
        return this.findSheet(handle) !== undefined;
    }
  }

  // ===========================================================================
  // Cells
  // ===========================================================================

  cellValue(sheet: SheetHandle, row: number, column: number): CellValue {
    return this.sheetState(sheet).store.getCell(row, column)?.value ?? null;
  }

  cellFormula(sheet: SheetHandle, row: number, column: number): string | null {
    return this.sheetState(sheet).store.getCell(row, column)?.formula ?? null;
  }

  /**
   * Writing a value replaces any formula. An empty string clears the cell.
   */
  setCellValue(sheet: SheetHandle, row: number, column: number, value: CellValue): void {
    this.sheetState(sheet).store.setCell(row, column, { value: value === '' ? null : value });
  }

  /**
   * Store a formula together with the value it computes to. The host does
   * not evaluate formulas.
   */
  setCellFormula(
    sheet: SheetHandle,
    row: number,
    column: number,
    formula: string,
    computed: CellValue = null
  ): void {
    this.sheetState(sheet).store.setCell(row, column, { value: computed, formula });
  }

  rowCount(sheet: SheetHandle): number {
    return this.sheetState(sheet).store.getLastRow();
  }

  columnCount(sheet: SheetHandle): number {
    return this.sheetState(sheet).store.getLastColumn();
  }

  cellHyperlink(sheet: SheetHandle, row: number, column: number): HostHyperlink | null {
    const link = this.sheetState(sheet).links.get(cellKey(row, column));
    return link ? { ...link } : null;
  }

  addHyperlink(sheet: SheetHandle, row: number, column: number, link: HostHyperlink): void {
    const owner = this.sheetState(sheet);
    owner.links.set(cellKey(row, column), { ...link });
    owner.store.setCell(row, column, { value: link.textToDisplay === '' ? null : link.textToDisplay });
  }

  // ===========================================================================
  // Names & Shapes
  // ===========================================================================

  names(document: DocumentHandle): HostName[] {
    return this.documentState(document).names.map(n => ({
      name: n.name,
      sheet: n.sheet.handle,
      topLeft: { ...n.region.topLeft },
      bottomRight: { ...n.region.bottomRight },
    }));
  }

  shapes(sheet: SheetHandle): HostShape[] {
    return this.sheetState(sheet).shapes.map(s => ({ ...s }));
  }

  defineName(sheet: SheetHandle, name: string, topLeft: CellCoordinate, bottomRight: CellCoordinate = topLeft): void {
    const owner = this.sheetState(sheet);
    const document = this.documentState(sheet.document);
    if (!/^[A-Za-z_\\][A-Za-z0-9_.\\]*$/.test(name)) {
      throw new InvalidArgumentsError(`'${name}' is not a valid name.`);
    }
    const entry: NameState = { name, sheet: owner, region: Region.of(topLeft, bottomRight) };
    const existing = document.names.findIndex(n => n.name.toLowerCase() === name.toLowerCase());
    if (existing >= 0) {
      document.names[existing] = entry;
    } else {
      document.names.push(entry);
    }
  }

  deleteName(document: DocumentHandle, name: string): void {
    const state = this.documentState(document);
    const entry = findByName(state.names, name);
    if (!entry) {
      throw new NotFoundError(`No name '${name}' in ${state.name}.`, name);
    }
    state.names = state.names.filter(n => n !== entry);
  }

  addShape(sheet: SheetHandle, shape: HostShape): void {
    const owner = this.sheetState(sheet);
    if (findByName(owner.shapes, shape.name)) {
      throw new InvalidArgumentsError(`A shape named '${shape.name}' already exists.`);
    }
    owner.shapes.push({ ...shape });
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Bring an instance, document or sheet to the front. Focusing a sheet
   * also focuses its document and instance.
   */
  activate(handle: HostHandle): void {
    switch (handle.kind) {
      case 'instance':
        this.instanceState(handle).focus = this.tick();
        return;
      case 'document':
        this.documentState(handle).focus = this.tick();
        this.instanceState(handle.instance).focus = this.tick();
        return;
      case 'sheet':
        this.documentState(handle.document).activeSheet = this.sheetState(handle);
        this.activate(handle.document);
        return;
    }
  }

  addSheet(document: DocumentHandle, name?: string, placement?: SheetPlacement): SheetHandle {
    const state = this.documentState(document);
    let index = state.sheets.length;
    if (placement) {
      const anchor = 'before' in placement ? placement.before : placement.after;
      index = state.sheets.indexOf(this.sheetState(anchor));
      if (anchor.document.key !== document.key || index < 0) {
        throw new InvalidArgumentsError(`Sheet '${this.sheetName(anchor)}' is not in ${state.name}.`);
      }
      if ('after' in placement) index++;
    }
    const added = this.addSheetState(state, name);
    state.sheets.pop();
    state.sheets.splice(index, 0, added);
    return added.handle;
  }

  deleteSheet(sheet: SheetHandle): void {
    const owner = this.sheetState(sheet);
    const document = this.documentState(sheet.document);
    if (document.sheets.length === 1) {
      throw new InvalidArgumentsError('A document must keep at least one sheet.');
    }
    document.sheets = document.sheets.filter(s => s !== owner);
    document.names = document.names.filter(n => n.sheet !== owner);
    if (document.activeSheet === owner) {
      document.activeSheet = document.sheets[0] ?? null;
    }
  }

  /**
   * Record a save under a new path; name and full name follow it.
   */
  saveAs(document: DocumentHandle, path: string): void {
    const state = this.documentState(document);
    const paths = this.pathStyle === 'win32' ? win32 : posix;
    state.fullName = paths.resolve(path);
    state.name = paths.basename(state.fullName);
  }

  closeDocument(document: DocumentHandle): void {
    const state = this.documentState(document);
    const owner = this.instanceState(document.instance);
    owner.documents = owner.documents.filter(d => d !== state);
  }

  quit(instance: InstanceHandle): void {
    const state = this.instanceState(instance);
    this.instances = this.instances.filter(i => i !== state);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private tick(): number {
    return ++this.focusClock;
  }

  private addDocument(
    instance: InstanceHandle,
    name: string,
    fullName: string,
    sheetCount: number
  ): DocumentState {
    const owner = this.instanceState(instance);
    const handle: DocumentHandle = Object.freeze({
      kind: 'document',
      key: `doc-${this.nextDocumentKey++}`,
      instance: owner.handle,
    });
    const state: DocumentState = {
      handle,
      name,
      fullName,
      sheets: [],
      activeSheet: null,
      names: [],
      focus: this.tick(),
      sheetCounter: 0,
    };
    for (let i = 0; i < sheetCount; i++) {
      this.addSheetState(state);
    }
    state.activeSheet = state.sheets[0] ?? null;
    owner.documents.push(state);
    owner.focus = this.tick();
    return state;
  }

  private addSheetState(document: DocumentState, name?: string): SheetState {
    let sheetName = name;
    if (sheetName === undefined) {
      do {
        document.sheetCounter++;
        sheetName = `Sheet${document.sheetCounter}`;
      } while (findByName(document.sheets, sheetName));
    } else if (sheetName.trim() === '' || /[\\/?*[\]:]/.test(sheetName)) {
      throw new InvalidArgumentsError(`'${sheetName}' is not a valid sheet name.`);
    } else if (findByName(document.sheets, sheetName)) {
      throw new InvalidArgumentsError(`A sheet named '${sheetName}' already exists.`);
    }

    const handle: SheetHandle = Object.freeze({
      kind: 'sheet',
      key: `sheet-${this.nextSheetKey++}`,
      document: document.handle,
    });
    const state: SheetState = {
      handle,
      name: sheetName,
      store: new SparseDataStore(),
      shapes: [],
      links: new Map(),
    };
    document.sheets.push(state);
    return state;
  }

  private findInstance(handle: InstanceHandle): InstanceState | undefined {
    return this.instances.find(i => i.handle.pid === handle.pid);
  }

  private findDocument(handle: DocumentHandle): DocumentState | undefined {
    return this.findInstance(handle.instance)?.documents.find(d => d.handle.key === handle.key);
  }

  private findSheet(handle: SheetHandle): SheetState | undefined {
    return this.findDocument(handle.document)?.sheets.find(s => s.handle.key === handle.key);
  }

  private instanceState(handle: InstanceHandle): InstanceState {
    const state = this.findInstance(handle);
    if (!state) {
      throw new StaleHandleError(String(handle.pid), 'instance');
    }
    return state;
  }

  private documentState(handle: DocumentHandle): DocumentState {
    const state = this.findDocument(handle);
    if (!state) {
      throw new StaleHandleError(handle.key, 'document');
    }
    return state;
  }

  private sheetState(handle: SheetHandle): SheetState {
    const state = this.findSheet(handle);
    if (!state) {
      throw new StaleHandleError(handle.key, 'sheet');
    }
    return state;
  }
}

function mostRecent<T extends { focus: number }>(items: readonly T[]): T | undefined {
  let best: T | undefined;
  for (const item of items) {
    if (!best || item.focus > best.focus) {
      best = item;
    }
  }
  return best;
}

function findByName<T extends { name: string }>(items: readonly T[], name: string): T | undefined {
  const wanted = name.toLowerCase();
  return items.find(item => item.name.toLowerCase() === wanted);
}
