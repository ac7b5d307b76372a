/**
 * CellBridge - Bridge
 *
 * Entry point for scripts: one Bridge per host. Ties the registry, the
 * resolver and the Range model together and exposes the "active" objects
 * through explicit calls.
 *
 * @example
 * ```typescript
 * const bridge = new Bridge(new MemoryHost());
 * const book = bridge.book();                 // new document
 * bridge.range('A1').value = [[1, 2], [3, 4]];
 * bridge.range('A1').table.address;           // '$A$1:$B$2'
 * ```
 */

import { DocumentHandle, InstanceHandle, SheetHandle } from './types/index.js';
import { BridgeConfig, resolveBridgeConfig } from './config/index.js';
import { Logger, createLogger } from './logging/index.js';
import type { AutomationHost, SheetPlacement } from './host/index.js';
import { InstanceRegistry } from './registry/index.js';
import {
  ACTIVE_DOCUMENT,
  DocumentIdentifier,
  DocumentResolver,
  SheetRef,
} from './resolver/index.js';
import {
  CellTuple,
  Range,
  RangeArgument,
  RangeBuilder,
  RangeContext,
} from './range/index.js';
import { ChartRef, PictureRef, ShapeLocator, ShapeRef } from './shapes/index.js';
import { DefinedName, defineName, deleteName, hasName, listNames } from './names/index.js';

export class Bridge {
  readonly host: AutomationHost;
  readonly config: Readonly<BridgeConfig>;
  readonly logger: Logger;
  readonly registry: InstanceRegistry;
  readonly resolver: DocumentResolver;

  private readonly context: RangeContext;
  private readonly builder: RangeBuilder;
  private readonly shapes: ShapeLocator;

  /**
   * @param logger - Defaults to a pino logger at `config.logLevel`
   */
  constructor(host: AutomationHost, config: Partial<BridgeConfig> = {}, logger?: Logger) {
    this.host = host;
    this.config = resolveBridgeConfig(config);
    this.logger = logger ?? createLogger(this.config.logLevel);
    this.registry = new InstanceRegistry(host, this.logger);
    this.resolver = new DocumentResolver(host, this.registry, this.logger);
    this.context = Object.freeze({ host, strictExpansion: this.config.strictExpansion });
    this.builder = new RangeBuilder(this.context, this.resolver);
    this.shapes = new ShapeLocator(host, this.resolver);
  }

  // ===========================================================================
  // Active objects
  // ===========================================================================

  instances(): InstanceHandle[] {
    return this.registry.listInstances();
  }

  activeInstance(): InstanceHandle | null {
    return this.registry.activeInstance();
  }

  activeBook(): DocumentHandle {
    return this.resolver.resolve(ACTIVE_DOCUMENT);
  }

  activeSheet(): SheetHandle {
    return this.resolver.activeSheet();
  }

  // ===========================================================================
  // Documents & sheets
  // ===========================================================================

  /**
   * A document by name, path or sentinel; a new document when called
   * without an identifier.
   */
  book(identifier?: DocumentIdentifier | DocumentHandle): DocumentHandle {
    return this.resolver.resolveOrCreate(identifier);
  }

  /**
   * A sheet by name or 1-based index, in the given document or the
   * active one.
   */
  sheet(nameOrIndex: SheetRef, book?: DocumentIdentifier | DocumentHandle): SheetHandle {
    const document = book === undefined ? undefined : this.resolver.resolveOrCreate(book);
    return this.resolver.resolveSheet(nameOrIndex, document);
  }

  sheets(book?: DocumentIdentifier | DocumentHandle): SheetHandle[] {
    return this.host.sheets(this.documentOf(book));
  }

  /**
   * Insert a sheet into a document (the active one by default), at the
   * end of the tab order unless placed before or after another sheet.
   */
  addSheet(name?: string, placement?: SheetPlacement, book?: DocumentIdentifier | DocumentHandle): SheetHandle {
    const document = this.documentOf(book);
    const added = this.host.addSheet(document, name, placement);
    this.logger.debug({ document: this.host.documentName(document), sheet: this.host.sheetName(added) }, 'added sheet');
    return added;
  }

  deleteSheet(nameOrIndex: SheetRef, book?: DocumentIdentifier | DocumentHandle): void {
    const sheet = this.sheet(nameOrIndex, book);
    const name = this.host.sheetName(sheet);
    this.host.deleteSheet(sheet);
    this.logger.debug({ sheet: name }, 'deleted sheet');
  }

  // ===========================================================================
  // Ranges
  // ===========================================================================

  range(address: string): Range;
  range(sheet: SheetRef, address: string): Range;
  range(topLeft: CellTuple, bottomRight?: CellTuple): Range;
  range(sheet: SheetRef, topLeft: CellTuple, bottomRight?: CellTuple): Range;
  range(first: Range, second: Range): Range;
  range(...args: (RangeArgument | undefined)[]): Range {
    return this.builder.build(args.filter((arg): arg is RangeArgument => arg !== undefined));
  }

  /**
   * Defined names of a document (the active one by default).
   */
  names(book?: DocumentIdentifier | DocumentHandle): DefinedName[] {
    return listNames(this.context, this.documentOf(book));
  }

  /** Name a Range in its own document. */
  defineName(name: string, range: Range): DefinedName {
    return defineName(this.context, name, range);
  }

  deleteName(name: string, book?: DocumentIdentifier | DocumentHandle): void {
    deleteName(this.context, this.documentOf(book), name);
  }

  hasName(name: string, book?: DocumentIdentifier | DocumentHandle): boolean {
    return hasName(this.context, this.documentOf(book), name);
  }

  // ===========================================================================
  // Shapes
  // ===========================================================================

  shape(nameOrIndex: string | number): ShapeRef;
  shape(sheet: SheetRef, nameOrIndex: string | number): ShapeRef;
  shape(...args: (SheetRef | string | number)[]): ShapeRef {
    return this.shapes.locate('shape', args);
  }

  chart(nameOrIndex: string | number): ChartRef;
  chart(sheet: SheetRef, nameOrIndex: string | number): ChartRef;
  chart(...args: (SheetRef | string | number)[]): ChartRef {
    return this.shapes.locate('chart', args);
  }

  picture(nameOrIndex: string | number): PictureRef;
  picture(sheet: SheetRef, nameOrIndex: string | number): PictureRef;
  picture(...args: (SheetRef | string | number)[]): PictureRef {
    return this.shapes.locate('picture', args);
  }

  private documentOf(book?: DocumentIdentifier | DocumentHandle): DocumentHandle {
    return book === undefined ? this.activeBook() : this.resolver.resolveOrCreate(book);
  }
}
