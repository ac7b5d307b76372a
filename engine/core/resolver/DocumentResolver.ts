/**
 * CellBridge - Document Resolver
 *
 * Turns a document name, a path, or one of the ACTIVE_DOCUMENT /
 * NEW_DOCUMENT sentinels into exactly one open document, or fails with
 * the reason. Resolution is never cached.
 *
 * Lookup order for a name or path:
 * 1. Every open document in every instance whose display name or full
 *    path matches (case-insensitive, paths resolved against the cwd)
 * 2. No match: an existing file on disk is opened in the active instance
 * 3. More than one match is ambiguous
 */

import { statSync } from 'node:fs';
import { DocumentHandle, SheetHandle } from '../types/index.js';
import {
  AmbiguousReferenceError,
  IndexOutOfRangeError,
  InvalidArgumentsError,
  NotFoundError,
  ZeroBasedAccessError,
} from '../errors/index.js';
import type { AutomationHost } from '../host/index.js';
import type { InstanceRegistry } from '../registry/index.js';
import type { Logger } from '../logging/index.js';

/** The active document of the active instance. */
export const ACTIVE_DOCUMENT: unique symbol = Symbol('cellbridge.activeDocument');

/** A new blank document in the active instance. */
export const NEW_DOCUMENT: unique symbol = Symbol('cellbridge.newDocument');

export type DocumentIdentifier = string | typeof ACTIVE_DOCUMENT | typeof NEW_DOCUMENT;

/** A sheet given as a handle, a name or a 1-based index. */
export type SheetRef = SheetHandle | string | number;

/** Errors from stat that mean there is no readable file at the path. */
const NOT_A_FILE = new Set([
  'ENOENT',
  'ENOTDIR',
  'ENAMETOOLONG',
  'EACCES',
  'EPERM',
  'ELOOP',
  'EINVAL',
  'ERR_INVALID_ARG_VALUE',
]);

function isExistingFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string' && NOT_A_FILE.has(error.code)) {
      return false;
    }
    throw error;
  }
}

export function isSheetHandle(value: unknown): value is SheetHandle {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === 'sheet';
}

export class DocumentResolver {
  private readonly host: AutomationHost;
  private readonly registry: InstanceRegistry;
  private readonly logger: Logger;

  constructor(host: AutomationHost, registry: InstanceRegistry, logger: Logger) {
    this.host = host;
    this.registry = registry;
    this.logger = logger;
  }

  resolve(identifier: DocumentIdentifier): DocumentHandle {
    if (identifier === ACTIVE_DOCUMENT) {
      const active = this.registry.activeDocument();
      if (!active) {
        throw new NotFoundError('There is no active document.', 'active');
      }
      this.logger.debug({ document: this.host.documentName(active) }, 'resolved active document');
      return active;
    }

    if (identifier === NEW_DOCUMENT) {
      const instance = this.registry.activeInstance({ start: true });
      const created = this.host.create(instance);
      this.logger.debug({ document: this.host.documentName(created), pid: instance.pid }, 'created document');
      return created;
    }

    if (identifier.trim() === '') {
      throw new InvalidArgumentsError('Document identifier must not be empty.');
    }

    const matches = this.registry.findDocuments(identifier);
    if (matches.length > 1) {
      this.logger.debug({ identifier, matches: matches.length }, 'ambiguous document reference');
      throw new AmbiguousReferenceError(identifier, matches.length);
    }
    if (matches.length === 1) {
      const { document, instance } = matches[0];
      this.logger.debug({ identifier, pid: instance.pid }, 'resolved document');
      return document;
    }

    if (isExistingFile(identifier)) {
      const instance = this.registry.activeInstance({ start: true });
      this.logger.info({ path: identifier, pid: instance.pid }, 'opening document from disk');
      return this.host.open(instance, identifier);
    }

    throw new NotFoundError(`Could not find document '${identifier}'.`, identifier);
  }

  /**
   * Resolve an identifier, pass a handle through, or create a new
   * document when called without one.
   */
  resolveOrCreate(identifier?: DocumentIdentifier | DocumentHandle): DocumentHandle {
    if (identifier === undefined) {
      return this.resolve(NEW_DOCUMENT);
    }
    if (typeof identifier === 'object') {
      return identifier;
    }
    return this.resolve(identifier);
  }

  /**
   * Active sheet of the active document.
   */
  activeSheet(): SheetHandle {
    const sheet = this.registry.activeSheet();
    if (!sheet) {
      throw new NotFoundError('There is no active sheet.', 'active');
    }
    return sheet;
  }

  /**
   * A sheet handle passes through; a name or index is looked up in the
   * given document, or in the active one.
   */
  resolveSheet(ref: SheetRef, document?: DocumentHandle): SheetHandle {
    if (isSheetHandle(ref)) {
      return ref;
    }
    return this.sheet(document ?? this.resolve(ACTIVE_DOCUMENT), ref);
  }

  /**
   * Look up a sheet by name (case-insensitive) or 1-based index.
   */
  sheet(document: DocumentHandle, nameOrIndex: string | number): SheetHandle {
    const sheets = this.host.sheets(document);

    if (typeof nameOrIndex === 'number') {
      if (!Number.isInteger(nameOrIndex)) {
        throw new InvalidArgumentsError(`Sheet index must be an integer, got ${nameOrIndex}.`);
      }
      if (nameOrIndex === 0) {
        throw new ZeroBasedAccessError('Sheet');
      }
      if (nameOrIndex < 0 || nameOrIndex > sheets.length) {
        throw new IndexOutOfRangeError(nameOrIndex, sheets.length, 'Sheet');
      }
      return sheets[nameOrIndex - 1];
    }

    const wanted = nameOrIndex.toLowerCase();
    const found = sheets.find(sheet => this.host.sheetName(sheet).toLowerCase() === wanted);
    if (!found) {
      throw new NotFoundError(
        `No sheet named '${nameOrIndex}' in ${this.host.documentName(document)}.`,
        nameOrIndex
      );
    }
    return found;
  }
}
