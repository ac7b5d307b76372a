/**
 * CellBridge - Instance Registry
 *
 * Enumerates running host instances and their open documents. Nothing is
 * cached: every call reads live state from the host.
 */

import { posix, win32 } from 'node:path';
import {
  DocumentHandle,
  InstanceHandle,
  SheetHandle,
  sameInstance,
} from '../types/index.js';
import type { AutomationHost } from '../host/index.js';
import type { Logger } from '../logging/index.js';

export interface DocumentMatch {
  instance: InstanceHandle;
  document: DocumentHandle;
}

export interface ActiveInstanceOptions {
  /** Start an instance through the host when none is running */
  start?: boolean;
}

export class InstanceRegistry {
  private readonly host: AutomationHost;
  private readonly logger: Logger;

  constructor(host: AutomationHost, logger: Logger) {
    this.host = host;
    this.logger = logger;
  }

  listInstances(): InstanceHandle[] {
    return this.host.listInstances();
  }

  documentsOf(instance: InstanceHandle): DocumentHandle[] {
    return this.host.listDocuments(instance);
  }

  /**
   * The most recently focused instance. With `start`, launches one when
   * nothing is running instead of returning null.
   */
  activeInstance(options: { start: true }): InstanceHandle;
  activeInstance(options?: ActiveInstanceOptions): InstanceHandle | null;
  activeInstance(options: ActiveInstanceOptions = {}): InstanceHandle | null {
    const active = this.host.activeInstance();
    if (active || !options.start) {
      return active;
    }
    const started = this.host.startInstance();
    this.logger.info({ pid: started.pid }, 'started host instance');
    return started;
  }

  /** Active document of the active instance. */
  activeDocument(): DocumentHandle | null {
    const instance = this.host.activeInstance();
    return instance ? this.host.activeDocument(instance) : null;
  }

  activeSheet(): SheetHandle | null {
    const document = this.activeDocument();
    return document ? this.host.activeSheet(document) : null;
  }

  /**
   * Case-insensitive comparison form of a document name or path. Anything
   * with a separator is a path and is resolved against the working
   * directory the way the host resolves the paths it opens.
   */
  normalize(identifier: string): string {
    const paths = this.host.pathStyle === 'win32' ? win32 : posix;
    const hasSeparator = this.host.pathStyle === 'win32' ? /[\\/]/.test(identifier) : identifier.includes('/');
    const normalized = hasSeparator ? paths.resolve(identifier) : identifier;
    return normalized.toLowerCase();
  }

  /**
   * Every (instance, document) pair whose display name or full path
   * equals the identifier after normalization.
   */
  findDocuments(identifier: string): DocumentMatch[] {
    const wanted = this.normalize(identifier);
    const matches: DocumentMatch[] = [];

    for (const instance of this.host.listInstances()) {
      for (const document of this.host.listDocuments(instance)) {
        const name = this.host.documentName(document).toLowerCase();
        const fullName = this.host.documentFullName(document);
        if (name === wanted || (fullName !== '' && this.normalize(fullName) === wanted)) {
          matches.push({ instance, document });
        }
      }
    }
    return matches;
  }

  /** Number of distinct instances holding a matching document. */
  countInstances(identifier: string): number {
    const instances: InstanceHandle[] = [];
    for (const { instance } of this.findDocuments(identifier)) {
      if (!instances.some(seen => sameInstance(seen, instance))) {
        instances.push(instance);
      }
    }
    return instances.length;
  }
}
