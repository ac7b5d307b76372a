/**
 * CellBridge - Error Taxonomy
 *
 * Every failure the core raises is one of these classes. They are thrown
 * synchronously and never downgraded to a default value.
 */

export type BridgeErrorCode =
  | 'NotFound'
  | 'AmbiguousReference'
  | 'ZeroBasedAccessError'
  | 'InvalidArguments'
  | 'IndexOutOfRange'
  | 'UnsupportedSliceStep'
  | 'StaleHandle';

/**
 * Base class for all CellBridge errors.
 */
export abstract class BridgeError extends Error {
  abstract readonly code: BridgeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The identifier matches no open document, sheet, name or shape, and
 * (for documents) no file on disk.
 */
export class NotFoundError extends BridgeError {
  readonly code = 'NotFound';
  readonly identifier: string;

  constructor(message: string, identifier: string) {
    super(message);
    this.identifier = identifier;
  }
}

/**
 * The identifier matches more than one open document.
 */
export class AmbiguousReferenceError extends BridgeError {
  readonly code = 'AmbiguousReference';
  readonly identifier: string;
  readonly matchCount: number;

  constructor(identifier: string, matchCount: number) {
    super(
      `Document '${identifier}' is ambiguous: ${matchCount} open documents match.`
    );
    this.identifier = identifier;
    this.matchCount = matchCount;
  }
}

/**
 * A 0 was supplied where 1-based coordinates are required.
 */
export class ZeroBasedAccessError extends BridgeError {
  readonly code = 'ZeroBasedAccessError';

  constructor(what: string = 'Range') {
    super(`Attempted to access 0-based ${what}. Sheet coordinates are 1-based.`);
  }
}

export class InvalidArgumentsError extends BridgeError {
  readonly code = 'InvalidArguments';
}

export class IndexOutOfRangeError extends BridgeError {
  readonly code = 'IndexOutOfRange';
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number, label: string = 'Index') {
    super(`${label} ${index} out of range (${count} elements).`);
    this.index = index;
    this.count = count;
  }
}

export class UnsupportedSliceStepError extends BridgeError {
  readonly code = 'UnsupportedSliceStep';
  readonly step: number;

  constructor(step: number) {
    super(`Slice step ${step} is not supported; only contiguous slices are.`);
    this.step = step;
  }
}

/**
 * Operation against a closed document or a deleted sheet.
 */
export class StaleHandleError extends BridgeError {
  readonly code = 'StaleHandle';
  readonly handleKey: string;

  constructor(handleKey: string, what: string = 'document') {
    super(`The ${what} '${handleKey}' is no longer open.`);
    this.handleKey = handleKey;
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}
