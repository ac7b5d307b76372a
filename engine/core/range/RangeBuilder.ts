/**
 * CellBridge - Range Builder
 *
 * Parses the argument forms a Range can be built from into a Region bound
 * to one sheet:
 *
 *   (address)                     'A1', '$A$1:C3', 'B:C', 'Sheet2!A1', a defined name
 *   (sheet, address)              sheet as handle, name or 1-based index
 *   ([row, col])                  1-based tuple
 *   ([row, col], [row, col])      two corners in any order
 *   (sheet, [row, col], ...)      tuples on an explicit sheet
 *   (rangeA, rangeB)              span of two Ranges on the same sheet
 *
 * Without an explicit sheet the active sheet is read once, here, and the
 * Range stays bound to it.
 */

import { CellCoordinate, DocumentHandle, SheetHandle, sameSheet } from '../types/index.js';
import {
  InvalidArgumentsError,
  NotFoundError,
  ZeroBasedAccessError,
} from '../errors/index.js';
import { Region, parseAddress } from '../coordinates/index.js';
import { DocumentResolver, SheetRef, isSheetHandle } from '../resolver/index.js';
import { findName } from '../names/index.js';
import { Range, RangeContext } from './Range.js';
import type { RangeOptions } from './RangeOptions.js';

/** A 1-based [row, column] pair. */
export type CellTuple = readonly [number, number];

export type RangeArgument = SheetRef | CellTuple | Range;

function isSheetRef(value: unknown): value is SheetRef {
  return typeof value === 'number' || typeof value === 'string' || isSheetHandle(value);
}

/**
 * Validate a tuple. Zero is checked per axis before sign, so [0, 5] and
 * [5, 0] both report a 0-based access.
 */
export function parseTuple(value: unknown): CellCoordinate {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new InvalidArgumentsError('A cell tuple must be [row, column].');
  }
  const entries: unknown[] = value;
  const [row, column] = entries;
  if (typeof row !== 'number' || typeof column !== 'number' ||
      !Number.isInteger(row) || !Number.isInteger(column)) {
    throw new InvalidArgumentsError(`Cell tuple entries must be integers, got [${entries.join(', ')}].`);
  }
  if (row === 0 || column === 0) {
    throw new ZeroBasedAccessError();
  }
  if (row < 0 || column < 0) {
    throw new InvalidArgumentsError(`Cell tuple entries must be positive, got [${row}, ${column}].`);
  }
  return { row, column };
}

export class RangeBuilder {
  private readonly context: RangeContext;
  private readonly resolver: DocumentResolver;

  constructor(context: RangeContext, resolver: DocumentResolver) {
    this.context = context;
    this.resolver = resolver;
  }

  build(args: readonly unknown[], options: RangeOptions = {}): Range {
    if (args.length === 0) {
      throw new InvalidArgumentsError('Range needs at least one argument.');
    }
    if (args.length > 3) {
      throw new InvalidArgumentsError(`Range takes at most three arguments, got ${args.length}.`);
    }

    if (args.every(arg => arg instanceof Range)) {
      return this.span(args, options);
    }

    // A leading sheet: always for a handle or a number, for a string only
    // when something follows it
    const [first, ...rest] = args;
    const leadingSheet = isSheetHandle(first) || typeof first === 'number' || (typeof first === 'string' && rest.length > 0);
    const sheetArg = leadingSheet && isSheetRef(first) ? first : undefined;
    const targets = sheetArg === undefined ? args : rest;

    if (targets.length === 1 && typeof targets[0] === 'string') {
      return this.fromAddress(targets[0], sheetArg, options);
    }
    if ((targets.length === 1 || targets.length === 2) && targets.every(Array.isArray)) {
      const corners = targets.map(parseTuple);
      const sheet = sheetArg === undefined ? this.resolver.activeSheet() : this.resolver.resolveSheet(sheetArg);
      return new Range(this.context, sheet, Region.of(corners[0], corners[corners.length - 1]), options);
    }

    throw new InvalidArgumentsError(
      'Range takes an address, one or two [row, column] tuples, or two Ranges, optionally after a sheet.'
    );
  }

  private span(args: readonly unknown[], options: RangeOptions): Range {
    const ranges = args.filter((arg): arg is Range => arg instanceof Range);
    if (ranges.length !== 2) {
      throw new InvalidArgumentsError(`Range takes two Ranges to span, got ${ranges.length}.`);
    }
    const [a, b] = ranges;
    if (!sameSheet(a.sheet, b.sheet)) {
      throw new InvalidArgumentsError('Both Ranges must be on the same sheet.');
    }
    return new Range(this.context, a.sheet, a.region.union(b.region), options);
  }

  private fromAddress(token: string, sheetArg: SheetRef | undefined, options: RangeOptions): Range {
    const parsed = parseAddress(token);
    const explicit = sheetArg === undefined ? undefined : this.resolver.resolveSheet(sheetArg);

    if (parsed === null) {
      return this.fromName(token, explicit, options);
    }

    let sheet: SheetHandle;
    if (parsed.sheetName === undefined) {
      sheet = explicit ?? this.resolver.activeSheet();
    } else {
      const document: DocumentHandle = explicit?.document ?? this.resolver.activeSheet().document;
      sheet = this.resolver.sheet(document, parsed.sheetName);
      if (explicit && !sameSheet(explicit, sheet)) {
        throw new InvalidArgumentsError(
          `Address '${token}' names a different sheet than the one given.`
        );
      }
    }
    return new Range(this.context, sheet, parsed.region, options);
  }

  private fromName(name: string, explicit: SheetHandle | undefined, options: RangeOptions): Range {
    const document = explicit?.document ?? this.resolver.activeSheet().document;
    const defined = findName(this.context, document, name, options);
    if (!defined) {
      throw new NotFoundError(`'${name}' is neither a cell address nor a defined name.`, name);
    }
    if (explicit && !sameSheet(explicit, defined.range.sheet)) {
      throw new InvalidArgumentsError(
        `Name '${defined.name}' refers to another sheet: ${defined.refersTo}`
      );
    }
    return defined.range;
  }
}
