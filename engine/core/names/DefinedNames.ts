/**
 * CellBridge - Defined Names
 *
 * Workbook-level names that point at a block of cells.
 */

import { DocumentHandle } from '../types/index.js';
import { Region, quoteSheetName } from '../coordinates/index.js';
import type { HostName } from '../host/index.js';
import { Range, RangeContext } from '../range/Range.js';
import type { RangeOptions } from '../range/RangeOptions.js';

export interface DefinedName {
  name: string;
  /** Formula form of the target, e.g. "=Sheet1!$A$1:$B$2" */
  refersTo: string;
  range: Range;
}

function toDefinedName(context: RangeContext, entry: HostName, options: RangeOptions): DefinedName {
  const region = Region.of(entry.topLeft, entry.bottomRight);
  const sheetName = quoteSheetName(context.host.sheetName(entry.sheet));
  return {
    name: entry.name,
    refersTo: `=${sheetName}!${region.toA1(true, true)}`,
    range: new Range(context, entry.sheet, region, options),
  };
}

export function listNames(context: RangeContext, document: DocumentHandle): DefinedName[] {
  return context.host.names(document).map(entry => toDefinedName(context, entry, {}));
}

export function hasName(context: RangeContext, document: DocumentHandle, name: string): boolean {
  const wanted = name.toLowerCase();
  return context.host.names(document).some(n => n.name.toLowerCase() === wanted);
}

/**
 * Point a name at the Range, replacing any name that differs only in
 * case. The name belongs to the Range's document.
 */
export function defineName(context: RangeContext, name: string, range: Range): DefinedName {
  const { topLeft, bottomRight } = range.region;
  context.host.defineName(range.sheet, name, topLeft, bottomRight);
  return toDefinedName(context, { name, sheet: range.sheet, topLeft, bottomRight }, range.appliedOptions);
}

export function deleteName(context: RangeContext, document: DocumentHandle, name: string): void {
  context.host.deleteName(document, name);
}

/**
 * Case-insensitive lookup; null when the document has no such name.
 */
export function findName(
  context: RangeContext,
  document: DocumentHandle,
  name: string,
  options: RangeOptions = {}
): DefinedName | null {
  const wanted = name.toLowerCase();
  const entry = context.host.names(document).find(n => n.name.toLowerCase() === wanted);
  return entry ? toDefinedName(context, entry, options) : null;
}
