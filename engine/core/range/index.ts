/**
 * CellBridge - Range Module Exports
 */

export { Range, EmptySelection } from './Range.js';
export type { RangeContext } from './Range.js';
export { RangeBuilder, parseTuple } from './RangeBuilder.js';
export type { CellTuple, RangeArgument } from './RangeBuilder.js';
export {
  cellAtIndex,
  cellAtPosition,
  normalizeIndex,
  sliceGrid,
  sliceLinear,
} from './RangeIndexer.js';
export type { AxisSelector, SliceSpec } from './RangeIndexer.js';
export { expandRegion, isEmptyCell } from './RegionExpander.js';
export type { ExpandOptions } from './RegionExpander.js';
export { DEFAULT_CONVERTER, converterOf, validateRangeOptions } from './RangeOptions.js';
export type { RangeOptions } from './RangeOptions.js';
