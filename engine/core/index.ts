/**
 * CellBridge - Core Module Exports
 *
 * This is the main entry point for the CellBridge binding layer.
 */

// Facade
export { Bridge } from './Bridge.js';

// Types - export all
export * from './types/index.js';

// Errors
export {
  BridgeError,
  NotFoundError,
  AmbiguousReferenceError,
  ZeroBasedAccessError,
  InvalidArgumentsError,
  IndexOutOfRangeError,
  UnsupportedSliceStepError,
  StaleHandleError,
  isBridgeError,
} from './errors/index.js';
export type { BridgeErrorCode } from './errors/index.js';

// Configuration & Logging
export {
  DEFAULT_BRIDGE_CONFIG,
  LOG_LEVELS,
  loadBridgeConfig,
  resolveBridgeConfig,
} from './config/index.js';
export type { BridgeConfig, LogLevel } from './config/index.js';
export { createLogger } from './logging/index.js';
export type { Logger } from './logging/index.js';

// Coordinate Model
export {
  Region,
  assertCoordinate,
  parseAddress,
  parseReference,
  formatAddress,
  columnLetters,
  columnNumber,
  quoteSheetName,
} from './coordinates/index.js';
export type { ParsedAddress, AddressFormat, RegionBounds } from './coordinates/index.js';

// Hosts
export { MemoryHost } from './host/index.js';
export type {
  AutomationHost,
  HostHyperlink,
  HostName,
  HostShape,
  ShapeKind,
  SheetPlacement,
  PathStyle,
  MemoryHostConfig,
} from './host/index.js';

// Data Store
export { SparseDataStore } from './data/index.js';
export type { StoredCell, UsedRange } from './data/index.js';

// Registry & Resolver
export { InstanceRegistry } from './registry/index.js';
export type { ActiveInstanceOptions, DocumentMatch } from './registry/index.js';
export {
  ACTIVE_DOCUMENT,
  NEW_DOCUMENT,
  DocumentResolver,
  isSheetHandle,
} from './resolver/index.js';
export type { DocumentIdentifier, SheetRef } from './resolver/index.js';

// Ranges
export {
  Range,
  EmptySelection,
  RangeBuilder,
  expandRegion,
  validateRangeOptions,
} from './range/index.js';
export type {
  RangeContext,
  RangeOptions,
  CellTuple,
  RangeArgument,
  SliceSpec,
  AxisSelector,
  ExpandOptions,
} from './range/index.js';

// Conversion
export { BaseConverter, isValueConverter, transposeMatrix } from './conversion/index.js';
export type { ConversionOptions, ValueConverter } from './conversion/index.js';

// Shapes & Names
export { ShapeLocator } from './shapes/index.js';
export type { ShapeRef, PlainShapeRef, ChartRef, PictureRef, ShapeRefOf } from './shapes/index.js';
export { defineName, deleteName, findName, hasName, listNames } from './names/index.js';
export type { DefinedName } from './names/index.js';
