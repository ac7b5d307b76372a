/**
 * CellBridge - Host Module Exports
 */

export type {
  AutomationHost,
  HostHyperlink,
  HostName,
  HostShape,
  ShapeKind,
  SheetPlacement,
  PathStyle,
} from './AutomationHost.js';
export { MemoryHost } from './MemoryHost.js';
export type { MemoryHostConfig } from './MemoryHost.js';
