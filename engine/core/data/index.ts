/**
 * CellBridge - Data Module Exports
 */

export { SparseDataStore } from './SparseDataStore.js';
export type {
  StoredCell,
  UsedRange,
} from './SparseDataStore.js';
