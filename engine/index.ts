/**
 * CellBridge
 *
 * Addresses workbooks, sheets, cell ranges and shapes inside running
 * spreadsheet applications through a pluggable automation host:
 * - Resolves documents by name, path or "active"/"new" across instances
 * - A1 addresses, 1-based tuples and defined names for building Ranges
 * - 0-based indexing and slicing over 1-based sheet coordinates
 * - table / vertical / horizontal expansion from an anchor cell
 *
 * @example
 * ```typescript
 * import { Bridge, MemoryHost } from 'cellbridge';
 *
 * const bridge = new Bridge(new MemoryHost());
 * bridge.book();
 *
 * bridge.range('A1').value = [[1, 2], [3, 4]];
 *
 * console.log(bridge.range('A1').table.address); // "$A$1:$B$2"
 * console.log(bridge.range([1, 1], [2, 2]).value); // [[1, 2], [3, 4]]
 * ```
 */

export * from './core/index.js';
export { readWorkbookFile, WorkbookParseError } from '../importer/src/main.js';
export type { ImportedWorkbook, ImportedSheet, ImportedCell, ImportedName } from '../importer/src/main.js';
