/**
 * CellBridge - Core Type Definitions
 * Shared value types for addressing cells inside a host spreadsheet application
 */

// ============================================================================
// Cell Types
// ============================================================================

/**
 * Raw value of a single cell as reported by the host.
 * `null` is a blank cell.
 */
export type CellValue = string | number | boolean | Date | null;

/**
 * Type guard for values that can be written into a cell as-is
 */
export function isCellValue(value: unknown): value is CellValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  );
}

/**
 * Blank test used by contiguous expansion: a literal blank and an
 * empty string are both empty.
 */
export function isBlankValue(value: CellValue | undefined): boolean {
  return value === null || value === undefined || value === '';
}

// ============================================================================
// Cell Reference Types
// ============================================================================

/** 1-based cell position. */
export interface CellCoordinate {
  row: number;
  column: number;
}

export type CellKey = string;

export function cellKey(row: number, column: number): CellKey {
  return `${row}_${column}`;
}

export function parseKey(key: CellKey): CellCoordinate {
  const [row, column] = key.split('_').map(Number);
  return { row, column };
}

// ============================================================================
// Navigation Types
// ============================================================================

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Contiguous expansion modes. */
export const EXPAND_MODES = ['table', 'vertical', 'horizontal'] as const;

export type ExpandMode = (typeof EXPAND_MODES)[number];

// ============================================================================
// Host Handle Types
// ============================================================================

/**
 * A running host application process.
 */
export interface InstanceHandle {
  readonly kind: 'instance';
  readonly pid: number;
}

/**
 * One open document inside one instance. Opaque to the core: name and
 * path are always read through the host.
 */
export interface DocumentHandle {
  readonly kind: 'document';
  readonly key: string;
  readonly instance: InstanceHandle;
}

/**
 * A sheet inside one document. Keys are never reused, so a handle to a
 * deleted sheet stays stale even when a new sheet takes its name.
 */
export interface SheetHandle {
  readonly kind: 'sheet';
  readonly key: string;
  readonly document: DocumentHandle;
}

export type HostHandle = InstanceHandle | DocumentHandle | SheetHandle;

export function sameInstance(a: InstanceHandle, b: InstanceHandle): boolean {
  return a.pid === b.pid;
}

export function sameDocument(a: DocumentHandle, b: DocumentHandle): boolean {
  return a.key === b.key && sameInstance(a.instance, b.instance);
}

export function sameSheet(a: SheetHandle, b: SheetHandle): boolean {
  return a.key === b.key && sameDocument(a.document, b.document);
}

// ============================================================================
// Constants
// ============================================================================

export const MAX_ROWS = 1_048_576;
export const MAX_COLS = 16_384;
