/**
 * CellBridge - Shape Addressing
 *
 * Finds drawing objects on a sheet by name or by 1-based position. Only
 * addressing is provided; the shapes themselves stay in the host.
 */

import { SheetHandle } from '../types/index.js';
import {
  IndexOutOfRangeError,
  InvalidArgumentsError,
  NotFoundError,
  ZeroBasedAccessError,
} from '../errors/index.js';
import type { AutomationHost, HostShape, ShapeKind } from '../host/index.js';
import { DocumentResolver, SheetRef, isSheetHandle } from '../resolver/index.js';

interface ShapeBase {
  name: string;
  /** 1-based position among shapes of the same lookup kind */
  index: number;
  sheet: SheetHandle;
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface PlainShapeRef extends ShapeBase {
  kind: 'shape';
}

export interface ChartRef extends ShapeBase {
  kind: 'chart';
}

export interface PictureRef extends ShapeBase {
  kind: 'picture';
}

export type ShapeRef = PlainShapeRef | ChartRef | PictureRef;

/** Lookup result narrowed by the kind asked for; 'shape' matches every kind. */
export type ShapeRefOf<K extends ShapeKind> = K extends 'shape' ? ShapeRef : Extract<ShapeRef, { kind: K }>;

function matchesKind<K extends ShapeKind>(kind: K, shape: ShapeRef): shape is ShapeRefOf<K> & ShapeRef {
  return kind === 'shape' || shape.kind === kind;
}

function toRef(sheet: SheetHandle, shape: HostShape, index: number): ShapeRef {
  const base = {
    name: shape.name,
    index,
    sheet,
    left: shape.left,
    top: shape.top,
    width: shape.width,
    height: shape.height,
  };
  switch (shape.kind) {
    case 'chart':
      return { ...base, kind: 'chart' };
    case 'picture':
      return { ...base, kind: 'picture' };
    case 'shape':
      return { ...base, kind: 'shape' };
  }
}

export class ShapeLocator {
  private readonly host: AutomationHost;
  private readonly resolver: DocumentResolver;

  constructor(host: AutomationHost, resolver: DocumentResolver) {
    this.host = host;
    this.resolver = resolver;
  }

  /**
   * Shapes of one kind on a sheet, indexed from 1 within that kind.
   */
  list<K extends ShapeKind>(sheet: SheetHandle, kind: K): ShapeRefOf<K>[] {
    const result: ShapeRefOf<K>[] = [];
    for (const shape of this.host.shapes(sheet)) {
      const ref = toRef(sheet, shape, result.length + 1);
      if (matchesKind(kind, ref)) {
        result.push(ref);
      }
    }
    return result;
  }

  /**
   * `(nameOrIndex)` looks on the active sheet, `(sheet, nameOrIndex)` on
   * the given one. Names are case-insensitive.
   */
  locate<K extends ShapeKind>(kind: K, args: readonly unknown[]): ShapeRefOf<K> {
    const [first, second] = args;
    let sheet: SheetHandle;
    let key: unknown;
    if (args.length === 1) {
      sheet = this.resolver.activeSheet();
      key = first;
    } else if (args.length === 2 && (isSheetHandle(first) || typeof first === 'string' || typeof first === 'number')) {
      const ref: SheetRef = first;
      sheet = this.resolver.resolveSheet(ref);
      key = second;
    } else {
      throw new InvalidArgumentsError(`Expected (nameOrIndex) or (sheet, nameOrIndex) for a ${kind}.`);
    }

    const shapes = this.list(sheet, kind);

    if (typeof key === 'number') {
      if (!Number.isInteger(key)) {
        throw new InvalidArgumentsError(`A ${kind} index must be an integer, got ${key}.`);
      }
      if (key === 0) {
        throw new ZeroBasedAccessError(kind);
      }
      if (key < 0 || key > shapes.length) {
        throw new IndexOutOfRangeError(key, shapes.length, `${kind} index`);
      }
      return shapes[key - 1];
    }

    if (typeof key === 'string') {
      const wanted = key.toLowerCase();
      const found = shapes.find(shape => shape.name.toLowerCase() === wanted);
      if (!found) {
        throw new NotFoundError(`No ${kind} named '${key}' on ${this.host.sheetName(sheet)}.`, key);
      }
      return found;
    }

    throw new InvalidArgumentsError(`A ${kind} is looked up by name or 1-based index.`);
  }
}
