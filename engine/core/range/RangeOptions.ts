/**
 * CellBridge - Range Options
 *
 * Options ride along with a Range and every Range derived from it.
 */

import { z } from 'zod';
import { EXPAND_MODES, ExpandMode } from '../types/index.js';
import { InvalidArgumentsError } from '../errors/index.js';
import {
  BaseConverter,
  ConversionOptions,
  ValueConverter,
  isValueConverter,
} from '../conversion/index.js';

export interface RangeOptions extends ConversionOptions {
  /** Converter used by `value`; BaseConverter when left out */
  convert?: ValueConverter;
  /** Read `value` from the expanded region instead of the Range itself */
  expand?: ExpandMode;
}

const isFunction = (value: unknown): boolean => typeof value === 'function';

const RangeOptionsSchema = z
  .object({
    convert: z.custom<ValueConverter>(isValueConverter, 'convert must have read() and write()'),
    ndim: z.union([z.literal(1), z.literal(2)]),
    numberType: z.custom<(value: number) => unknown>(isFunction, 'numberType must be a function'),
    dateType: z.custom<(value: Date) => unknown>(isFunction, 'dateType must be a function'),
    emptyValue: z.unknown(),
    transpose: z.boolean(),
    expand: z.enum(EXPAND_MODES),
  })
  .partial()
  .strict();

export const DEFAULT_CONVERTER: ValueConverter = new BaseConverter();

/**
 * Validate an option bag. Unknown keys and ill-typed values raise
 * InvalidArgumentsError. The result is frozen.
 */
export function validateRangeOptions(options: RangeOptions): Readonly<RangeOptions> {
  const parsed = RangeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new InvalidArgumentsError(`Invalid range options: ${detail}`);
  }
  return Object.freeze({ ...options });
}

export function converterOf(options: RangeOptions): ValueConverter {
  return options.convert ?? DEFAULT_CONVERTER;
}
