export { BaseConverter, isValueConverter, transposeMatrix } from './ValueConverter.js';
export type { ConversionOptions, ValueConverter } from './ValueConverter.js';
