export { Region, assertCoordinate } from './Region.js';
export {
  parseAddress,
  parseReference,
  formatAddress,
  columnLetters,
  columnNumber,
  quoteSheetName,
  looksLikeCellReference,
} from './notation.js';
export type { ParsedAddress, AddressFormat, RegionBounds } from './notation.js';
