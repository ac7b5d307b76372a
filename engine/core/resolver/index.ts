export { ACTIVE_DOCUMENT, NEW_DOCUMENT, DocumentResolver, isSheetHandle } from './DocumentResolver.js';
export type { DocumentIdentifier, SheetRef } from './DocumentResolver.js';
