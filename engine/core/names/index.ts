export { defineName, deleteName, findName, hasName, listNames } from './DefinedNames.js';
export type { DefinedName } from './DefinedNames.js';
