export { InstanceRegistry } from './InstanceRegistry.js';
export type { ActiveInstanceOptions, DocumentMatch } from './InstanceRegistry.js';
