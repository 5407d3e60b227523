export { JsonStore } from './json-store.js';
export type { JsonStoreOptions } from './json-store.js';
