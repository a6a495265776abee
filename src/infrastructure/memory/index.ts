export { InMemoryEventStore } from './in-memory-event-store.js';
export { default as storePlugin } from './store-plugin.js';
export type { StorePluginOptions } from './store-plugin.js';
