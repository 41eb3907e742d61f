export { StatusStore, STATUS_LIMITS } from './status-store.js';
export type { StatusStoreConfig } from './status-store.js';
