/**
 * Session Adapters
 */

export {
  InMemorySessionStore,
  type InMemorySessionStoreOptions,
} from './in-memory-session-store.js';
