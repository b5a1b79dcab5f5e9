/**
 * Persistence Module
 */

export type { RegistrySnapshot, RegistryStore, SqlClient } from './registry-store.js';
export { InMemoryRegistryStore, PostgresRegistryStore } from './registry-store.js';
