/**
 * Storage Module - persistence and idempotency collaborators
 *
 * Provides pluggable implementations for:
 * - Redis (shared across server instances)
 * - Memory (development/testing)
 */

export * from './types.js';
export { RedisStorage } from './redis-storage.js';
export { MemoryStorage } from './memory-storage.js';
export { MemoryIdempotencyStore, RedisIdempotencyStore } from './idempotency-store.js';

import type { GameStorage, IdempotencyStore, StorageConfig } from './types.js';
import { RedisStorage } from './redis-storage.js';
import { MemoryStorage } from './memory-storage.js';
import { MemoryIdempotencyStore, RedisIdempotencyStore } from './idempotency-store.js';

/**
 * Create a storage instance based on configuration
 */
export function createStorage(config: StorageConfig): GameStorage {
  switch (config.type) {
    case 'redis':
      return new RedisStorage(config);

    case 'memory':
      return new MemoryStorage();

    default:
      throw new Error(`Unknown storage type: ${String(config.type)}`);
  }
}

/**
 * Create the idempotency store matching a storage backend. A Redis backend
 * shares its client.
 */
export function createIdempotencyStore(storage: GameStorage): IdempotencyStore {
  if (storage instanceof RedisStorage) {
    return new RedisIdempotencyStore(() => storage.getClient());
  }
  return new MemoryIdempotencyStore();
}

/**
 * Global storage instance (singleton)
 */
let globalStorage: GameStorage | null = null;

/**
 * Get the global storage instance, creating it from config on first use
 */
export function getStorage(config: StorageConfig): GameStorage {
  if (!globalStorage) {
    globalStorage = createStorage(config);
  }
  return globalStorage;
}

/**
 * Initialize the global storage (connect)
 */
export async function initializeStorage(config: StorageConfig): Promise<GameStorage> {
  const storage = getStorage(config);
  if (!storage.isConnected()) {
    await storage.connect();
  }
  return storage;
}

/**
 * Shutdown the global storage (disconnect)
 */
export async function shutdownStorage(): Promise<void> {
  if (globalStorage && globalStorage.isConnected()) {
    await globalStorage.disconnect();
  }
  globalStorage = null;
}
