/**
 * Idempotency Stores
 *
 * Committed action results keyed by `{action-kind}:{game-id}:{token}`. Writes
 * are insert-if-absent and never overwrite.
 */

import type { Redis } from 'ioredis';
import type { ActionResult } from '../../shared/game/projection.js';
import type { IdempotencyStore } from './types.js';

const KEY_PREFIX = 'idempotency:';
const SWEEP_INTERVAL_MS = 1000;

export class MemoryIdempotencyStore implements IdempotencyStore {
  private entries: Map<string, { value: string; expiresAt: number }> = new Map();
  private nextSweepAt = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async tryGet(key: string): Promise<ActionResult | null> {
    const entry = this.entries.get(KEY_PREFIX + key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(KEY_PREFIX + key);
      return null;
    }
    return JSON.parse(entry.value);
  }

  async tryPut(key: string, result: ActionResult, ttlSeconds: number): Promise<boolean> {
    this.sweep();
    const existing = this.entries.get(KEY_PREFIX + key);
    if (existing && existing.expiresAt > this.now()) return false;

    this.entries.set(KEY_PREFIX + key, {
      value: JSON.stringify(result),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
    return true;
  }

  /** Drop expired entries, at most once per interval. */
  private sweep(): void {
    const now = this.now();
    if (now < this.nextSweepAt) return;
    this.nextSweepAt = now + SWEEP_INTERVAL_MS;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

export class RedisIdempotencyStore implements IdempotencyStore {
  /**
   * @param getClient - resolves the connected client at call time
   */
  constructor(private readonly getClient: () => Redis) {}

  async tryGet(key: string): Promise<ActionResult | null> {
    const data = await this.getClient().get(KEY_PREFIX + key);
    if (!data) return null;
    return JSON.parse(data);
  }

  async tryPut(key: string, result: ActionResult, ttlSeconds: number): Promise<boolean> {
    const stored = await this.getClient().set(KEY_PREFIX + key, JSON.stringify(result), 'EX', ttlSeconds, 'NX');
    return stored === 'OK';
  }
}
