/**
 * Abstract Storage Types
 *
 * Persistence and idempotency collaborators of the turn engine. Each has an
 * in-memory and a Redis implementation.
 */

import type { GameId, GameState, GameStatus } from '../../shared/game/types.js';
import type { ActionResult } from '../../shared/game/projection.js';

/**
 * Game metadata for listing
 */
export interface GameMetadata {
  gameId: GameId;
  status: GameStatus;
  turnNo: number;
  participantCount: number;
  updatedAt: Date;
}

/**
 * One action's hold on a game's turn guard.
 *
 * `state` is a private working copy. `commit` persists a successor state and
 * `release` clears the guard. `rollback` closes the transaction without
 * writing: a later `commit` rejects, and a rollback after a commit changes
 * nothing. `release` is safe to call more than once.
 */
export interface ActionTransaction {
  readonly state: GameState;
  commit(next: GameState): Promise<void>;
  rollback(): Promise<void>;
  release(): Promise<void>;
}

/**
 * Abstract storage interface for game persistence
 */
export interface GameStorage {
  // Connection lifecycle
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  // Game operations
  saveGame(state: GameState): Promise<void>;
  getGame(gameId: GameId): Promise<GameState | null>;
  deleteGame(gameId: GameId): Promise<void>;
  listGames(status?: GameStatus): Promise<GameMetadata[]>;

  /**
   * Take the game's turn guard. Resolves null when another action holds it or
   * the game does not exist.
   */
  beginAction(gameId: GameId): Promise<ActionTransaction | null>;
}

/**
 * Write-once store of committed action results.
 */
export interface IdempotencyStore {
  tryGet(key: string): Promise<ActionResult | null>;
  /**
   * Insert if absent. Resolves false, leaving the stored value alone, when the
   * key already exists.
   */
  tryPut(key: string, result: ActionResult, ttlSeconds: number): Promise<boolean>;
}

/**
 * Storage configuration options
 */
export interface StorageConfig {
  type: 'redis' | 'memory';
  url?: string;
  ttl?: number; // Default TTL for stored games in seconds
  turnGuardTtlMs?: number;
}
