/**
 * Redis Storage Implementation
 *
 * Implements GameStorage using Redis for shared access across server
 * instances. The turn guard is a separate key taken with SET NX PX, so a
 * guard left behind by an abandoned request expires on its own.
 */

import type { Redis } from 'ioredis';
import { nanoid } from 'nanoid';
import type { GameId, GameState, GameStatus } from '../../shared/game/types.js';
import { TransactionClosedError } from '../engine/errors.js';
import type { ActionTransaction, GameMetadata, GameStorage, StorageConfig } from './types.js';
import { deserializeGameState, serializeGameState } from './serialization.js';

const DEFAULT_TTL = 86400; // 24 hours
const DEFAULT_TURN_GUARD_TTL_MS = 30000;
const GAMES_INDEX = 'games:index';

const stateKey = (gameId: GameId) => `game:${gameId}:state`;
const guardKey = (gameId: GameId) => `game:${gameId}:turn-guard`;

// Deletes the guard only while it still holds our token.
const RELEASE_GUARD_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0
`;

interface IndexEntry {
  gameId: GameId;
  status: GameStatus;
  turnNo: number;
  participantCount: number;
  updatedAt: string;
}

export class RedisStorage implements GameStorage {
  private client: Redis | null;
  private config: StorageConfig;

  /**
   * @param client - an already-created client to use instead of connecting
   */
  constructor(config: StorageConfig, client?: Redis) {
    this.config = config;
    this.client = client ?? null;
  }

  async connect(): Promise<void> {
    if (this.client) return;

    const { Redis } = await import('ioredis');
    this.client = new Redis(this.config.url || 'redis://localhost:6379');
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }

  getClient(): Redis {
    if (!this.client) {
      throw new Error('Redis not connected. Call connect() first.');
    }
    return this.client;
  }

  private getTtl(): number {
    return this.config.ttl || DEFAULT_TTL;
  }

  private getGuardTtlMs(): number {
    return this.config.turnGuardTtlMs || DEFAULT_TURN_GUARD_TTL_MS;
  }

  // ============================================================================
  // Game Operations
  // ============================================================================

  async saveGame(state: GameState): Promise<void> {
    const client = this.getClient();
    const data = serializeGameState({ ...state, turn: { ...state.turn, turnInProgress: false } });
    await client.set(stateKey(state.gameId), data, 'EX', this.getTtl());

    const entry: IndexEntry = {
      gameId: state.gameId,
      status: state.turn.status,
      turnNo: state.turn.turnNo,
      participantCount: state.participants.length,
      updatedAt: new Date().toISOString(),
    };
    await client.hset(GAMES_INDEX, state.gameId, JSON.stringify(entry));
  }

  async getGame(gameId: GameId): Promise<GameState | null> {
    const client = this.getClient();
    const [data, guarded] = await Promise.all([client.get(stateKey(gameId)), client.exists(guardKey(gameId))]);
    if (!data) return null;

    const state = deserializeGameState(gameId, data);
    return { ...state, turn: { ...state.turn, turnInProgress: guarded > 0 } };
  }

  async deleteGame(gameId: GameId): Promise<void> {
    const client = this.getClient();
    await client.del(stateKey(gameId), guardKey(gameId));
    await client.hdel(GAMES_INDEX, gameId);
  }

  async listGames(status?: GameStatus): Promise<GameMetadata[]> {
    const client = this.getClient();
    const allGames = await client.hgetall(GAMES_INDEX);

    const games: GameMetadata[] = [];
    for (const value of Object.values(allGames)) {
      const entry: IndexEntry = JSON.parse(value);
      if (!status || entry.status === status) {
        games.push({ ...entry, updatedAt: new Date(entry.updatedAt) });
      }
    }

    return games.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  }

  // ============================================================================
  // Turn Guard
  // ============================================================================

  async beginAction(gameId: GameId): Promise<ActionTransaction | null> {
    const client = this.getClient();
    const key = guardKey(gameId);
    const token = nanoid();

    const acquired = await client.set(key, token, 'PX', this.getGuardTtlMs(), 'NX');
    if (acquired !== 'OK') return null;

    let released = false;
    const release = async () => {
      if (released) return;
      released = true;
      await client.eval(RELEASE_GUARD_SCRIPT, 1, key, token);
    };

    let state: GameState | null;
    try {
      state = await this.getGame(gameId);
    } catch (err) {
      await release();
      throw err;
    }
    if (!state) {
      await release();
      return null;
    }

    let rolledBack = false;
    let committed = false;

    return {
      state,
      commit: async (next: GameState) => {
        if (rolledBack) {
          throw new TransactionClosedError(gameId);
        }
        committed = true;
        await this.saveGame(next);
      },
      rollback: async () => {
        if (!committed) rolledBack = true;
      },
      release,
    };
  }
}
