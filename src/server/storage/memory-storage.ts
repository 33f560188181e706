/**
 * In-Memory Storage Implementation
 *
 * Implements GameStorage using in-memory Maps for development and testing.
 * No persistence - data is lost on server restart.
 *
 * The turn guard is the stored `turnInProgress` flag. Checking and setting it
 * happens without an intervening await, so it behaves as a compare-and-set.
 */

import type { GameId, GameState, GameStatus } from '../../shared/game/types.js';
import { TransactionClosedError } from '../engine/errors.js';
import type { ActionTransaction, GameMetadata, GameStorage } from './types.js';
import { deserializeGameState, serializeGameState } from './serialization.js';

interface StoredGame {
  data: string;
  turnInProgress: boolean;
  updatedAt: Date;
}

export class MemoryStorage implements GameStorage {
  private games: Map<GameId, StoredGame> = new Map();
  private connected: boolean = false;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.games.clear();
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // ============================================================================
  // Game Operations
  // ============================================================================

  async saveGame(state: GameState): Promise<void> {
    const existing = this.games.get(state.gameId);
    this.write(state, existing?.turnInProgress ?? false);
  }

  async getGame(gameId: GameId): Promise<GameState | null> {
    const stored = this.games.get(gameId);
    if (!stored) return null;
    return this.read(gameId, stored);
  }

  async deleteGame(gameId: GameId): Promise<void> {
    this.games.delete(gameId);
  }

  async listGames(status?: GameStatus): Promise<GameMetadata[]> {
    const games: GameMetadata[] = [];

    for (const [gameId, stored] of this.games) {
      const state = this.read(gameId, stored);
      if (!status || state.turn.status === status) {
        games.push({
          gameId,
          status: state.turn.status,
          turnNo: state.turn.turnNo,
          participantCount: state.participants.length,
          updatedAt: new Date(stored.updatedAt),
        });
      }
    }

    return games.sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime());
  }

  // ============================================================================
  // Turn Guard
  // ============================================================================

  async beginAction(gameId: GameId): Promise<ActionTransaction | null> {
    const stored = this.games.get(gameId);
    if (!stored || stored.turnInProgress) return null;
    stored.turnInProgress = true;

    const state = this.read(gameId, stored);
    let rolledBack = false;
    let committed = false;
    let released = false;

    return {
      state,
      commit: async (next: GameState) => {
        if (rolledBack) {
          throw new TransactionClosedError(gameId);
        }
        committed = true;
        this.write(next, true);
      },
      rollback: async () => {
        if (!committed) rolledBack = true;
      },
      release: async () => {
        if (released) return;
        released = true;
        const current = this.games.get(gameId);
        if (current) current.turnInProgress = false;
      },
    };
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private write(state: GameState, turnInProgress: boolean): void {
    const data = serializeGameState({ ...state, turn: { ...state.turn, turnInProgress: false } });
    this.games.set(state.gameId, { data, turnInProgress, updatedAt: new Date() });
  }

  private read(gameId: GameId, stored: StoredGame): GameState {
    const state = deserializeGameState(gameId, stored.data);
    return { ...state, turn: { ...state.turn, turnInProgress: stored.turnInProgress } };
  }
}
