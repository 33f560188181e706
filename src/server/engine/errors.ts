import type { GameId } from '../../shared/game/types.js';

export { EngineFaultError } from '../../shared/game/errors.js';

export class GameNotFoundError extends Error {
  constructor(readonly gameId: GameId) {
    super(`Game ${gameId} not found`);
    this.name = 'GameNotFoundError';
  }
}

/**
 * Stored game data written under a different schema version than this build
 * reads.
 */
export class SchemaMismatchError extends Error {
  constructor(
    readonly gameId: GameId,
    readonly found: unknown,
    readonly expected: number
  ) {
    super(`Game ${gameId} was stored with schema version ${String(found)}, expected ${expected}`);
    this.name = 'SchemaMismatchError';
  }
}

export class TransactionClosedError extends Error {
  constructor(readonly gameId: GameId) {
    super(`Action on game ${gameId} was rolled back`);
    this.name = 'TransactionClosedError';
  }
}
