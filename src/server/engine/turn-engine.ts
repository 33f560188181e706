/**
 * Turn Engine
 *
 * Runs one action at a time per game. Each action goes through:
 * idempotency lookup -> turn check -> turn guard -> reducer -> commit ->
 * idempotency record. The guard is released on every exit path.
 */

import {
  ActionErrorKind,
  DEFAULT_RULE_SETTINGS,
  type ActionKind,
  type ActionRejection,
  type ActionRequest,
  type GameId,
  type GameState,
  type RuleSettings,
  type UnitId,
} from '../../shared/game/types.js';
import { validateTurn, occupiedByOthers } from '../../shared/game/actions.js';
import { applyAction } from '../../shared/game/state.js';
import { buildGameIndex, definitionOf, tileOf } from '../../shared/game/game-index.js';
import { reachablePositions, type ReachablePosition } from '../../shared/game/pathfinding.js';
import { buildGameStateView, type ActionResult, type GameStateView } from '../../shared/game/projection.js';
import type { ActionTransaction, GameStorage, IdempotencyStore } from '../storage/types.js';
import type { Logger } from '../logger.js';
import { GameNotFoundError } from './errors.js';

const DEFAULT_IDEMPOTENCY_TTL = 3600; // 1 hour

const KEY_PREFIXES: Record<ActionKind, string> = {
  move: 'move-unit',
  'attack-unit': 'attack-unit',
  'attack-city': 'attack-city',
  'end-turn': 'end-turn',
};

/**
 * Composite idempotency key: `{action-kind}:{game-id}:{token}`
 */
export function idempotencyKey(kind: ActionKind, gameId: GameId, token: string): string {
  return `${KEY_PREFIXES[kind]}:${gameId}:${token}`;
}

export interface TurnEngineOptions {
  storage: GameStorage;
  idempotency: IdempotencyStore;
  logger: Logger;
  rules?: RuleSettings;
  idempotencyTtlSeconds?: number;
  clock?: () => Date;
}

export class TurnEngine {
  private readonly storage: GameStorage;
  private readonly idempotency: IdempotencyStore;
  private readonly logger: Logger;
  private readonly rules: RuleSettings;
  private readonly idempotencyTtl: number;
  private readonly clock: () => Date;

  constructor(options: TurnEngineOptions) {
    this.storage = options.storage;
    this.idempotency = options.idempotency;
    this.logger = options.logger.child({ component: 'turn-engine' });
    this.rules = options.rules ?? DEFAULT_RULE_SETTINGS;
    this.idempotencyTtl = options.idempotencyTtlSeconds ?? DEFAULT_IDEMPOTENCY_TTL;
    this.clock = options.clock ?? (() => new Date());
  }

  // ============================================================================
  // Actions
  // ============================================================================

  /**
   * Execute an action request against a game.
   *
   * Rule violations resolve as `{ ok: false }` results. A missing game throws
   * GameNotFoundError; storage failures and corrupted state propagate.
   */
  async execute(gameId: GameId, request: ActionRequest): Promise<ActionResult> {
    const key = request.idempotencyToken ? idempotencyKey(request.kind, gameId, request.idempotencyToken) : null;

    if (key) {
      const cached = await this.idempotency.tryGet(key);
      if (cached) {
        this.logger.info({ gameId, kind: request.kind, key }, 'Replaying stored action result');
        return cached;
      }
    }

    const snapshot = await this.storage.getGame(gameId);
    if (!snapshot) {
      throw new GameNotFoundError(gameId);
    }

    const turnCheck = validateTurn(snapshot, request.actorParticipantId);
    if (!turnCheck.valid) {
      return this.reject(gameId, request, turnCheck.errorKind, turnCheck.error);
    }
    if (snapshot.turn.turnInProgress) {
      return this.reject(gameId, request, ActionErrorKind.TurnBusy, 'Another action is in progress for this game');
    }

    return this.withTurnGuard(gameId, request, (tx) => this.runGuarded(gameId, request, key, tx));
  }

  /**
   * Hold the game's turn guard for the duration of `fn`. Resolves TurnBusy when
   * another action already holds it.
   */
  private async withTurnGuard(
    gameId: GameId,
    request: ActionRequest,
    fn: (tx: ActionTransaction) => Promise<ActionResult>
  ): Promise<ActionResult> {
    const tx = await this.storage.beginAction(gameId);
    if (!tx) {
      return this.reject(gameId, request, ActionErrorKind.TurnBusy, 'Another action is in progress for this game');
    }

    try {
      return await fn(tx);
    } catch (err) {
      this.logger.error({ err, gameId, kind: request.kind }, 'Action failed');
      await tx.rollback();
      throw err;
    } finally {
      await tx.release();
    }
  }

  private async runGuarded(
    gameId: GameId,
    request: ActionRequest,
    key: string | null,
    tx: ActionTransaction
  ): Promise<ActionResult> {
    // A retry of this action may have committed while we waited for the guard.
    if (key) {
      const cached = await this.idempotency.tryGet(key);
      if (cached) {
        await tx.rollback();
        return cached;
      }
    }

    const transition = applyAction(tx.state, request, { rules: this.rules, now: this.clock() });
    if (!transition.ok) {
      await tx.rollback();
      return this.reject(gameId, request, transition.errorKind, transition.message);
    }

    const next: GameState = { ...transition.state, turn: { ...transition.state.turn, turnInProgress: false } };
    await tx.commit(next);

    const result: ActionResult =
      transition.turnSummary === undefined
        ? { ok: true, state: buildGameStateView(next) }
        : { ok: true, state: buildGameStateView(next), turnSummary: transition.turnSummary };

    if (key) {
      const existing = await this.record(gameId, key, result);
      if (existing) return existing;
    }

    this.logger.info(
      { gameId, kind: request.kind, unitId: 'unitId' in request ? request.unitId : undefined, turnNo: next.turn.turnNo },
      'Action committed'
    );
    return result;
  }

  /**
   * Store a committed result under its idempotency key. Resolves the value a
   * concurrent retry stored first, if any. The state is already committed, so
   * a failing store is logged and the caller's result stands.
   */
  private async record(gameId: GameId, key: string, result: ActionResult): Promise<ActionResult | null> {
    try {
      if (await this.idempotency.tryPut(key, result, this.idempotencyTtl)) return null;
      return await this.idempotency.tryGet(key);
    } catch (err) {
      this.logger.warn({ err, gameId, key }, 'Failed to record action result');
      return null;
    }
  }

  private reject(gameId: GameId, request: ActionRequest, errorKind: ActionErrorKind, message: string): ActionRejection {
    this.logger.warn(
      { gameId, kind: request.kind, unitId: 'unitId' in request ? request.unitId : undefined, errorKind },
      message
    );
    return { ok: false, errorKind, message };
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async getState(gameId: GameId): Promise<GameStateView> {
    const state = await this.storage.getGame(gameId);
    if (!state) {
      throw new GameNotFoundError(gameId);
    }
    return buildGameStateView(state);
  }

  /**
   * Hexes a unit could move to right now, ignoring whether it has acted.
   * Resolves null when the unit does not exist.
   */
  async previewMoves(gameId: GameId, unitId: UnitId): Promise<ReachablePosition[] | null> {
    const state = await this.storage.getGame(gameId);
    if (!state) {
      throw new GameNotFoundError(gameId);
    }

    const index = buildGameIndex(state);
    const unit = index.unitsById.get(unitId);
    if (!unit) return null;

    const { width, height } = state.map;
    return reachablePositions(
      tileOf(index, unit.tileId),
      definitionOf(index, unit).movePoints,
      width,
      height,
      occupiedByOthers(index, unit.id)
    );
  }
}
