import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import RedisMock from 'ioredis-mock';
import type { Redis } from 'ioredis';
import { RedisStorage } from '../storage/redis-storage.js';
import { RedisIdempotencyStore } from '../storage/idempotency-store.js';
import { createIdempotencyStore } from '../storage/index.js';
import { EngineFaultError, SchemaMismatchError, TransactionClosedError } from '../engine/errors.js';
import { ActionErrorKind, GameStatus, type GameState } from '../../shared/game/types.js';
import type { ActionResult } from '../../shared/game/projection.js';
import { createTestState, createUnit } from '../../shared/game/__tests__/fixtures.js';

function game(gameId: string, overrides: Partial<GameState> = {}): GameState {
  return { ...createTestState({ units: [createUnit(1, 1, 'warrior', [2, 2])] }), gameId, ...overrides };
}

describe('RedisStorage', () => {
  let client: Redis;
  let storage: RedisStorage;

  beforeEach(async () => {
    client = new RedisMock();
    await client.flushall();
    storage = new RedisStorage({ type: 'redis', ttl: 600, turnGuardTtlMs: 5000 }, client);
  });

  afterEach(async () => {
    await client.flushall();
    client.disconnect();
  });

  describe('Game Operations', () => {
    it('should save and load a game', async () => {
      const state = game('g1');
      await storage.saveGame(state);

      expect(await storage.getGame('g1')).toEqual(state);
    });

    it('should set the state key expiry', async () => {
      await storage.saveGame(game('g1'));

      const ttl = await client.ttl('game:g1:state');
      expect(ttl).toBeGreaterThan(0);
      expect(ttl).toBeLessThanOrEqual(600);
    });

    it('should return null for a missing game', async () => {
      expect(await storage.getGame('nope')).toBeNull();
    });

    it('should reject data from another schema version', async () => {
      await client.set('game:g1:state', JSON.stringify({ schemaVersion: 99 }));

      await expect(storage.getGame('g1')).rejects.toBeInstanceOf(SchemaMismatchError);
    });

    it('should fault on a stored game of the right version but the wrong shape', async () => {
      await client.set('game:g1:state', JSON.stringify({ ...game('g1'), units: [{ id: 'one' }] }));

      await expect(storage.getGame('g1')).rejects.toBeInstanceOf(EngineFaultError);
    });

    it('should list games filtered by status', async () => {
      await storage.saveGame(game('g1'));
      await storage.saveGame(
        game('g2', { turn: { turnNo: 9, activeParticipantId: null, turnInProgress: false, status: GameStatus.Finished } })
      );

      const all = await storage.listGames();
      const finished = await storage.listGames(GameStatus.Finished);

      expect(all.map((g) => g.gameId).sort()).toEqual(['g1', 'g2']);
      expect(finished).toHaveLength(1);
      expect(finished[0]).toMatchObject({ gameId: 'g2', status: GameStatus.Finished, turnNo: 9, participantCount: 2 });
      expect(finished[0].updatedAt).toBeInstanceOf(Date);
    });

    it('should delete a game and its index entry', async () => {
      await storage.saveGame(game('g1'));
      await storage.deleteGame('g1');

      expect(await storage.getGame('g1')).toBeNull();
      expect(await storage.listGames()).toEqual([]);
    });
  });

  describe('Turn Guard', () => {
    beforeEach(async () => {
      await storage.saveGame(game('g1'));
    });

    it('should hand out the guard once', async () => {
      const tx = await storage.beginAction('g1');

      expect(tx?.state.gameId).toBe('g1');
      expect(await storage.beginAction('g1')).toBeNull();
      expect((await storage.getGame('g1'))?.turn.turnInProgress).toBe(true);

      await tx?.release();
      expect((await storage.getGame('g1'))?.turn.turnInProgress).toBe(false);
    });

    it('should expire an abandoned guard', async () => {
      await storage.beginAction('g1');

      const pttl = await client.pttl('game:g1:turn-guard');
      expect(pttl).toBeGreaterThan(0);
      expect(pttl).toBeLessThanOrEqual(5000);
    });

    it('should persist a commit without the busy flag', async () => {
      const tx = await storage.beginAction('g1');
      if (!tx) throw new Error('guard not acquired');

      await tx.commit({ ...tx.state, turn: { ...tx.state.turn, turnNo: 2 } });
      await tx.release();

      const stored = await storage.getGame('g1');
      expect(stored?.turn).toMatchObject({ turnNo: 2, turnInProgress: false });
      const raw = await client.get('game:g1:state');
      expect(raw && JSON.parse(raw).turn.turnInProgress).toBe(false);
    });

    it('should not clear a guard taken over by another holder', async () => {
      const tx = await storage.beginAction('g1');
      await client.set('game:g1:turn-guard', 'someone-else');

      await tx?.release();

      expect(await client.get('game:g1:turn-guard')).toBe('someone-else');
    });

    it('should clear its own guard with a compare-and-delete', async () => {
      const tx = await storage.beginAction('g1');
      const token = await client.get('game:g1:turn-guard');

      await tx?.release();

      expect(token).toMatch(/^[A-Za-z0-9_-]{21}$/);
      expect(await client.exists('game:g1:turn-guard')).toBe(0);
    });

    it('should refuse a commit after rollback', async () => {
      const tx = await storage.beginAction('g1');
      if (!tx) throw new Error('guard not acquired');

      await tx.rollback();
      await expect(tx.commit({ ...tx.state, turn: { ...tx.state.turn, turnNo: 2 } })).rejects.toBeInstanceOf(
        TransactionClosedError
      );
      await tx.release();

      expect((await storage.getGame('g1'))?.turn.turnNo).toBe(1);
    });

    it('should tolerate repeated release', async () => {
      const tx = await storage.beginAction('g1');
      await tx?.release();
      const next = await storage.beginAction('g1');

      await tx?.release();

      expect(next).not.toBeNull();
      expect(await client.exists('game:g1:turn-guard')).toBe(1);
    });

    it('should not leave a guard behind for a missing game', async () => {
      expect(await storage.beginAction('nope')).toBeNull();
      expect(await client.exists('game:nope:turn-guard')).toBe(0);
    });
  });
});

describe('RedisIdempotencyStore', () => {
  let client: Redis;
  let store: RedisIdempotencyStore;

  const result: ActionResult = { ok: false, errorKind: ActionErrorKind.OutOfRange, message: 'too far' };
  const other: ActionResult = { ok: false, errorKind: ActionErrorKind.InvalidTarget, message: 'other' };

  beforeEach(async () => {
    client = new RedisMock();
    await client.flushall();
    store = new RedisIdempotencyStore(() => client);
  });

  afterEach(async () => {
    await client.flushall();
    client.disconnect();
  });

  it('should insert once and keep the first value', async () => {
    expect(await store.tryPut('move-unit:g1:tok', result, 60)).toBe(true);
    expect(await store.tryPut('move-unit:g1:tok', other, 60)).toBe(false);

    expect(await store.tryGet('move-unit:g1:tok')).toEqual(result);
  });

  it('should store under a prefixed key with a ttl', async () => {
    await store.tryPut('move-unit:g1:tok', result, 60);

    const ttl = await client.ttl('idempotency:move-unit:g1:tok');
    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(60);
  });

  it('should return null for an unknown key', async () => {
    expect(await store.tryGet('end-turn:g1:none')).toBeNull();
  });

  it('should be chosen for a Redis backend', () => {
    const storage = new RedisStorage({ type: 'redis' }, client);
    expect(createIdempotencyStore(storage)).toBeInstanceOf(RedisIdempotencyStore);
  });
});
