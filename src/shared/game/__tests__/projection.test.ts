import { describe, it, expect } from 'vitest';
import { buildGameStateView } from '../projection.js';
import { GameStatus } from '../types.js';
import { createCity, createResources, createTestState, createUnit } from './fixtures.js';

describe('buildGameStateView', () => {
  const state = createTestState({
    units: [createUnit(7, 2, 'slinger', [4, 5], { hp: 42 }), createUnit(3, 1, 'warrior', [1, 1], { hasActed: true })],
    cities: [createCity(2, 2, [5, 6]), createCity(1, 1, [0, 0], { hp: 61, resources: createResources({ wood: 7 }) })],
  });

  it('should describe the turn and map', () => {
    const view = buildGameStateView(state);

    expect(view.game).toEqual({
      id: 'test-game',
      turnNo: 1,
      activeParticipantId: 1,
      turnInProgress: false,
      status: GameStatus.Active,
    });
    expect(view.map).toEqual({ code: 'test', width: 8, height: 6 });
  });

  it('should resolve positions and sort units and cities by id', () => {
    const view = buildGameStateView(state);

    expect(view.units).toEqual([
      { id: 3, participantId: 1, typeCode: 'warrior', hp: 100, hasActed: true, row: 1, col: 1 },
      { id: 7, participantId: 2, typeCode: 'slinger', hp: 42, hasActed: false, row: 4, col: 5 },
    ]);
    expect(view.cities).toEqual([
      { id: 1, participantId: 1, hp: 61, maxHp: 100, row: 0, col: 0, resources: createResources({ wood: 7 }) },
      { id: 2, participantId: 2, hp: 100, maxHp: 100, row: 5, col: 6, resources: createResources() },
    ]);
  });

  it('should list unit definitions by code', () => {
    expect(buildGameStateView(state).unitDefinitions.map((d) => d.code)).toEqual(['slinger', 'warrior']);
  });

  it('should give equal views for equal states', () => {
    const copy = JSON.parse(JSON.stringify(state));
    expect(JSON.stringify(buildGameStateView(copy))).toBe(JSON.stringify(buildGameStateView(state)));
  });
});
