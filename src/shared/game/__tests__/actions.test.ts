import { describe, it, expect } from 'vitest';
import {
  occupiedByOthers,
  validateActingUnit,
  validateAttackCityAction,
  validateAttackUnitAction,
  validateMoveAction,
  validateTurn,
} from '../actions.js';
import { buildGameIndex, definitionOf, tileAt } from '../game-index.js';
import { EngineFaultError } from '../errors.js';
import { ActionErrorKind, GameStatus } from '../types.js';
import { createCity, createTestState, createUnit, tileId } from './fixtures.js';

describe('Action Validation', () => {
  describe('validateTurn', () => {
    it('should accept the active participant', () => {
      expect(validateTurn(createTestState(), 1)).toEqual({ valid: true });
    });

    it('should reject anyone else', () => {
      expect(validateTurn(createTestState(), 2)).toEqual({
        valid: false,
        errorKind: ActionErrorKind.NotPlayerTurn,
        error: "It is not participant 2's turn",
      });
    });

    it('should reject every actor in a finished game', () => {
      const state = createTestState({ turn: { status: GameStatus.Finished, activeParticipantId: null } });
      expect(validateTurn(state, 1)).toMatchObject({ valid: false, error: 'Game is not active' });
    });
  });

  describe('validateActingUnit', () => {
    it('should resolve the unit definition and tile', () => {
      const state = createTestState({ units: [createUnit(1, 1, 'slinger', [3, 4])] });
      const result = validateActingUnit(buildGameIndex(state), 1, 1);

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.definition.code).toBe('slinger');
        expect(result.tile).toMatchObject({ id: tileId(3, 4), row: 3, col: 4 });
      }
    });

    it('should reject a missing unit', () => {
      const result = validateActingUnit(buildGameIndex(createTestState()), 1, 7);
      expect(result).toEqual({ valid: false, errorKind: ActionErrorKind.InvalidTarget, error: 'Unit 7 not found' });
    });
  });

  describe('occupiedByOthers', () => {
    const state = createTestState({
      units: [createUnit(1, 1, 'warrior', [2, 2]), createUnit(2, 2, 'warrior', [2, 3])],
    });
    const isBlocked = occupiedByOthers(buildGameIndex(state), 1);

    it('should leave the mover tile and empty tiles passable', () => {
      expect(isBlocked({ row: 2, col: 2 })).toBe(false);
      expect(isBlocked({ row: 4, col: 4 })).toBe(false);
    });

    it('should block tiles held by other units', () => {
      expect(isBlocked({ row: 2, col: 3 })).toBe(true);
    });

    it('should block positions without a tile', () => {
      expect(isBlocked({ row: 9, col: 9 })).toBe(true);
    });
  });

  describe('validateMoveAction', () => {
    it('should return the path and destination tile', () => {
      const state = createTestState({ units: [createUnit(1, 1, 'warrior', [2, 2])] });
      const result = validateMoveAction(state, buildGameIndex(state), {
        kind: 'move',
        actorParticipantId: 1,
        unitId: 1,
        destination: { row: 2, col: 4 },
      });

      expect(result.valid).toBe(true);
      if (result.valid) {
        expect(result.destination.id).toBe(tileId(2, 4));
        expect(result.path).toEqual([
          { row: 2, col: 2 },
          { row: 2, col: 3 },
          { row: 2, col: 4 },
        ]);
      }
    });

    it('should name the occupant of a taken destination', () => {
      const state = createTestState({
        units: [createUnit(1, 1, 'warrior', [2, 2]), createUnit(4, 2, 'warrior', [2, 3])],
      });
      const result = validateMoveAction(state, buildGameIndex(state), {
        kind: 'move',
        actorParticipantId: 1,
        unitId: 1,
        destination: { row: 2, col: 3 },
      });

      expect(result).toEqual({
        valid: false,
        errorKind: ActionErrorKind.InvalidTarget,
        error: 'Destination (2, 3) is occupied by unit 4',
      });
    });
  });

  describe('validateAttackUnitAction', () => {
    it('should report the distance to the target', () => {
      const state = createTestState({
        units: [createUnit(1, 1, 'slinger', [2, 0]), createUnit(2, 2, 'warrior', [2, 3])],
      });
      const result = validateAttackUnitAction(buildGameIndex(state), {
        kind: 'attack-unit',
        actorParticipantId: 1,
        unitId: 1,
        targetUnitId: 2,
      });

      expect(result).toMatchObject({ valid: true, distance: 3 });
    });

    it('should explain an out of range target', () => {
      const state = createTestState({
        units: [createUnit(1, 1, 'warrior', [0, 0]), createUnit(2, 2, 'warrior', [0, 4])],
      });
      const result = validateAttackUnitAction(buildGameIndex(state), {
        kind: 'attack-unit',
        actorParticipantId: 1,
        unitId: 1,
        targetUnitId: 2,
      });

      expect(result).toEqual({
        valid: false,
        errorKind: ActionErrorKind.OutOfRange,
        error: 'Target unit 2 is 4 hexes away',
      });
    });
  });

  describe('validateAttackCityAction', () => {
    it('should reject an unknown city', () => {
      const state = createTestState({ units: [createUnit(1, 1, 'warrior', [2, 2])] });
      const result = validateAttackCityAction(buildGameIndex(state), {
        kind: 'attack-city',
        actorParticipantId: 1,
        unitId: 1,
        targetCityId: 9,
      });

      expect(result).toEqual({ valid: false, errorKind: ActionErrorKind.InvalidTarget, error: 'City 9 not found' });
    });

    it('should accept an adjacent enemy city', () => {
      const state = createTestState({
        units: [createUnit(1, 1, 'warrior', [2, 2])],
        cities: [createCity(2, 2, [2, 3])],
      });
      const result = validateAttackCityAction(buildGameIndex(state), {
        kind: 'attack-city',
        actorParticipantId: 1,
        unitId: 1,
        targetCityId: 2,
      });

      expect(result).toMatchObject({ valid: true, distance: 1 });
    });
  });

  describe('buildGameIndex', () => {
    it('should index tiles by position', () => {
      const index = buildGameIndex(createTestState());
      expect(tileAt(index, { row: 5, col: 7 })?.id).toBe(48);
      expect(tileAt(index, { row: 6, col: 0 })).toBeUndefined();
    });

    it('should fault on two units sharing a tile', () => {
      const state = createTestState({
        units: [createUnit(1, 1, 'warrior', [2, 2]), createUnit(2, 2, 'warrior', [2, 2])],
      });
      expect(() => buildGameIndex(state)).toThrow(EngineFaultError);
    });

    it('should fault on a unit off the map', () => {
      const state = createTestState({ units: [createUnit(1, 1, 'warrior', [2, 2], { tileId: 500 })] });
      expect(() => buildGameIndex(state)).toThrow('Unit 1 references missing tile 500');
    });

    it('should fault on an unknown unit type', () => {
      const unit = createUnit(1, 1, 'warrior', [2, 2], { typeCode: 'catapult' });
      const index = buildGameIndex(createTestState({ units: [unit] }));
      expect(() => definitionOf(index, unit)).toThrow("Unit 1 has unknown type 'catapult'");
    });
  });
});
