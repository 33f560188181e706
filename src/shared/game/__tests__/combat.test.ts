import { describe, it, expect } from 'vitest';
import {
  computeDamage,
  isInAttackRange,
  canCounterattack,
  resolveUnitAttack,
  resolveCityAttack,
  type Combatant,
} from '../combat.js';
import { BUILT_IN_UNIT_DEFINITIONS, type UnitDefinition } from '../types.js';

function definition(code: string): UnitDefinition {
  const found = BUILT_IN_UNIT_DEFINITIONS.find((d) => d.code === code);
  if (!found) throw new Error(`missing definition ${code}`);
  return found;
}

const warrior = definition('warrior');
const slinger = definition('slinger');

function combatant(def: UnitDefinition, hp: number = def.health): Combatant {
  return { definition: def, hp };
}

describe('Combat System', () => {
  describe('computeDamage', () => {
    it('should deal attack-sized damage between equal stats at full health', () => {
      expect(computeDamage(20, 10, 100, 100, 100, 100)).toBe(20);
    });

    it('should reward attack above defence', () => {
      expect(computeDamage(20, 8, 100, 100, 60, 60)).toBe(25);
    });

    it('should scale attack with attacker health', () => {
      expect(computeDamage(20, 10, 50, 100, 100, 100)).toBe(5);
    });

    it('should round halves away from zero', () => {
      expect(computeDamage(5, 5, 10, 10, 10, 10)).toBe(3);
    });

    it('should never deal less than 1 damage', () => {
      expect(computeDamage(1, 50, 100, 100, 100, 100)).toBe(1);
      expect(computeDamage(20, 10, 0, 100, 100, 100)).toBe(1);
    });

    it('should treat zero defence as 1', () => {
      expect(computeDamage(10, 0, 100, 100, 100, 100)).toBe(50);
    });

    it('should be deterministic', () => {
      const results = Array.from({ length: 5 }, () => computeDamage(20, 10, 73, 100, 41, 100));
      expect(new Set(results).size).toBe(1);
      expect(results[0]).toBeGreaterThanOrEqual(1);
    });
  });

  describe('isInAttackRange', () => {
    it('should limit melee units to adjacent hexes', () => {
      expect(isInAttackRange(warrior, 0)).toBe(false);
      expect(isInAttackRange(warrior, 1)).toBe(true);
      expect(isInAttackRange(warrior, 2)).toBe(false);
    });

    it('should use the ranged band for ranged units', () => {
      expect(isInAttackRange(slinger, 1)).toBe(false);
      expect(isInAttackRange(slinger, 2)).toBe(true);
      expect(isInAttackRange(slinger, 3)).toBe(true);
      expect(isInAttackRange(slinger, 4)).toBe(false);
    });
  });

  describe('canCounterattack', () => {
    it('should require both sides to be melee', () => {
      expect(canCounterattack(warrior, warrior)).toBe(true);
      expect(canCounterattack(warrior, slinger)).toBe(false);
      expect(canCounterattack(slinger, warrior)).toBe(false);
      expect(canCounterattack(slinger, slinger)).toBe(false);
    });
  });

  describe('resolveUnitAttack', () => {
    it('should not counter when a warrior hits a slinger', () => {
      const outcome = resolveUnitAttack(combatant(warrior), combatant(slinger));

      expect(outcome).toEqual({
        attackerDamage: 25,
        counterDamage: null,
        attackerHp: 100,
        defenderHp: 35,
        attackerDestroyed: false,
        defenderDestroyed: false,
      });
    });

    it('should counter between two warriors', () => {
      const outcome = resolveUnitAttack(combatant(warrior), combatant(warrior));

      expect(outcome.attackerDamage).toBe(20);
      expect(outcome.defenderHp).toBe(80);
      expect(outcome.counterDamage).toBe(13);
      expect(outcome.attackerHp).toBe(87);
    });

    it('should compute the counter from the defender reduced health', () => {
      const outcome = resolveUnitAttack(combatant(warrior), combatant(warrior, 90));

      expect(outcome.attackerDamage).toBe(22);
      expect(outcome.defenderHp).toBe(68);
      expect(outcome.counterDamage).toBe(9);
      expect(outcome.attackerHp).toBe(91);
    });

    it('should never counter a ranged attacker', () => {
      const outcome = resolveUnitAttack(combatant(slinger), combatant(warrior));

      expect(outcome.attackerDamage).toBe(11);
      expect(outcome.defenderHp).toBe(89);
      expect(outcome.counterDamage).toBeNull();
      expect(outcome.attackerHp).toBe(60);
    });

    it('should clamp a destroyed defender at 0 and skip the counter', () => {
      const outcome = resolveUnitAttack(combatant(warrior), combatant(warrior, 15));

      expect(outcome.defenderHp).toBe(0);
      expect(outcome.defenderDestroyed).toBe(true);
      expect(outcome.counterDamage).toBeNull();
      expect(outcome.attackerHp).toBe(100);
    });

    it('should let a counter destroy a weakened attacker', () => {
      const outcome = resolveUnitAttack(combatant(warrior, 5), combatant(warrior));

      expect(outcome.attackerDamage).toBe(1);
      expect(outcome.defenderHp).toBe(99);
      expect(outcome.attackerHp).toBe(0);
      expect(outcome.attackerDestroyed).toBe(true);
    });

    it('should not mutate its inputs', () => {
      const attacker = combatant(warrior);
      const defender = combatant(warrior);
      resolveUnitAttack(attacker, defender);

      expect(attacker.hp).toBe(100);
      expect(defender.hp).toBe(100);
    });
  });

  describe('resolveCityAttack', () => {
    it('should damage a half-health city with attack 25', () => {
      const attacker: UnitDefinition = { ...warrior, code: 'champion', attack: 25 };

      const outcome = resolveCityAttack(combatant(attacker), { hp: 50, maxHp: 100 });

      expect(outcome).toEqual({ damage: 42, cityHp: 8, cityDefeated: false });
    });

    it('should use city defence 15 by default', () => {
      expect(resolveCityAttack(combatant(warrior), { hp: 100, maxHp: 100 }).damage).toBe(13);
    });

    it('should defeat a city at 0 hp', () => {
      const outcome = resolveCityAttack(combatant(warrior), { hp: 5, maxHp: 100 });

      expect(outcome.cityHp).toBe(0);
      expect(outcome.cityDefeated).toBe(true);
    });
  });
});
