/**
 * Combat Resolution
 *
 * Deterministic damage for unit-vs-unit and unit-vs-city attacks. Pure
 * calculators: ownership, range and existence are checked by the caller.
 */

import type { UnitDefinition } from './types.js';
import { GAME_CONSTANTS } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface Combatant {
  definition: UnitDefinition;
  hp: number;
}

export interface CityTarget {
  hp: number;
  maxHp: number;
}

export interface UnitAttackOutcome {
  attackerDamage: number;
  /** null when no counterattack happened */
  counterDamage: number | null;
  attackerHp: number;
  defenderHp: number;
  attackerDestroyed: boolean;
  defenderDestroyed: boolean;
}

export interface CityAttackOutcome {
  damage: number;
  cityHp: number;
  cityDefeated: boolean;
}

// ============================================================================
// Damage Formula
// ============================================================================

function healthRatio(hp: number, maxHp: number): number {
  if (maxHp <= 0) return 1;
  return Math.min(1, Math.max(0, hp / maxHp));
}

function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value)) || 0;
}

/**
 * Damage dealt by one hit. Both stats scale with their side's health ratio;
 * the result is never below 1.
 */
export function computeDamage(
  attack: number,
  defence: number,
  attackerHp: number,
  attackerMaxHp: number,
  defenderHp: number,
  defenderMaxHp: number
): number {
  const atk = attack * healthRatio(attackerHp, attackerMaxHp);
  let def = defence * healthRatio(defenderHp, defenderMaxHp);
  if (def <= 0) def = 1;

  const raw = atk * (1 + (atk - def) / def) * 0.5;
  return Math.max(1, roundHalfAwayFromZero(raw));
}

// ============================================================================
// Range
// ============================================================================

/**
 * Melee units strike adjacent hexes only; ranged units strike within
 * [rangeMin, rangeMax].
 */
export function isInAttackRange(definition: UnitDefinition, distance: number): boolean {
  if (!definition.isRanged) return distance === 1;
  return distance >= definition.rangeMin && distance <= definition.rangeMax;
}

/**
 * A counterattack needs both sides to be melee.
 */
export function canCounterattack(attacker: UnitDefinition, defender: UnitDefinition): boolean {
  return !attacker.isRanged && !defender.isRanged;
}

// ============================================================================
// Resolution
// ============================================================================

export function resolveUnitAttack(attacker: Combatant, defender: Combatant): UnitAttackOutcome {
  const attackerDamage = computeDamage(
    attacker.definition.attack,
    defender.definition.defence,
    attacker.hp,
    attacker.definition.health,
    defender.hp,
    defender.definition.health
  );
  const defenderHp = Math.max(0, defender.hp - attackerDamage);

  let counterDamage: number | null = null;
  let attackerHp = attacker.hp;

  if (defenderHp > 0 && canCounterattack(attacker.definition, defender.definition)) {
    // The defender hits back at its reduced strength.
    counterDamage = computeDamage(
      defender.definition.attack,
      attacker.definition.defence,
      defenderHp,
      defender.definition.health,
      attacker.hp,
      attacker.definition.health
    );
    attackerHp = Math.max(0, attacker.hp - counterDamage);
  }

  return {
    attackerDamage,
    counterDamage,
    attackerHp,
    defenderHp,
    attackerDestroyed: attackerHp <= 0,
    defenderDestroyed: defenderHp <= 0,
  };
}

/**
 * Cities never counterattack.
 */
export function resolveCityAttack(
  attacker: Combatant,
  city: CityTarget,
  cityDefence: number = GAME_CONSTANTS.CITY_DEFENCE
): CityAttackOutcome {
  const damage = computeDamage(
    attacker.definition.attack,
    cityDefence,
    attacker.hp,
    attacker.definition.health,
    city.hp,
    city.maxHp
  );
  const cityHp = Math.max(0, city.hp - damage);

  return {
    damage,
    cityHp,
    cityDefeated: cityHp <= 0,
  };
}
