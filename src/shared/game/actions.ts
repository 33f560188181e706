/**
 * Action Validation
 *
 * Turn, ownership, range and movement checks for each action kind. Validators
 * never modify the state; the reducers in state.ts apply what they approve.
 */

import {
  ActionErrorKind,
  GameStatus,
  type ActionRejection,
  type AttackCityRequest,
  type AttackUnitRequest,
  type City,
  type GameState,
  type GridPosition,
  type MoveRequest,
  type ParticipantId,
  type Tile,
  type Unit,
  type UnitDefinition,
  type UnitId,
} from './types.js';
import { gridDistance, isInBounds } from './hex.js';
import { findPath } from './pathfinding.js';
import { isInAttackRange } from './combat.js';
import { definitionOf, tileAt, tileOf, type GameIndex } from './game-index.js';

// ============================================================================
// Result Types
// ============================================================================

export type ValidationResult<T> = ({ valid: true } & T) | { valid: false; errorKind: ActionErrorKind; error: string };

type Invalid = Extract<ValidationResult<object>, { valid: false }>;

function invalid(errorKind: ActionErrorKind, error: string): Invalid {
  return { valid: false, errorKind, error };
}

export function toRejection(result: Invalid): ActionRejection {
  return { ok: false, errorKind: result.errorKind, message: result.error };
}

export interface ActingUnit {
  unit: Unit;
  definition: UnitDefinition;
  tile: Tile;
}

export interface ValidatedMove extends ActingUnit {
  destination: Tile;
  path: GridPosition[];
}

export interface ValidatedUnitAttack extends ActingUnit {
  target: Unit;
  targetDefinition: UnitDefinition;
  distance: number;
}

export interface ValidatedCityAttack extends ActingUnit {
  city: City;
  distance: number;
}

// ============================================================================
// Turn Validation
// ============================================================================

/**
 * The game must be active and the actor must hold the turn.
 */
export function validateTurn(state: GameState, actorParticipantId: ParticipantId): ValidationResult<object> {
  if (state.turn.status !== GameStatus.Active) {
    return invalid(ActionErrorKind.NotPlayerTurn, 'Game is not active');
  }
  if (state.turn.activeParticipantId !== actorParticipantId) {
    return invalid(ActionErrorKind.NotPlayerTurn, `It is not participant ${actorParticipantId}'s turn`);
  }
  return { valid: true };
}

// ============================================================================
// Unit Validation
// ============================================================================

/**
 * The unit must exist, belong to the actor and not have acted this turn.
 */
export function validateActingUnit(
  index: GameIndex,
  actorParticipantId: ParticipantId,
  unitId: UnitId
): ValidationResult<ActingUnit> {
  const unit = index.unitsById.get(unitId);
  if (!unit) {
    return invalid(ActionErrorKind.InvalidTarget, `Unit ${unitId} not found`);
  }
  if (unit.participantId !== actorParticipantId) {
    return invalid(ActionErrorKind.InvalidTarget, `Unit ${unitId} does not belong to participant ${actorParticipantId}`);
  }
  if (unit.hasActed) {
    return invalid(ActionErrorKind.NoActionsLeft, `Unit ${unitId} has already acted this turn`);
  }

  return {
    valid: true,
    unit,
    definition: definitionOf(index, unit),
    tile: tileOf(index, unit.tileId),
  };
}

// ============================================================================
// Move Validation
// ============================================================================

/**
 * Positions holding a unit other than the mover are impassable.
 */
export function occupiedByOthers(index: GameIndex, moverId: UnitId): (pos: GridPosition) => boolean {
  return (pos) => {
    const tile = tileAt(index, pos);
    if (!tile) return true;
    const occupant = index.unitByTile.get(tile.id);
    return occupant !== undefined && occupant.id !== moverId;
  };
}

export function validateMoveAction(
  state: GameState,
  index: GameIndex,
  request: MoveRequest
): ValidationResult<ValidatedMove> {
  const acting = validateActingUnit(index, request.actorParticipantId, request.unitId);
  if (!acting.valid) return acting;

  const { width, height } = state.map;
  const to = request.destination;
  const destination = isInBounds(to, width, height) ? tileAt(index, to) : undefined;
  if (!destination) {
    return invalid(ActionErrorKind.InvalidTarget, `Destination (${to.row}, ${to.col}) is off the map`);
  }

  const occupant = index.unitByTile.get(destination.id);
  if (occupant && occupant.id !== acting.unit.id) {
    return invalid(ActionErrorKind.InvalidTarget, `Destination (${to.row}, ${to.col}) is occupied by unit ${occupant.id}`);
  }

  const isBlocked = occupiedByOthers(index, acting.unit.id);
  const path = findPath(acting.tile, to, acting.definition.movePoints, width, height, isBlocked);
  if (!path) {
    const unbounded = findPath(acting.tile, to, Infinity, width, height, isBlocked);
    if (unbounded) {
      return invalid(
        ActionErrorKind.OutOfRange,
        `Destination is ${unbounded.length - 1} steps away; unit ${acting.unit.id} can move ${acting.definition.movePoints}`
      );
    }
    return invalid(ActionErrorKind.InvalidTarget, `No path to (${to.row}, ${to.col})`);
  }

  return { ...acting, destination, path };
}

// ============================================================================
// Attack Validation
// ============================================================================

export function validateAttackUnitAction(
  index: GameIndex,
  request: AttackUnitRequest
): ValidationResult<ValidatedUnitAttack> {
  const acting = validateActingUnit(index, request.actorParticipantId, request.unitId);
  if (!acting.valid) return acting;

  const target = index.unitsById.get(request.targetUnitId);
  if (!target) {
    return invalid(ActionErrorKind.InvalidTarget, `Target unit ${request.targetUnitId} not found`);
  }
  if (target.participantId === acting.unit.participantId) {
    return invalid(ActionErrorKind.InvalidTarget, `Target unit ${target.id} is not an enemy`);
  }

  const distance = gridDistance(acting.tile, tileOf(index, target.tileId));
  if (!isInAttackRange(acting.definition, distance)) {
    return invalid(ActionErrorKind.OutOfRange, `Target unit ${target.id} is ${distance} hexes away`);
  }

  return { ...acting, target, targetDefinition: definitionOf(index, target), distance };
}

export function validateAttackCityAction(
  index: GameIndex,
  request: AttackCityRequest
): ValidationResult<ValidatedCityAttack> {
  const acting = validateActingUnit(index, request.actorParticipantId, request.unitId);
  if (!acting.valid) return acting;

  const city = index.citiesById.get(request.targetCityId);
  if (!city) {
    return invalid(ActionErrorKind.InvalidTarget, `City ${request.targetCityId} not found`);
  }
  if (city.participantId === acting.unit.participantId) {
    return invalid(ActionErrorKind.InvalidTarget, `City ${city.id} is not an enemy`);
  }
  if (city.hp <= 0) {
    return invalid(ActionErrorKind.InvalidTarget, `City ${city.id} is already defeated`);
  }

  const distance = gridDistance(acting.tile, tileOf(index, city.tileId));
  if (!isInAttackRange(acting.definition, distance)) {
    return invalid(ActionErrorKind.OutOfRange, `City ${city.id} is ${distance} hexes away`);
  }

  return { ...acting, city, distance };
}
