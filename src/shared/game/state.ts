/**
 * Game State Management
 *
 * Game setup and the pure reducers behind every action. Reducers take a
 * GameState and return a new one; the input is never mutated.
 */

import {
  BUILT_IN_UNIT_DEFINITIONS,
  DEFAULT_RULE_SETTINGS,
  GAME_CONSTANTS,
  GameStatus,
  INITIAL_CITY_RESOURCES,
  ResourceType,
  TerrainType,
  type ActionRequest,
  type AttackCityRequest,
  type AttackUnitRequest,
  type City,
  type CityId,
  type CityResources,
  type EndTurnRequest,
  type GameMap,
  type GameState,
  type GridPosition,
  type MoveRequest,
  type Participant,
  type ParticipantId,
  type ParticipantKind,
  type RuleSettings,
  type Tile,
  type TileId,
  type Transition,
  type UnitDefinition,
} from './types.js';
import { gridDistance, gridNeighbors, isInBounds } from './hex.js';
import { resolveCityAttack, resolveUnitAttack } from './combat.js';
import { buildGameIndex, tileOf, type GameIndex } from './game-index.js';
import {
  toRejection,
  validateAttackCityAction,
  validateAttackUnitAction,
  validateMoveAction,
  validateTurn,
} from './actions.js';

export interface ReducerContext {
  rules: RuleSettings;
  /** Timestamp recorded in the turn ledger */
  now: Date;
}

function defaultContext(): ReducerContext {
  return { rules: DEFAULT_RULE_SETTINGS, now: new Date() };
}

// ============================================================================
// Game Setup
// ============================================================================

/**
 * Build a rectangular map with one tile per position, ids assigned row-major
 * starting at 1.
 */
export function createGameMap(
  code: string,
  width: number,
  height: number,
  describeTile: (pos: GridPosition) => Pick<Tile, 'terrain' | 'resourceType' | 'resourceAmount'> = () => ({
    terrain: TerrainType.Grassland,
    resourceType: null,
    resourceAmount: 0,
  })
): GameMap {
  const tiles: Tile[] = [];
  for (let row = 0; row < height; row++) {
    for (let col = 0; col < width; col++) {
      tiles.push({ id: row * width + col + 1, row, col, ...describeTile({ row, col }) });
    }
  }
  return { code, width, height, tiles };
}

export interface NewParticipant {
  kind: ParticipantKind;
  displayName: string;
}

export interface InitialGameOptions {
  map: GameMap;
  participants: NewParticipant[];
  /** City position for each participant, in participant order */
  startingPositions: GridPosition[];
  unitDefinitions?: readonly UnitDefinition[];
  /** Unit type placed next to each starting city */
  startingUnitCode?: string;
}

/**
 * Create a game with one city per participant and one starting unit on the
 * first free hex next to it. The first participant moves first.
 *
 * Each city works its own tile and the neighboring tiles no earlier city
 * works, and starts with INITIAL_CITY_RESOURCES.
 */
export function createInitialGameState(gameId: string, options: InitialGameOptions): GameState {
  const { map, participants, startingPositions } = options;
  const unitDefinitions = [...(options.unitDefinitions ?? BUILT_IN_UNIT_DEFINITIONS)];
  const startingUnitCode = options.startingUnitCode ?? 'warrior';

  if (participants.length < 2) {
    throw new Error('A game needs at least two participants');
  }
  if (startingPositions.length < participants.length) {
    throw new Error(`Need ${participants.length} starting positions, got ${startingPositions.length}`);
  }
  const definition = unitDefinitions.find((d) => d.code === startingUnitCode);
  if (!definition) {
    throw new Error(`Unknown unit type '${startingUnitCode}'`);
  }

  const tileIndex = new Map(map.tiles.map((t) => [`${t.row},${t.col}`, t]));
  const findTile = (pos: GridPosition): Tile | undefined => tileIndex.get(`${pos.row},${pos.col}`);
  const taken = new Set<number>();
  const worked = new Set<TileId>();

  const state: GameState = {
    schemaVersion: GAME_CONSTANTS.SCHEMA_VERSION,
    gameId,
    map,
    unitDefinitions,
    participants: [],
    units: [],
    cities: [],
    turn: { turnNo: 1, activeParticipantId: 1, turnInProgress: false, status: GameStatus.Active },
    turns: [],
  };

  participants.forEach((p, i) => {
    const participantId = i + 1;
    state.participants.push({ id: participantId, kind: p.kind, displayName: p.displayName, isEliminated: false });

    const cityTile = findTile(startingPositions[i]);
    if (!cityTile || taken.has(cityTile.id)) {
      throw new Error(`Starting position ${i} is not a free tile on the map`);
    }
    taken.add(cityTile.id);

    const workedTileIds = [cityTile, ...gridNeighbors(cityTile).map(findTile)]
      .filter((tile): tile is Tile => tile !== undefined && !worked.has(tile.id))
      .map((tile) => tile.id);
    workedTileIds.forEach((id) => worked.add(id));

    state.cities.push({
      id: participantId,
      participantId,
      tileId: cityTile.id,
      hp: GAME_CONSTANTS.CITY_MAX_HP,
      maxHp: GAME_CONSTANTS.CITY_MAX_HP,
      workedTileIds,
      resources: { ...INITIAL_CITY_RESOURCES },
    });

    const unitTile = gridNeighbors(cityTile)
      .filter((pos) => isInBounds(pos, map.width, map.height))
      .map(findTile)
      .find((tile): tile is Tile => tile !== undefined && !taken.has(tile.id));
    if (!unitTile) {
      throw new Error(`No free tile next to starting position ${i}`);
    }
    taken.add(unitTile.id);
    state.units.push({
      id: participantId,
      participantId,
      typeCode: definition.code,
      hp: definition.health,
      tileId: unitTile.id,
      hasActed: false,
    });
  });

  return state;
}

// ============================================================================
// City Capture & Elimination
// ============================================================================

/**
 * Hand a defeated city to the capturer, eliminate its old owner when that was
 * their last city, and finish the game once the capturer holds every city.
 */
export function captureCity(state: GameState, cityId: CityId, capturerId: ParticipantId): GameState {
  const previous = state.cities.find((c) => c.id === cityId);
  if (!previous) return state;

  const cities = state.cities.map((c) =>
    c.id === cityId ? { ...c, participantId: capturerId, hp: GAME_CONSTANTS.HP_AFTER_CAPTURE } : c
  );

  const formerOwnerHasCities = cities.some((c) => c.participantId === previous.participantId);
  const participants: Participant[] = state.participants.map((p) =>
    p.id === previous.participantId && !formerOwnerHasCities ? { ...p, isEliminated: true } : p
  );

  const capturerHoldsAll = cities.every((c) => c.participantId === capturerId);
  const turn = capturerHoldsAll
    ? { ...state.turn, status: GameStatus.Finished, activeParticipantId: null }
    : state.turn;

  return { ...state, cities, participants, turn };
}

// ============================================================================
// Action Reducers
// ============================================================================

export function applyMoveAction(state: GameState, request: MoveRequest, index: GameIndex = buildGameIndex(state)): Transition {
  const result = validateMoveAction(state, index, request);
  if (!result.valid) return toRejection(result);

  const { unit, definition, destination } = result;
  let next: GameState = {
    ...state,
    units: state.units.map((u) => (u.id === unit.id ? { ...u, tileId: destination.id, hasActed: true } : u)),
  };

  const city = index.cityByTile.get(destination.id);
  if (city && city.participantId !== unit.participantId && city.hp <= 0 && !definition.isRanged) {
    next = captureCity(next, city.id, unit.participantId);
  }

  return { ok: true, state: next };
}

export function applyAttackUnitAction(
  state: GameState,
  request: AttackUnitRequest,
  index: GameIndex = buildGameIndex(state)
): Transition {
  const result = validateAttackUnitAction(index, request);
  if (!result.valid) return toRejection(result);

  const { unit, definition, target, targetDefinition } = result;
  const outcome = resolveUnitAttack({ definition, hp: unit.hp }, { definition: targetDefinition, hp: target.hp });

  const units = state.units
    .map((u) => {
      if (u.id === unit.id) return { ...u, hp: outcome.attackerHp, hasActed: true };
      if (u.id === target.id) return { ...u, hp: outcome.defenderHp };
      return u;
    })
    .filter((u) => u.hp > 0);

  return { ok: true, state: { ...state, units } };
}

export function applyAttackCityAction(
  state: GameState,
  request: AttackCityRequest,
  rules: RuleSettings = DEFAULT_RULE_SETTINGS,
  index: GameIndex = buildGameIndex(state)
): Transition {
  const result = validateAttackCityAction(index, request);
  if (!result.valid) return toRejection(result);

  const { unit, definition, city } = result;
  const outcome = resolveCityAttack({ definition, hp: unit.hp }, city, rules.cityDefence);

  return {
    ok: true,
    state: {
      ...state,
      units: state.units.map((u) => (u.id === unit.id ? { ...u, hasActed: true } : u)),
      cities: state.cities.map((c) => (c.id === city.id ? { ...c, hp: outcome.cityHp } : c)),
    },
  };
}

// ============================================================================
// End Turn
// ============================================================================

/**
 * A city is under siege while an enemy unit stands next to it.
 */
export function isUnderSiege(state: GameState, index: GameIndex, city: City): boolean {
  const cityTile = tileOf(index, city.tileId);
  return state.units.some(
    (u) => u.participantId !== city.participantId && gridDistance(cityTile, tileOf(index, u.tileId)) === 1
  );
}

/**
 * Next non-eliminated participant after the given one, wrapping. Falls back to
 * the current participant when everyone else is eliminated.
 */
export function nextActiveParticipant(participants: Participant[], currentId: ParticipantId): ParticipantId {
  const start = participants.findIndex((p) => p.id === currentId);
  for (let step = 1; step <= participants.length; step++) {
    const candidate = participants[(start + step) % participants.length];
    if (!candidate.isEliminated) return candidate.id;
  }
  return currentId;
}

const RESOURCE_ORDER: readonly ResourceType[] = [
  ResourceType.Wood,
  ResourceType.Stone,
  ResourceType.Wheat,
  ResourceType.Iron,
];

const emptyResources = (): CityResources => ({
  [ResourceType.Wood]: 0,
  [ResourceType.Stone]: 0,
  [ResourceType.Wheat]: 0,
  [ResourceType.Iron]: 0,
});

export interface HarvestOutcome {
  resources: CityResources;
  harvested: CityResources;
  /** Yield lost because the stock was full */
  overflow: CityResources;
}

/**
 * Harvest HARVEST_PER_TILE from each of the city's worked tiles into its
 * stock. Depleted tiles, tiles without a resource and tiles an enemy unit
 * stands on yield nothing. A full stock turns the yield into overflow and
 * leaves the tile untouched.
 *
 * `remaining` maps tile ids to their resource amount and is decremented in
 * place, so cities harvesting in turn share one view of the map.
 */
export function harvestCity(
  city: City,
  index: GameIndex,
  remaining: Map<TileId, number>,
  storageCap: number
): HarvestOutcome {
  const resources = { ...city.resources };
  const harvested = emptyResources();
  const overflow = emptyResources();

  for (const tileId of city.workedTileIds) {
    const tile = tileOf(index, tileId);
    const available = remaining.get(tileId) ?? tile.resourceAmount;
    if (tile.resourceType === null || available <= 0) continue;

    const occupant = index.unitByTile.get(tileId);
    if (occupant && occupant.participantId !== city.participantId) continue;

    const type = tile.resourceType;
    const room = Math.max(0, storageCap - resources[type]);
    const gain = Math.min(GAME_CONSTANTS.HARVEST_PER_TILE, available, room);
    overflow[type] += Math.min(GAME_CONSTANTS.HARVEST_PER_TILE, available) - gain;
    if (gain === 0) continue;

    resources[type] += gain;
    harvested[type] += gain;
    remaining.set(tileId, available - gain);
  }

  return { resources, harvested, overflow };
}

function describeYield(cityId: CityId, amounts: CityResources): string[] {
  return RESOURCE_ORDER.filter((type) => amounts[type] > 0).map((type) => `city ${cityId} +${amounts[type]} ${type}`);
}

export function applyEndTurnAction(
  state: GameState,
  request: EndTurnRequest,
  context: ReducerContext = defaultContext(),
  index: GameIndex = buildGameIndex(state)
): Transition {
  const endingId = request.actorParticipantId;
  const { cityRegenNormal, cityRegenUnderSiege, resourceStorageCap } = context.rules;

  const regenerated: string[] = [];
  const harvestedParts: string[] = [];
  const overflowParts: string[] = [];
  const remaining = new Map<TileId, number>();

  const cities = state.cities.map((city) => {
    if (city.participantId !== endingId) return city;

    let hp = city.hp;
    if (city.hp > 0 && city.hp < city.maxHp) {
      const gain = isUnderSiege(state, index, city) ? cityRegenUnderSiege : cityRegenNormal;
      hp = Math.min(city.maxHp, city.hp + gain);
      regenerated.push(`city ${city.id} +${hp - city.hp} (${hp}/${city.maxHp})`);
    }

    const harvest = harvestCity(city, index, remaining, resourceStorageCap);
    harvestedParts.push(...describeYield(city.id, harvest.harvested));
    overflowParts.push(...describeYield(city.id, harvest.overflow));

    return { ...city, hp, resources: harvest.resources };
  });

  const tiles =
    remaining.size === 0
      ? state.map.tiles
      : state.map.tiles.map((t) => {
          const amount = remaining.get(t.id);
          return amount === undefined ? t : { ...t, resourceAmount: amount };
        });

  const summary = [
    regenerated.length > 0 ? `Regenerated ${regenerated.join(', ')}` : 'No city regeneration',
    ...(harvestedParts.length > 0 ? [`Harvested ${harvestedParts.join(', ')}`] : []),
    ...(overflowParts.length > 0 ? [`Overflow ${overflowParts.join(', ')}`] : []),
  ].join('; ');

  return {
    ok: true,
    turnSummary: summary,
    state: {
      ...state,
      map: tiles === state.map.tiles ? state.map : { ...state.map, tiles },
      cities,
      units: state.units.map((u) => (u.hasActed ? { ...u, hasActed: false } : u)),
      turns: [
        ...state.turns,
        { turnNo: state.turn.turnNo, participantId: endingId, committedAt: context.now.toISOString(), summary },
      ],
      turn: {
        ...state.turn,
        turnNo: state.turn.turnNo + 1,
        activeParticipantId: nextActiveParticipant(state.participants, endingId),
      },
    },
  };
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Check the turn, then run the reducer for the request's kind.
 */
export function applyAction(
  state: GameState,
  request: ActionRequest,
  context: ReducerContext = defaultContext()
): Transition {
  const turnCheck = validateTurn(state, request.actorParticipantId);
  if (!turnCheck.valid) return toRejection(turnCheck);

  const index = buildGameIndex(state);

  switch (request.kind) {
    case 'move':
      return applyMoveAction(state, request, index);
    case 'attack-unit':
      return applyAttackUnitAction(state, request, index);
    case 'attack-city':
      return applyAttackCityAction(state, request, context.rules, index);
    case 'end-turn':
      return applyEndTurnAction(state, request, context, index);
  }
}
