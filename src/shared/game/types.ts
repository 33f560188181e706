/**
 * Core game types.
 *
 * Entities reference each other by id only (units to tiles, units and cities
 * to participants, units to definitions by code). Lookups go through a
 * GameIndex derived from the state.
 */

// ============================================================================
// 1. Coordinates
// ============================================================================

/**
 * Cube hex coordinates (calculation format)
 * Constraint: x + y + z = 0
 */
export interface CubeCoord {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Odd-r offset coordinates (storage and wire format)
 */
export interface GridPosition {
  readonly row: number;
  readonly col: number;
}

// ============================================================================
// 2. Identifiers
// ============================================================================

export type GameId = string;
export type ParticipantId = number;
export type UnitId = number;
export type CityId = number;
export type TileId = number;

// ============================================================================
// 3. Enumerations
// ============================================================================

export enum TerrainType {
  Grassland = 'grassland',
  Water = 'water',
  Ocean = 'ocean',
  Tundra = 'tundra',
  Tropical = 'tropical',
}

export enum ResourceType {
  Wood = 'wood',
  Stone = 'stone',
  Wheat = 'wheat',
  Iron = 'iron',
}

export enum ParticipantKind {
  Human = 'human',
  Ai = 'ai',
}

export enum GameStatus {
  Active = 'active',
  Finished = 'finished',
}

/**
 * Rule violations an action can be rejected with. The string values are the
 * stable codes clients see.
 */
export enum ActionErrorKind {
  NotPlayerTurn = 'NOT_PLAYER_TURN',
  TurnBusy = 'TURN_IN_PROGRESS',
  NoActionsLeft = 'NO_ACTIONS_LEFT',
  OutOfRange = 'OUT_OF_RANGE',
  InvalidTarget = 'INVALID_TARGET',
  SchemaMismatch = 'SCHEMA_MISMATCH',
}

// ============================================================================
// 4. Map
// ============================================================================

export interface Tile {
  id: TileId;
  row: number;
  col: number;
  terrain: TerrainType;
  resourceType: ResourceType | null;
  resourceAmount: number;
}

export interface GameMap {
  code: string;
  width: number;
  height: number;
  tiles: Tile[];
}

// ============================================================================
// 5. Units, Cities, Participants
// ============================================================================

export interface UnitDefinition {
  code: string;
  isRanged: boolean;
  attack: number;
  defence: number;
  rangeMin: number;
  rangeMax: number;
  movePoints: number;
  health: number;
}

export interface Unit {
  id: UnitId;
  participantId: ParticipantId;
  typeCode: string;
  hp: number;
  tileId: TileId;
  hasActed: boolean;
}

/** Stock a city holds of each resource */
export type CityResources = Record<ResourceType, number>;

export interface City {
  id: CityId;
  participantId: ParticipantId;
  tileId: TileId;
  hp: number;
  maxHp: number;
  /** Tiles the city harvests from at the end of its owner's turn */
  workedTileIds: TileId[];
  resources: CityResources;
}

export interface Participant {
  id: ParticipantId;
  kind: ParticipantKind;
  displayName: string;
  isEliminated: boolean;
}

// ============================================================================
// 6. Game State
// ============================================================================

export interface GameTurnState {
  turnNo: number;
  activeParticipantId: ParticipantId | null;
  turnInProgress: boolean;
  status: GameStatus;
}

/**
 * One entry of the append-only turn ledger, written when a participant ends
 * their turn.
 */
export interface TurnRecord {
  turnNo: number;
  participantId: ParticipantId;
  committedAt: string;
  summary: string;
}

export interface GameState {
  schemaVersion: number;
  gameId: GameId;
  map: GameMap;
  unitDefinitions: UnitDefinition[];
  /** Turn order */
  participants: Participant[];
  units: Unit[];
  cities: City[];
  turn: GameTurnState;
  turns: TurnRecord[];
}

// ============================================================================
// 7. Actions
// ============================================================================

export type ActionKind = 'move' | 'attack-unit' | 'attack-city' | 'end-turn';

interface BaseActionRequest {
  actorParticipantId: ParticipantId;
  idempotencyToken?: string;
}

export interface MoveRequest extends BaseActionRequest {
  kind: 'move';
  unitId: UnitId;
  destination: GridPosition;
}

export interface AttackUnitRequest extends BaseActionRequest {
  kind: 'attack-unit';
  unitId: UnitId;
  targetUnitId: UnitId;
}

export interface AttackCityRequest extends BaseActionRequest {
  kind: 'attack-city';
  unitId: UnitId;
  targetCityId: CityId;
}

export interface EndTurnRequest extends BaseActionRequest {
  kind: 'end-turn';
}

export type ActionRequest = MoveRequest | AttackUnitRequest | AttackCityRequest | EndTurnRequest;

export interface ActionRejection {
  ok: false;
  errorKind: ActionErrorKind;
  message: string;
}

/**
 * Outcome of a pure reducer: a new state, or a rejection that leaves the
 * input untouched.
 */
export type Transition = { ok: true; state: GameState; turnSummary?: string } | ActionRejection;

// ============================================================================
// 8. Constants
// ============================================================================

export const GAME_CONSTANTS = {
  SCHEMA_VERSION: 1,
  CITY_DEFENCE: 15,
  CITY_MAX_HP: 100,
  CITY_REGEN_NORMAL: 4,
  CITY_REGEN_UNDER_SIEGE: 2,
  HP_AFTER_CAPTURE: 1,
  HARVEST_PER_TILE: 1,
  RESOURCE_STORAGE_CAP: 100,
} as const;

export const INITIAL_CITY_RESOURCES: Readonly<CityResources> = {
  [ResourceType.Wood]: 5,
  [ResourceType.Stone]: 5,
  [ResourceType.Wheat]: 5,
  [ResourceType.Iron]: 0,
};

/**
 * Tunable rule settings passed into the reducers.
 */
export interface RuleSettings {
  cityRegenNormal: number;
  cityRegenUnderSiege: number;
  cityDefence: number;
  /** Most of one resource a city can hold */
  resourceStorageCap: number;
}

export const DEFAULT_RULE_SETTINGS: RuleSettings = {
  cityRegenNormal: GAME_CONSTANTS.CITY_REGEN_NORMAL,
  cityRegenUnderSiege: GAME_CONSTANTS.CITY_REGEN_UNDER_SIEGE,
  cityDefence: GAME_CONSTANTS.CITY_DEFENCE,
  resourceStorageCap: GAME_CONSTANTS.RESOURCE_STORAGE_CAP,
};

export const BUILT_IN_UNIT_DEFINITIONS: readonly UnitDefinition[] = [
  {
    code: 'warrior',
    isRanged: false,
    attack: 20,
    defence: 10,
    rangeMin: 0,
    rangeMax: 0,
    movePoints: 2,
    health: 100,
  },
  {
    code: 'slinger',
    isRanged: true,
    attack: 15,
    defence: 8,
    rangeMin: 2,
    rangeMax: 3,
    movePoints: 2,
    health: 60,
  },
];
