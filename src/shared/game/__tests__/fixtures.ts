import {
  BUILT_IN_UNIT_DEFINITIONS,
  GAME_CONSTANTS,
  GameStatus,
  ParticipantKind,
  ResourceType,
  type City,
  type CityResources,
  type GameState,
  type GameTurnState,
  type Participant,
  type Unit,
} from '../types.js';
import { createGameMap } from '../state.js';

export const WIDTH = 8;
export const HEIGHT = 6;

export type RowCol = [row: number, col: number];

export function tileId(row: number, col: number): number {
  return row * WIDTH + col + 1;
}

export function createUnit(
  id: number,
  participantId: number,
  typeCode: 'warrior' | 'slinger',
  [row, col]: RowCol,
  overrides: Partial<Unit> = {}
): Unit {
  return {
    id,
    participantId,
    typeCode,
    hp: typeCode === 'warrior' ? 100 : 60,
    tileId: tileId(row, col),
    hasActed: false,
    ...overrides,
  };
}

export function createResources(amounts: Partial<CityResources> = {}): CityResources {
  return { [ResourceType.Wood]: 0, [ResourceType.Stone]: 0, [ResourceType.Wheat]: 0, [ResourceType.Iron]: 0, ...amounts };
}

/**
 * A city working no tiles, with an empty stock.
 */
export function createCity(id: number, participantId: number, [row, col]: RowCol, overrides: Partial<City> = {}): City {
  return {
    id,
    participantId,
    tileId: tileId(row, col),
    hp: 100,
    maxHp: 100,
    workedTileIds: [],
    resources: createResources(),
    ...overrides,
  };
}

export function createParticipant(id: number, overrides: Partial<Participant> = {}): Participant {
  return {
    id,
    kind: id === 1 ? ParticipantKind.Human : ParticipantKind.Ai,
    displayName: `Player ${id}`,
    isEliminated: false,
    ...overrides,
  };
}

export interface TestStateOptions {
  units?: Unit[];
  cities?: City[];
  participants?: Participant[];
  turn?: Partial<GameTurnState>;
}

/**
 * An 8x6 grassland game between participants 1 and 2, participant 1 to move.
 */
export function createTestState(options: TestStateOptions = {}): GameState {
  return {
    schemaVersion: GAME_CONSTANTS.SCHEMA_VERSION,
    gameId: 'test-game',
    map: createGameMap('test', WIDTH, HEIGHT),
    unitDefinitions: BUILT_IN_UNIT_DEFINITIONS.map((d) => ({ ...d })),
    participants: options.participants ?? [createParticipant(1), createParticipant(2)],
    units: options.units ?? [],
    cities: options.cities ?? [],
    turn: {
      turnNo: 1,
      activeParticipantId: 1,
      turnInProgress: false,
      status: GameStatus.Active,
      ...options.turn,
    },
    turns: [],
  };
}
