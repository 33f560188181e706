/**
 * Client read model of a game, and the result shape every action returns.
 */

import type {
  ActionRejection,
  CityId,
  CityResources,
  GameState,
  GameStatus,
  Participant,
  ParticipantId,
  UnitDefinition,
  UnitId,
} from './types.js';
import { buildGameIndex, tileOf } from './game-index.js';

export interface GameStateView {
  game: {
    id: string;
    turnNo: number;
    activeParticipantId: ParticipantId | null;
    turnInProgress: boolean;
    status: GameStatus;
  };
  map: {
    code: string;
    width: number;
    height: number;
  };
  participants: Participant[];
  units: UnitView[];
  cities: CityView[];
  unitDefinitions: UnitDefinition[];
}

export interface UnitView {
  id: UnitId;
  participantId: ParticipantId;
  typeCode: string;
  hp: number;
  hasActed: boolean;
  row: number;
  col: number;
}

export interface CityView {
  id: CityId;
  participantId: ParticipantId;
  hp: number;
  maxHp: number;
  row: number;
  col: number;
  resources: CityResources;
}

export type ActionResult = { ok: true; state: GameStateView; turnSummary?: string } | ActionRejection;

/**
 * Project a GameState into the client read model. Units and cities are sorted
 * by id and definitions by code, so equal states give equal views.
 */
export function buildGameStateView(state: GameState): GameStateView {
  const index = buildGameIndex(state);

  const units = [...state.units]
    .sort((a, b) => a.id - b.id)
    .map((u) => {
      const tile = tileOf(index, u.tileId);
      return {
        id: u.id,
        participantId: u.participantId,
        typeCode: u.typeCode,
        hp: u.hp,
        hasActed: u.hasActed,
        row: tile.row,
        col: tile.col,
      };
    });

  const cities = [...state.cities]
    .sort((a, b) => a.id - b.id)
    .map((c) => {
      const tile = tileOf(index, c.tileId);
      return {
        id: c.id,
        participantId: c.participantId,
        hp: c.hp,
        maxHp: c.maxHp,
        row: tile.row,
        col: tile.col,
        resources: { ...c.resources },
      };
    });

  return {
    game: {
      id: state.gameId,
      turnNo: state.turn.turnNo,
      activeParticipantId: state.turn.activeParticipantId,
      turnInProgress: state.turn.turnInProgress,
      status: state.turn.status,
    },
    map: { code: state.map.code, width: state.map.width, height: state.map.height },
    participants: state.participants.map((p) => ({ ...p })),
    units,
    cities,
    unitDefinitions: [...state.unitDefinitions].sort((a, b) => a.code.localeCompare(b.code)).map((d) => ({ ...d })),
  };
}
