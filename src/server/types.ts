/**
 * HTTP request schemas and response shapes
 */

import { z } from 'zod';
import { ParticipantKind } from '../shared/game/types.js';
import type { GameStateView } from '../shared/game/projection.js';
import type { ReachablePosition } from '../shared/game/pathfinding.js';
import { MAX_PARTICIPANTS } from './game-starter.js';

const id = z.number().int().positive();

export const createGameSchema = z.object({
  participants: z
    .array(
      z.object({
        kind: z.nativeEnum(ParticipantKind),
        displayName: z.string().trim().min(1).max(40),
      })
    )
    .min(2)
    .max(MAX_PARTICIPANTS),
  width: z.number().int().min(5).max(40).optional(),
  height: z.number().int().min(5).max(40).optional(),
});

export const moveSchema = z.object({
  actorParticipantId: id,
  unitId: id,
  to: z.object({
    row: z.number().int(),
    col: z.number().int(),
  }),
});

export const attackSchema = z.object({
  actorParticipantId: id,
  attackerUnitId: id,
  targetUnitId: id,
});

export const attackCitySchema = z.object({
  actorParticipantId: id,
  attackerUnitId: id,
  targetCityId: id,
});

export const endTurnSchema = z.object({
  actorParticipantId: id,
});

export const unitParamsSchema = z.object({
  id: z.string().min(1),
  unitId: z.coerce.number().int().positive(),
});

export interface CreateGameResponse {
  gameId: string;
  state: GameStateView;
}

export interface ActionResponse {
  state: GameStateView;
  turnSummary?: string;
}

export interface ReachableResponse {
  unitId: number;
  positions: ReachablePosition[];
}

export interface ErrorResponse {
  code: string;
  message: string;
}
