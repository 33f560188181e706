import { z } from 'zod';
import {
  GAME_CONSTANTS,
  GameStatus,
  ParticipantKind,
  ResourceType,
  TerrainType,
  type GameId,
  type GameState,
} from '../../shared/game/types.js';
import { EngineFaultError, SchemaMismatchError } from '../engine/errors.js';

const id = z.number().int();

const tileSchema = z.object({
  id,
  row: z.number().int(),
  col: z.number().int(),
  terrain: z.nativeEnum(TerrainType),
  resourceType: z.nativeEnum(ResourceType).nullable(),
  resourceAmount: z.number().int().nonnegative(),
});

const resourcesSchema = z.object({
  [ResourceType.Wood]: z.number(),
  [ResourceType.Stone]: z.number(),
  [ResourceType.Wheat]: z.number(),
  [ResourceType.Iron]: z.number(),
});

const gameStateSchema: z.ZodType<GameState> = z.object({
  schemaVersion: z.number(),
  gameId: z.string(),
  map: z.object({
    code: z.string(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    tiles: z.array(tileSchema),
  }),
  unitDefinitions: z.array(
    z.object({
      code: z.string(),
      isRanged: z.boolean(),
      attack: z.number(),
      defence: z.number(),
      rangeMin: z.number().int(),
      rangeMax: z.number().int(),
      movePoints: z.number().int(),
      health: z.number(),
    })
  ),
  participants: z.array(
    z.object({
      id,
      kind: z.nativeEnum(ParticipantKind),
      displayName: z.string(),
      isEliminated: z.boolean(),
    })
  ),
  units: z.array(
    z.object({
      id,
      participantId: id,
      typeCode: z.string(),
      hp: z.number(),
      tileId: id,
      hasActed: z.boolean(),
    })
  ),
  cities: z.array(
    z.object({
      id,
      participantId: id,
      tileId: id,
      hp: z.number(),
      maxHp: z.number(),
      workedTileIds: z.array(id),
      resources: resourcesSchema,
    })
  ),
  turn: z.object({
    turnNo: z.number().int(),
    activeParticipantId: id.nullable(),
    turnInProgress: z.boolean(),
    status: z.nativeEnum(GameStatus),
  }),
  turns: z.array(
    z.object({
      turnNo: z.number().int(),
      participantId: id,
      committedAt: z.string(),
      summary: z.string(),
    })
  ),
});

export function serializeGameState(state: GameState): string {
  return JSON.stringify(state);
}

/**
 * Parse a stored game. Data written under another schema version is a
 * SchemaMismatchError; anything else that does not fit the model is an
 * EngineFaultError.
 */
export function deserializeGameState(gameId: GameId, data: string): GameState {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    throw new EngineFaultError(`Stored game ${gameId} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const version =
    typeof parsed === 'object' && parsed !== null && 'schemaVersion' in parsed ? parsed.schemaVersion : undefined;
  if (version !== GAME_CONSTANTS.SCHEMA_VERSION) {
    throw new SchemaMismatchError(gameId, version, GAME_CONSTANTS.SCHEMA_VERSION);
  }

  const result = gameStateSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new EngineFaultError(`Stored game ${gameId} is malformed: ${problems.join('; ')}`);
  }
  return result.data;
}
