import { fastify as Fastify, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import type { ZodType, ZodTypeDef } from 'zod';
import { ActionErrorKind, DEFAULT_RULE_SETTINGS, type ActionRequest, type RuleSettings } from '../shared/game/types.js';
import { buildGameStateView, type ActionResult } from '../shared/game/projection.js';
import { TurnEngine } from './engine/turn-engine.js';
import { GameNotFoundError, SchemaMismatchError } from './engine/errors.js';
import { MemoryStorage } from './storage/memory-storage.js';
import { createIdempotencyStore } from './storage/index.js';
import type { GameStorage, IdempotencyStore } from './storage/types.js';
import { createLogger, type Logger } from './logger.js';
import { initializeGame } from './game-starter.js';
import {
  attackCitySchema,
  attackSchema,
  createGameSchema,
  endTurnSchema,
  moveSchema,
  unitParamsSchema,
  type ActionResponse,
  type CreateGameResponse,
  type ErrorResponse,
  type ReachableResponse,
} from './types.js';

export const IDEMPOTENCY_HEADER = 'x-idempotency-key';

/**
 * HTTP status for each rejection kind. The kind's value doubles as the
 * response code.
 */
export const STATUS_BY_ERROR_KIND: Record<ActionErrorKind, number> = {
  [ActionErrorKind.NotPlayerTurn]: 409,
  [ActionErrorKind.TurnBusy]: 409,
  [ActionErrorKind.NoActionsLeft]: 409,
  [ActionErrorKind.OutOfRange]: 422,
  [ActionErrorKind.InvalidTarget]: 422,
  [ActionErrorKind.SchemaMismatch]: 422,
};

export interface ServerOptions {
  idempotency?: IdempotencyStore;
  logger?: Logger;
  rules?: RuleSettings;
  idempotencyTtlSeconds?: number;
  corsOrigin?: string | true;
}

type Parsed<T> = { ok: true; value: T } | { ok: false; error: ErrorResponse };

function parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): Parsed<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  const message = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
  return { ok: false, error: { code: 'INVALID_INPUT', message } };
}

function idempotencyToken(header: string | string[] | undefined): string | undefined {
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

function sendResult(reply: FastifyReply, result: ActionResult) {
  if (!result.ok) {
    const error: ErrorResponse = { code: result.errorKind, message: result.message };
    return reply.status(STATUS_BY_ERROR_KIND[result.errorKind]).send(error);
  }
  const response: ActionResponse =
    result.turnSummary === undefined ? { state: result.state } : { state: result.state, turnSummary: result.turnSummary };
  return reply.send(response);
}

export function createServer(storage: GameStorage = new MemoryStorage(), options: ServerOptions = {}) {
  const logger = options.logger ?? createLogger();
  const fastify = Fastify({ logger });

  const engine = new TurnEngine({
    storage,
    idempotency: options.idempotency ?? createIdempotencyStore(storage),
    logger,
    rules: options.rules ?? DEFAULT_RULE_SETTINGS,
    idempotencyTtlSeconds: options.idempotencyTtlSeconds,
  });

  fastify.register(cors, {
    origin: options.corsOrigin ?? true,
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof GameNotFoundError) {
      return reply.status(404).send({ code: 'GAME_NOT_FOUND', message: error.message } satisfies ErrorResponse);
    }
    if (error instanceof SchemaMismatchError) {
      return reply
        .status(STATUS_BY_ERROR_KIND[ActionErrorKind.SchemaMismatch])
        .send({ code: ActionErrorKind.SchemaMismatch, message: error.message } satisfies ErrorResponse);
    }
    // Framework errors such as a malformed JSON body
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ code: 'INVALID_INPUT', message: error.message } satisfies ErrorResponse);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return reply.status(500).send({ code: 'INTERNAL_ERROR', message: 'Internal server error' } satisfies ErrorResponse);
  });

  /**
   * Run an action parsed from the request and translate the result
   */
  async function runAction(reply: FastifyReply, gameId: string, request: ActionRequest) {
    const result = await engine.execute(gameId.toLowerCase(), request);
    return sendResult(reply, result);
  }

  /**
   * Create a new game
   */
  fastify.post('/api/games', async (request, reply) => {
    const body = parse(createGameSchema, request.body);
    if (!body.ok) return reply.status(400).send(body.error);

    const state = initializeGame(body.value);
    await storage.saveGame(state);
    request.log.info({ gameId: state.gameId, participants: state.participants.length }, 'Game created');

    const response: CreateGameResponse = { gameId: state.gameId, state: buildGameStateView(state) };
    return reply.send(response);
  });

  /**
   * List stored games
   */
  fastify.get('/api/games', async () => {
    return { games: await storage.listGames() };
  });

  /**
   * Current state projection
   */
  fastify.get<{ Params: { id: string } }>('/api/games/:id/state', async (request) => {
    return engine.getState(request.params.id.toLowerCase());
  });

  /**
   * Move preview for one unit
   */
  fastify.get('/api/games/:id/units/:unitId/reachable', async (request, reply) => {
    const params = parse(unitParamsSchema, request.params);
    if (!params.ok) return reply.status(400).send(params.error);

    const positions = await engine.previewMoves(params.value.id.toLowerCase(), params.value.unitId);
    if (!positions) {
      return reply
        .status(404)
        .send({ code: 'UNIT_NOT_FOUND', message: `Unit ${params.value.unitId} not found` } satisfies ErrorResponse);
    }
    const response: ReachableResponse = { unitId: params.value.unitId, positions };
    return reply.send(response);
  });

  // ============================================================================
  // Actions
  // ============================================================================

  fastify.post<{ Params: { id: string } }>('/api/games/:id/actions/move', async (request, reply) => {
    const body = parse(moveSchema, request.body);
    if (!body.ok) return reply.status(400).send(body.error);

    return runAction(reply, request.params.id, {
      kind: 'move',
      actorParticipantId: body.value.actorParticipantId,
      unitId: body.value.unitId,
      destination: body.value.to,
      idempotencyToken: idempotencyToken(request.headers[IDEMPOTENCY_HEADER]),
    });
  });

  fastify.post<{ Params: { id: string } }>('/api/games/:id/actions/attack', async (request, reply) => {
    const body = parse(attackSchema, request.body);
    if (!body.ok) return reply.status(400).send(body.error);

    return runAction(reply, request.params.id, {
      kind: 'attack-unit',
      actorParticipantId: body.value.actorParticipantId,
      unitId: body.value.attackerUnitId,
      targetUnitId: body.value.targetUnitId,
      idempotencyToken: idempotencyToken(request.headers[IDEMPOTENCY_HEADER]),
    });
  });

  fastify.post<{ Params: { id: string } }>('/api/games/:id/actions/attack-city', async (request, reply) => {
    const body = parse(attackCitySchema, request.body);
    if (!body.ok) return reply.status(400).send(body.error);

    return runAction(reply, request.params.id, {
      kind: 'attack-city',
      actorParticipantId: body.value.actorParticipantId,
      unitId: body.value.attackerUnitId,
      targetCityId: body.value.targetCityId,
      idempotencyToken: idempotencyToken(request.headers[IDEMPOTENCY_HEADER]),
    });
  });

  fastify.post<{ Params: { id: string } }>('/api/games/:id/end-turn', async (request, reply) => {
    const body = parse(endTurnSchema, request.body);
    if (!body.ok) return reply.status(400).send(body.error);

    return runAction(reply, request.params.id, {
      kind: 'end-turn',
      actorParticipantId: body.value.actorParticipantId,
      idempotencyToken: idempotencyToken(request.headers[IDEMPOTENCY_HEADER]),
    });
  });

  /**
   * Health check
   */
  fastify.get('/health', async () => {
    return { status: 'ok', storage: storage.isConnected() ? 'connected' : 'disconnected' };
  });

  return fastify;
}
