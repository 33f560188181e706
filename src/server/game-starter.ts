/**
 * Game Starter - builds the initial state for a newly created game
 */

import { customAlphabet } from 'nanoid';
import {
  ResourceType,
  TerrainType,
  type GameState,
  type GridPosition,
  type Tile,
} from '../shared/game/types.js';
import { createGameMap, createInitialGameState, type NewParticipant } from '../shared/game/state.js';

// Lowercase ids avoid case-sensitivity issues in URLs.
const createGameId = customAlphabet('0123456789abcdefghijklmnopqrstuvwxyz', 8);

export const MAX_PARTICIPANTS = 4;
export const DEFAULT_MAP_WIDTH = 12;
export const DEFAULT_MAP_HEIGHT = 10;

export interface NewGameOptions {
  participants: NewParticipant[];
  width?: number;
  height?: number;
}

const RESOURCE_CYCLE: ResourceType[] = [ResourceType.Wheat, ResourceType.Wood, ResourceType.Stone, ResourceType.Iron];

/**
 * Deterministic terrain: tundra on the top and bottom rows, a tropical band
 * across the middle, scattered lakes, and a resource on every seventeenth hex.
 */
export function describeTile(pos: GridPosition, height: number): Pick<Tile, 'terrain' | 'resourceType' | 'resourceAmount'> {
  let terrain = TerrainType.Grassland;
  if (pos.row === 0 || pos.row === height - 1) {
    terrain = TerrainType.Tundra;
  } else if (pos.row === Math.floor(height / 2)) {
    terrain = TerrainType.Tropical;
  } else if ((pos.row * 7 + pos.col * 3) % 23 === 0) {
    terrain = TerrainType.Water;
  }

  const slot = pos.row * 5 + pos.col * 11;
  if (terrain !== TerrainType.Water && slot % 17 === 0) {
    return { terrain, resourceType: RESOURCE_CYCLE[(slot / 17) % RESOURCE_CYCLE.length], resourceAmount: 2 };
  }
  return { terrain, resourceType: null, resourceAmount: 0 };
}

/**
 * City sites inset one hex from the corners: top-left, bottom-right,
 * top-right, bottom-left.
 */
export function startingPositions(width: number, height: number): GridPosition[] {
  return [
    { row: 1, col: 1 },
    { row: height - 2, col: width - 2 },
    { row: 1, col: width - 2 },
    { row: height - 2, col: 1 },
  ];
}

/**
 * Initialize a new game for the given participants
 */
export function initializeGame(options: NewGameOptions): GameState {
  if (options.participants.length > MAX_PARTICIPANTS) {
    throw new Error(`A game holds at most ${MAX_PARTICIPANTS} participants`);
  }

  const width = options.width ?? DEFAULT_MAP_WIDTH;
  const height = options.height ?? DEFAULT_MAP_HEIGHT;
  const gameId = createGameId();
  const map = createGameMap(`generated-${width}x${height}`, width, height, (pos) => describeTile(pos, height));

  return createInitialGameState(gameId, {
    map,
    participants: options.participants,
    startingPositions: startingPositions(width, height),
  });
}
