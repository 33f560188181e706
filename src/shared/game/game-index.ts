/**
 * Lookup maps derived from a GameState. Never persisted; rebuilt from the
 * state each reducer receives.
 */

import type {
  City,
  CityId,
  GameState,
  GridPosition,
  Tile,
  TileId,
  Unit,
  UnitDefinition,
  UnitId,
} from './types.js';
import { positionKey } from './hex.js';
import { EngineFaultError } from './errors.js';

export interface GameIndex {
  unitsById: Map<UnitId, Unit>;
  citiesById: Map<CityId, City>;
  tilesById: Map<TileId, Tile>;
  tilesByPosition: Map<string, Tile>;
  /** Occupancy: tileId -> unit standing on it */
  unitByTile: Map<TileId, Unit>;
  cityByTile: Map<TileId, City>;
  definitionsByCode: Map<string, UnitDefinition>;
}

export function buildGameIndex(state: GameState): GameIndex {
  const tilesById = new Map<TileId, Tile>();
  const tilesByPosition = new Map<string, Tile>();
  for (const tile of state.map.tiles) {
    tilesById.set(tile.id, tile);
    tilesByPosition.set(positionKey(tile), tile);
  }

  const unitByTile = new Map<TileId, Unit>();
  for (const unit of state.units) {
    if (!tilesById.has(unit.tileId)) {
      throw new EngineFaultError(`Unit ${unit.id} references missing tile ${unit.tileId}`);
    }
    if (unitByTile.has(unit.tileId)) {
      throw new EngineFaultError(`Tile ${unit.tileId} holds more than one unit`);
    }
    unitByTile.set(unit.tileId, unit);
  }

  const cityByTile = new Map<TileId, City>();
  for (const city of state.cities) {
    if (!tilesById.has(city.tileId)) {
      throw new EngineFaultError(`City ${city.id} references missing tile ${city.tileId}`);
    }
    cityByTile.set(city.tileId, city);
  }

  return {
    unitsById: new Map(state.units.map((u) => [u.id, u])),
    citiesById: new Map(state.cities.map((c) => [c.id, c])),
    tilesById,
    tilesByPosition,
    unitByTile,
    cityByTile,
    definitionsByCode: new Map(state.unitDefinitions.map((d) => [d.code, d])),
  };
}

export function tileAt(index: GameIndex, pos: GridPosition): Tile | undefined {
  return index.tilesByPosition.get(positionKey(pos));
}

export function tileOf(index: GameIndex, tileId: TileId): Tile {
  const tile = index.tilesById.get(tileId);
  if (!tile) {
    throw new EngineFaultError(`Tile ${tileId} is not on the map`);
  }
  return tile;
}

export function definitionOf(index: GameIndex, unit: Unit): UnitDefinition {
  const definition = index.definitionsByCode.get(unit.typeCode);
  if (!definition) {
    throw new EngineFaultError(`Unit ${unit.id} has unknown type '${unit.typeCode}'`);
  }
  return definition;
}
