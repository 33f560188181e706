/**
 * Hex Coordinate System
 *
 * Odd-r offset coordinates (pointy-top rows, odd rows shoved right) for
 * storage and bounds checks, cube coordinates for distance and neighbor math.
 */

import type { CubeCoord, GridPosition } from './types.js';

// ============================================================================
// Cube Directions
// ============================================================================

/**
 * Unit steps in cube space. This order is the neighbor enumeration order and
 * the pathfinder's tie-break order.
 */
export const CUBE_DIRECTIONS: readonly CubeCoord[] = [
  { x: 1, y: 0, z: -1 },
  { x: 1, y: -1, z: 0 },
  { x: 0, y: -1, z: 1 },
  { x: -1, y: 0, z: 1 },
  { x: -1, y: 1, z: 0 },
  { x: 0, y: 1, z: -1 },
];

// ============================================================================
// Coordinate Conversion
// ============================================================================

/**
 * Convert odd-r offset coordinates to cube coordinates.
 */
export function offsetToCube(col: number, row: number): CubeCoord {
  const x = col - (row - (row & 1)) / 2;
  const z = row;
  // Use (-x - z) || 0 to avoid -0
  const y = -x - z || 0;
  return { x: x || 0, y, z: z || 0 };
}

/**
 * Convert cube coordinates to odd-r offset coordinates.
 */
export function cubeToOffset(cube: CubeCoord): GridPosition {
  const col = cube.x + (cube.z - (cube.z & 1)) / 2;
  return { row: cube.z || 0, col: col || 0 };
}

export function positionToCube(pos: GridPosition): CubeCoord {
  return offsetToCube(pos.col, pos.row);
}

// ============================================================================
// Neighbors & Distance
// ============================================================================

/**
 * The six adjacent cube coordinates, in CUBE_DIRECTIONS order.
 */
export function cubeNeighbors(cube: CubeCoord): CubeCoord[] {
  return CUBE_DIRECTIONS.map((dir) => ({
    x: cube.x + dir.x || 0,
    y: cube.y + dir.y || 0,
    z: cube.z + dir.z || 0,
  }));
}

/**
 * Hex distance in steps: (|dx| + |dy| + |dz|) / 2.
 */
export function cubeDistance(a: CubeCoord, b: CubeCoord): number {
  return (Math.abs(a.x - b.x) + Math.abs(a.y - b.y) + Math.abs(a.z - b.z)) / 2;
}

export function gridDistance(a: GridPosition, b: GridPosition): number {
  return cubeDistance(positionToCube(a), positionToCube(b));
}

export function gridNeighbors(pos: GridPosition): GridPosition[] {
  return cubeNeighbors(positionToCube(pos)).map(cubeToOffset);
}

// ============================================================================
// Utility Functions
// ============================================================================

export function isInBounds(pos: GridPosition, width: number, height: number): boolean {
  return pos.row >= 0 && pos.row < height && pos.col >= 0 && pos.col < width;
}

export function positionsEqual(a: GridPosition, b: GridPosition): boolean {
  return a.row === b.row && a.col === b.col;
}

export function cubesEqual(a: CubeCoord, b: CubeCoord): boolean {
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

/**
 * String key for use in Maps and Sets
 */
export function positionKey(pos: GridPosition): string {
  return `${pos.row},${pos.col}`;
}
