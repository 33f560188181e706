/**
 * Movement Pathfinding
 *
 * A* over the hex grid with uniform step cost, bounded by a movement-point
 * budget. Searches in cube space; positions cross the boundary in odd-r
 * offset form.
 */

import type { CubeCoord, GridPosition } from './types.js';
import {
  cubeDistance,
  cubeNeighbors,
  cubeToOffset,
  cubesEqual,
  isInBounds,
  positionKey,
  positionToCube,
  positionsEqual,
} from './hex.js';

export type BlockedPredicate = (position: GridPosition) => boolean;

export interface PathOptions {
  /**
   * Skip the blocking check for the goal itself. Off by default, so an
   * occupied goal yields no path.
   */
  exemptDestination?: boolean;
}

interface NodeRecord {
  cube: CubeCoord;
  position: GridPosition;
  g: number;
  h: number;
  seq: number;
  parent: NodeRecord | null;
}

// Lowest f, then lowest h, then earliest insertion.
function popLowest(open: NodeRecord[]): NodeRecord | undefined {
  if (open.length === 0) return undefined;
  let bestIndex = 0;
  for (let i = 1; i < open.length; i++) {
    const a = open[i];
    const b = open[bestIndex];
    const fa = a.g + a.h;
    const fb = b.g + b.h;
    if (fa < fb || (fa === fb && (a.h < b.h || (a.h === b.h && a.seq < b.seq)))) {
      bestIndex = i;
    }
  }
  const [node] = open.splice(bestIndex, 1);
  return node;
}

function reconstruct(node: NodeRecord): GridPosition[] {
  const path: GridPosition[] = [];
  let current: NodeRecord | null = node;
  while (current) {
    path.push(current.position);
    current = current.parent;
  }
  return path.reverse();
}

/**
 * Find a shortest path from start to goal (both inclusive) that takes at most
 * `maxMovePoints` steps.
 *
 * Returns `[start]` when start equals goal, and null when the goal is out of
 * bounds, blocked, unreachable, or farther than the budget allows. The start
 * hex is never tested against `isBlocked`.
 */
export function findPath(
  start: GridPosition,
  goal: GridPosition,
  maxMovePoints: number,
  mapWidth: number,
  mapHeight: number,
  isBlocked: BlockedPredicate,
  options: PathOptions = {}
): GridPosition[] | null {
  const origin: GridPosition = { row: start.row, col: start.col };
  if (positionsEqual(origin, goal)) {
    return [origin];
  }
  if (!isInBounds(goal, mapWidth, mapHeight)) {
    return null;
  }

  const exemptDestination = options.exemptDestination ?? false;
  if (!exemptDestination && isBlocked(goal)) {
    return null;
  }

  const goalCube = positionToCube(goal);
  const startCube = positionToCube(start);
  let seq = 0;

  const open: NodeRecord[] = [
    {
      cube: startCube,
      position: origin,
      g: 0,
      h: cubeDistance(startCube, goalCube),
      seq: seq++,
      parent: null,
    },
  ];
  const bestG = new Map<string, number>([[positionKey(start), 0]]);
  const closed = new Set<string>();

  for (let current = popLowest(open); current; current = popLowest(open)) {
    const currentKey = positionKey(current.position);
    if (closed.has(currentKey)) continue;

    if (cubesEqual(current.cube, goalCube)) {
      return reconstruct(current);
    }
    closed.add(currentKey);

    for (const neighbor of cubeNeighbors(current.cube)) {
      const position = cubeToOffset(neighbor);
      const key = positionKey(position);
      if (closed.has(key)) continue;
      if (!isInBounds(position, mapWidth, mapHeight)) continue;

      const isGoal = cubesEqual(neighbor, goalCube);
      if (!(isGoal && exemptDestination) && isBlocked(position)) continue;

      const g = current.g + 1;
      if (g > maxMovePoints) continue;
      if (g >= (bestG.get(key) ?? Infinity)) continue;

      bestG.set(key, g);
      open.push({
        cube: neighbor,
        position,
        g,
        h: cubeDistance(neighbor, goalCube),
        seq: seq++,
        parent: current,
      });
    }
  }

  return null;
}

export interface ReachablePosition {
  position: GridPosition;
  cost: number;
}

/**
 * Every position reachable from start within the budget, with its step cost,
 * in breadth-first discovery order. The start itself is not included.
 */
export function reachablePositions(
  start: GridPosition,
  maxMovePoints: number,
  mapWidth: number,
  mapHeight: number,
  isBlocked: BlockedPredicate
): ReachablePosition[] {
  const visited = new Set<string>([positionKey(start)]);
  const result: ReachablePosition[] = [];
  let frontier: GridPosition[] = [start];

  for (let cost = 1; cost <= maxMovePoints && frontier.length > 0; cost++) {
    const next: GridPosition[] = [];
    for (const pos of frontier) {
      for (const neighbor of cubeNeighbors(positionToCube(pos))) {
        const position = cubeToOffset(neighbor);
        const key = positionKey(position);
        if (visited.has(key)) continue;
        visited.add(key);
        if (!isInBounds(position, mapWidth, mapHeight) || isBlocked(position)) continue;
        result.push({ position, cost });
        next.push(position);
      }
    }
    frontier = next;
  }

  return result;
}
