import type { Vec3Like } from '@minenav/shared';

export type Heuristic = (node: Vec3Like, goal: Vec3Like) => number;

/**
 * Manhattan distance, plus one when both horizontal axes differ: reaching
 * such a goal needs at least one turn.
 */
export function heuristicManhattan(node: Vec3Like, goal: Vec3Like): number {
  const dx = node.x - goal.x;
  const dz = node.z - goal.z;
  return Math.abs(dx) + Math.abs(node.y - goal.y) + Math.abs(dz) + (dx !== 0 && dz !== 0 ? 1 : 0);
}

export function heuristicEuclidean(node: Vec3Like, goal: Vec3Like): number {
  return Math.sqrt((goal.x - node.x) ** 2 + (goal.y - node.y) ** 2 + (goal.z - node.z) ** 2);
}

/** Turns A* into Dijkstra */
export function heuristicZero(): number {
  return 0;
}
