import { Vec3 } from 'vec3';
import {
  BEDROCK_CEILING_Y,
  Logger,
  WORLD_MAX_Y,
  WORLD_MIN_Y,
  type CostConfig,
  type HorizontalFacing,
  type Vec3Like,
} from '@minenav/shared';
import type { BlockClassifier } from './block-classifier.js';
import { createTimeCost, type CostFunction } from './costs.js';
import { GoalUnreachableError, SearchAbortedError } from './errors.js';
import { heuristicManhattan, type Heuristic } from './heuristics.js';
import { calcOrientation } from './orientation.js';
import { PriorityQueue } from './priority-queue.js';
import type { WorldMap } from './world-map.js';

const logger = new Logger('Pathfinder');

const NEIGHBOUR_OFFSETS: readonly Vec3[] = [
  new Vec3(1, 0, 0),
  new Vec3(-1, 0, 0),
  new Vec3(0, 1, 0),
  new Vec3(0, -1, 0),
  new Vec3(0, 0, 1),
  new Vec3(0, 0, -1),
];

export interface SearchBounds {
  min: Vec3Like;
  max: Vec3Like;
}

export interface FindPathOptions {
  cost?: CostFunction;
  heuristic?: Heuristic;
  /** Checked before every expansion */
  signal?: AbortSignal;
  /** Wall-clock budget in milliseconds, checked before every expansion */
  timeoutMs?: number;
  maxExpansions?: number;
  /** Inclusive box the search may not leave */
  bounds?: SearchBounds;
}

export interface PathResult {
  /** Goal first, the step next to the start last; the start itself is left out */
  path: Vec3[];
  cost: number;
  expansions: number;
}

export interface PathfinderOptions {
  costs?: CostConfig;
  maxExpansions?: number;
}

interface OpenEntry {
  node: Vec3;
  costSoFar: number;
}

const keyOf = (v: Vec3Like): string => `${v.x},${v.y},${v.z}`;

function inBounds(node: Vec3Like, bounds: SearchBounds | undefined): boolean {
  if (bounds === undefined) return true;
  return (
    node.x >= bounds.min.x && node.x <= bounds.max.x &&
    node.y >= bounds.min.y && node.y <= bounds.max.y &&
    node.z >= bounds.min.z && node.z <= bounds.max.z
  );
}

/**
 * A* over the 6-connected block lattice described by a world map
 */
export class Pathfinder {
  readonly defaultCost: CostFunction;
  private readonly maxExpansions: number;

  constructor(
    private readonly map: WorldMap,
    private readonly classifier: BlockClassifier,
    options: PathfinderOptions = {}
  ) {
    this.defaultCost = createTimeCost(map, classifier, options.costs);
    this.maxExpansions = options.maxExpansions ?? Infinity;
  }

  /**
   * Whether a path may enter `node`: inside the world's height band and, near
   * the floor, not bedrock
   */
  isEnterable(node: Vec3Like): boolean {
    if (node.y < WORLD_MIN_Y || node.y > WORLD_MAX_Y) return false;
    // bedrock only generates in the bottom layers, skip the lookup above them
    if (node.y < BEDROCK_CEILING_Y) {
      return this.classifier.classify(this.map.get(node)) !== 'bedrock';
    }
    return true;
  }

  neighbours(node: Vec3, bounds?: SearchBounds): Vec3[] {
    const result: Vec3[] = [];
    for (const offset of NEIGHBOUR_OFFSETS) {
      const next = node.plus(offset);
      if (inBounds(next, bounds) && this.isEnterable(next)) {
        result.push(next);
      }
    }
    return result;
  }

  /**
   * Cheapest path from `start` (facing `startFacing`) to `goal`.
   *
   * @throws GoalUnreachableError when the open set empties first
   * @throws SearchAbortedError when the signal fires, the deadline passes or the expansion budget runs out
   */
  findPath(goal: Vec3Like, start: Vec3Like, startFacing: HorizontalFacing, options: FindPathOptions = {}): PathResult {
    const cost = options.cost ?? this.defaultCost;
    const heuristic = options.heuristic ?? heuristicManhattan;
    const maxExpansions = options.maxExpansions ?? this.maxExpansions;
    const goalNode = new Vec3(goal.x, goal.y, goal.z);
    const startNode = new Vec3(start.x, start.y, start.z);
    const goalKey = keyOf(goalNode);
    // timers cannot fire while the search runs, so the clock is polled instead
    const deadline = options.timeoutMs === undefined ? Infinity : performance.now() + options.timeoutMs;

    if (goalNode.equals(startNode)) {
      return { path: [], cost: 0, expansions: 0 };
    }
    if (!inBounds(goalNode, options.bounds) || !this.isEnterable(goalNode)) {
      logger.warn('Goal cannot be entered', { goal: goalNode });
      throw new GoalUnreachableError(startNode, goalNode, 0);
    }

    const openQueue = new PriorityQueue<OpenEntry>();
    const costSoFar = new Map<string, number>();
    const cameFrom = new Map<string, Vec3>();
    const orientation = new Map<string, HorizontalFacing>();

    const startKey = keyOf(startNode);
    openQueue.put({ node: startNode, costSoFar: 0 }, 0);
    costSoFar.set(startKey, 0);
    orientation.set(startKey, startFacing);

    let expansions = 0;
    let reached = false;

    while (!openQueue.empty()) {
      const entry = openQueue.pop();
      if (entry === undefined) break;

      const currentKey = keyOf(entry.node);
      const currentCost = costSoFar.get(currentKey) ?? Infinity;
      // a cheaper entry for this node has already been expanded
      if (entry.costSoFar > currentCost) continue;

      if (currentKey === goalKey) {
        reached = true;
        break;
      }

      if (options.signal?.aborted) {
        throw new SearchAbortedError(`signal fired after ${expansions} expansions`);
      }
      if (deadline !== Infinity && performance.now() >= deadline) {
        throw new SearchAbortedError(`${options.timeoutMs} ms search timeout exceeded after ${expansions} expansions`);
      }
      if (expansions >= maxExpansions) {
        throw new SearchAbortedError(`expansion budget of ${maxExpansions} exhausted`);
      }
      expansions++;

      const currentFacing = orientation.get(currentKey) ?? startFacing;
      for (const next of this.neighbours(entry.node, options.bounds)) {
        const nextKey = keyOf(next);
        const newCost = currentCost + cost(entry.node, next, currentFacing);
        const known = costSoFar.get(nextKey);

        if (known === undefined || newCost < known) {
          costSoFar.set(nextKey, newCost);
          cameFrom.set(nextKey, entry.node);
          orientation.set(nextKey, calcOrientation(entry.node, next, currentFacing));
          openQueue.put({ node: next, costSoFar: newCost }, newCost + heuristic(next, goalNode));
        }
      }
    }

    if (!reached) {
      logger.warn('Goal unreachable', { start: startNode, goal: goalNode, expansions });
      throw new GoalUnreachableError(startNode, goalNode, expansions);
    }

    const path: Vec3[] = [];
    let current: Vec3 | undefined = goalNode;
    while (current !== undefined && !current.equals(startNode)) {
      path.push(current);
      current = cameFrom.get(keyOf(current));
    }

    const total = costSoFar.get(goalKey) ?? Infinity;
    logger.debug('Path found', { start: startNode, goal: goalNode, cost: total, steps: path.length, expansions });
    return { path, cost: total, expansions };
  }
}

/**
 * Heuristic that runs a full search from the node to the goal. Exact, and far too
 * slow for anything but ranking a handful of candidates.
 */
export function createPathHeuristic(pathfinder: Pathfinder, facing: HorizontalFacing): Heuristic {
  return (node, goal) => {
    try {
      return pathfinder.findPath(goal, node, facing).cost;
    } catch (error) {
      if (error instanceof GoalUnreachableError) return Infinity;
      throw error;
    }
  };
}
