import { Vec3 } from 'vec3';
import { Logger, type HorizontalFacing, type Vec3Like } from '@minenav/shared';
import { GoalUnreachableError, SearchAbortedError } from './errors.js';
import { heuristicEuclidean, heuristicManhattan, type Heuristic } from './heuristics.js';
import type { FindPathOptions, Pathfinder } from './pathfinder.js';
import { WorldMap } from './world-map.js';

const logger = new Logger('Tour');

// Reversals must beat the current tour by more than this to count
const IMPROVEMENT_EPSILON = 1e-9;

export type DistanceFunction = (from: Vec3Like, to: Vec3Like) => number;

/**
 * Fixed first and last stops. Without anchors a tour is a closed loop.
 */
export interface TourAnchors {
  start: Vec3Like;
  end: Vec3Like;
}

export interface TourOptions {
  /** Edge cost, straight-line distance by default */
  distance?: DistanceFunction;
  /**
   * Whether distance(a, b) === distance(b, a). Symmetric costs let 2-opt price a
   * reversal from its two changed edges; otherwise the whole tour is repriced.
   * Defaults to true only for the built-in distance.
   */
  symmetric?: boolean;
  /** Checked between 2-opt passes */
  signal?: AbortSignal;
}

export interface TourResult {
  tour: Vec3[];
  cost: number;
}

export interface TwoOptResult extends TourResult {
  /** Full scans performed, the last one finding nothing to improve */
  passes: number;
}

const keyOf = (v: Vec3Like): string => `${v.x},${v.y},${v.z}`;
const toVec3 = (v: Vec3Like): Vec3 => new Vec3(v.x, v.y, v.z);

function uniqueNodes(nodes: Iterable<Vec3Like>): Vec3[] {
  const seen = new Map<string, Vec3>();
  for (const node of nodes) {
    const key = keyOf(node);
    if (!seen.has(key)) seen.set(key, toVec3(node));
  }
  return [...seen.values()];
}

/**
 * Total edge cost of visiting `tour` in order, plus the edge back to the start when `closed`
 */
export function tourCost(tour: readonly Vec3Like[], closed: boolean, distance: DistanceFunction = heuristicEuclidean): number {
  let total = 0;
  for (let i = 0; i < tour.length - 1; i++) {
    total += distance(tour[i], tour[i + 1]);
  }
  if (closed && tour.length > 1) {
    total += distance(tour[tour.length - 1], tour[0]);
  }
  return total;
}

// ============================================================================
// Nearest Neighbour Construction
// ============================================================================

/**
 * Greedy tour: from the start, always move on to the closest unvisited node.
 *
 * Open tours start at `anchors.start`, visit everything else greedily and
 * finish at `anchors.end`; the anchors are added when missing from `nodes`.
 * Closed tours start from the first node given.
 */
export function tspGreedy(nodes: Iterable<Vec3Like>, anchors?: TourAnchors, options: TourOptions = {}): TourResult {
  const distance = options.distance ?? heuristicEuclidean;
  let remaining = uniqueNodes(nodes);
  const tour: Vec3[] = [];

  let current: Vec3 | undefined;
  if (anchors !== undefined) {
    const excluded = new Set([keyOf(anchors.start), keyOf(anchors.end)]);
    remaining = remaining.filter((node) => !excluded.has(keyOf(node)));
    current = toVec3(anchors.start);
  } else {
    current = remaining.shift();
  }

  if (current === undefined) {
    return { tour: [], cost: 0 };
  }
  tour.push(current);

  while (remaining.length > 0) {
    let bestIndex = 0;
    let bestDistance = distance(current, remaining[0]);
    for (let i = 1; i < remaining.length; i++) {
      const nodeDistance = distance(current, remaining[i]);
      if (nodeDistance < bestDistance) {
        bestDistance = nodeDistance;
        bestIndex = i;
      }
    }
    [current] = remaining.splice(bestIndex, 1);
    tour.push(current);
  }

  if (anchors !== undefined) {
    tour.push(toVec3(anchors.end));
  }

  return { tour, cost: tourCost(tour, anchors === undefined, distance) };
}

// ============================================================================
// 2-opt Refinement
// ============================================================================

function reverseSegment(tour: readonly Vec3[], i: number, k: number): Vec3[] {
  return [...tour.slice(0, i), ...tour.slice(i, k + 1).reverse(), ...tour.slice(k + 1)];
}

/**
 * First-improvement 2-opt: scan segment reversals, apply the first one that
 * shortens the tour and rescan from the start, until a full scan finds none.
 *
 * Open tours keep `anchors.start` first and `anchors.end` last.
 */
export function tspTwoOpt(initialTour: readonly Vec3Like[], anchors?: TourAnchors, options: TourOptions = {}): TwoOptResult {
  const distance = options.distance ?? heuristicEuclidean;
  const symmetric = options.symmetric ?? options.distance === undefined;
  const closed = anchors === undefined;

  let tour = initialTour.map(toVec3);
  if (anchors !== undefined) {
    const excluded = new Set([keyOf(anchors.start), keyOf(anchors.end)]);
    tour = [toVec3(anchors.start), ...tour.filter((node) => !excluded.has(keyOf(node))), toVec3(anchors.end)];
  }

  const n = tour.length;
  let bestCost = tourCost(tour, closed, distance);
  // open tours leave the last node alone as well as the first
  const lastI = closed ? n - 2 : n - 3;
  const lastK = closed ? n - 1 : n - 2;

  let passes = 0;
  let improved = true;
  while (improved) {
    if (options.signal?.aborted) {
      throw new SearchAbortedError(`2-opt stopped after ${passes} passes`);
    }
    improved = false;
    passes++;

    scan: for (let i = 1; i <= lastI; i++) {
      for (let k = i + 1; k <= lastK; k++) {
        let candidateCost: number;
        if (symmetric) {
          const before = tour[i - 1];
          const after = tour[(k + 1) % n];
          candidateCost = bestCost
            + distance(before, tour[k]) + distance(tour[i], after)
            - distance(before, tour[i]) - distance(tour[k], after);
        } else {
          candidateCost = tourCost(reverseSegment(tour, i, k), closed, distance);
        }

        if (candidateCost < bestCost - IMPROVEMENT_EPSILON) {
          tour = reverseSegment(tour, i, k);
          // reprice from scratch so rounding never accumulates
          bestCost = tourCost(tour, closed, distance);
          improved = true;
          break scan;
        }
      }
    }
  }

  return { tour, cost: bestCost, passes };
}

/**
 * Greedy construction refined by 2-opt
 */
export function shortestTour(nodes: Iterable<Vec3Like>, anchors?: TourAnchors, options: TourOptions = {}): TourResult {
  const greedy = tspGreedy(nodes, anchors, options);
  const result = tspTwoOpt(greedy.tour, anchors, options);
  logger.debug('Tour optimised', {
    nodes: result.tour.length,
    closed: anchors === undefined,
    greedyCost: greedy.cost,
    cost: result.cost,
    passes: result.passes,
  });
  return { tour: result.tour, cost: result.cost };
}

// ============================================================================
// Helpers
// ============================================================================

export interface NearestResult {
  node: Vec3;
  distance: number;
}

/**
 * Closest of `nodes` (coordinates, or the observed cells of a world map) to `from`
 */
export function nearestBlock(
  nodes: WorldMap | Iterable<Vec3Like>,
  from: Vec3Like,
  heuristic: Heuristic = heuristicManhattan
): NearestResult | undefined {
  const positions: Iterable<Vec3Like> = nodes instanceof WorldMap
    ? Array.from(nodes, ([position]) => position)
    : nodes;

  let best: NearestResult | undefined;
  for (const node of positions) {
    const nodeDistance = heuristic(from, node);
    if (best === undefined || nodeDistance < best.distance) {
      best = { node: toVec3(node), distance: nodeDistance };
    }
  }
  return best;
}

/**
 * Edge cost taken from real A* searches, cached per ordered pair.
 * Unreachable legs cost Infinity. Not symmetric: turning costs depend on direction.
 */
export function createPathCostDistance(
  pathfinder: Pathfinder,
  facing: HorizontalFacing,
  searchOptions: FindPathOptions = {}
): DistanceFunction {
  const cache = new Map<string, number>();
  return (from, to) => {
    const key = `${keyOf(from)}>${keyOf(to)}`;
    const cached = cache.get(key);
    if (cached !== undefined) return cached;

    let legCost: number;
    try {
      legCost = pathfinder.findPath(to, from, facing, searchOptions).cost;
    } catch (error) {
      if (!(error instanceof GoalUnreachableError)) throw error;
      legCost = Infinity;
    }
    cache.set(key, legCost);
    return legCost;
  };
}
