import { DEFAULT_COSTS, type CostConfig, type HorizontalFacing, type Vec3Like } from '@minenav/shared';
import type { BlockClassifier } from './block-classifier.js';
import { calcOrientation, isOppositeDirection } from './orientation.js';
import type { WorldMap } from './world-map.js';

/** Parts of a step's cost that a caller may leave out */
export interface CostIgnores {
  walking?: boolean;
  turning?: boolean;
  breaking?: boolean;
}

/**
 * Cost of stepping from `from` into the adjacent `to` while facing `fromFacing`. Never negative.
 */
export type CostFunction = (
  from: Vec3Like,
  to: Vec3Like,
  fromFacing: HorizontalFacing,
  ignore?: CostIgnores
) => number;

/**
 * Time-based step cost: walking, plus turning when the step changes facing,
 * plus breaking when the target cell is not known to be air.
 */
export function createTimeCost(
  map: WorldMap,
  classifier: BlockClassifier,
  weights: CostConfig = DEFAULT_COSTS
): CostFunction {
  return (from, to, fromFacing, ignore = {}) => {
    const afterFacing = calcOrientation(from, to, fromFacing);
    let total = 0;

    if (!ignore.walking) {
      total += weights.move;
    }
    if (!ignore.turning && afterFacing !== fromFacing) {
      total += isOppositeDirection(fromFacing, afterFacing) ? weights.turnAround : weights.turn;
    }
    if (!ignore.breaking && classifier.classify(map.get(to)) !== 'air') {
      total += weights.breaking;
    }
    return total;
  };
}

export interface PathCostOptions {
  start: Vec3Like;
  startFacing: HorizontalFacing;
  /** Stop next to the goal: the last step only pays for turning towards it */
  skipGoal?: boolean;
}

/**
 * Price a goal-first path (as returned by the pathfinder) walked from `start`
 */
export function calcCostForPath(path: readonly Vec3Like[], cost: CostFunction, options: PathCostOptions): number {
  let facing = options.startFacing;
  let previous = options.start;
  let total = 0;

  for (let i = path.length - 1; i >= 0; i--) {
    const node = path[i];
    const lastStep = i === 0;
    total += lastStep && options.skipGoal
      ? cost(previous, node, facing, { walking: true, breaking: true })
      : cost(previous, node, facing);
    facing = calcOrientation(previous, node, facing);
    previous = node;
  }
  return total;
}
