import { Vec3 } from 'vec3';
import {
  Logger,
  type HorizontalFacing,
  type MoveDirection,
  type TurnDirection,
  type Vec3Like,
} from '@minenav/shared';
import type { BlockClassifier } from './block-classifier.js';
import { GoalUnreachableError, MovementFailedError, SearchAbortedError } from './errors.js';
import { calcOrientation, isHorizontalFacing, relativeOrientation } from './orientation.js';
import type { FindPathOptions, PathResult, Pathfinder } from './pathfinder.js';
import { createPathCostDistance, shortestTour } from './tour.js';
import type { WorldMap } from './world-map.js';

const logger = new Logger('Navigator');

/**
 * Physical side of the agent. Implementations do their own low-level retries;
 * the navigator only retries a failed move by clearing the cell again.
 */
export interface Actuator {
  currentPosition(): Vec3;
  currentOrientation(): HorizontalFacing;
  turn(direction: TurnDirection): Promise<void>;
  /** Try to step one cell; false when something is in the way */
  attemptMove(direction: MoveDirection): Promise<boolean>;
  /** Break whatever occupies the next cell in `direction`; false when there was nothing to break */
  clearObstruction(direction: MoveDirection): Promise<boolean>;
}

export interface NavigatorOptions {
  maxMoveAttempts?: number;
  /** Wall-clock limit for each A* search */
  searchTimeoutMs?: number;
}

export interface GoToOptions extends FindPathOptions {
  /** Stop next to the goal, facing it, instead of entering it */
  skipGoal?: boolean;
}

export interface VisitOptions {
  /** Finish here; without it the walk ends at the last target */
  end?: Vec3Like;
  /** Order targets by real A* leg costs instead of straight-line distance */
  pathCosts?: boolean;
  skipGoal?: boolean;
}

export interface VisitSummary {
  visited: Vec3[];
  unreachable: Vec3[];
  cost: number;
}

function moveDirectionTo(from: Vec3Like, to: Vec3Like): MoveDirection {
  const dy = to.y - from.y;
  if (dy > 0) return 'up';
  if (dy < 0) return 'down';
  return 'forward';
}

/**
 * Executes planned paths through an actuator, keeping the world map in step
 */
export class Navigator {
  private readonly maxMoveAttempts: number;
  private readonly searchTimeoutMs: number | undefined;

  constructor(
    private readonly actuator: Actuator,
    private readonly map: WorldMap,
    private readonly pathfinder: Pathfinder,
    private readonly classifier: BlockClassifier,
    options: NavigatorOptions = {}
  ) {
    this.maxMoveAttempts = options.maxMoveAttempts ?? 10;
    this.searchTimeoutMs = options.searchTimeoutMs;
  }

  /**
   * Turn to `facing` with the fewest turns. Returns the facing afterwards.
   */
  async smartTurn(facing: HorizontalFacing): Promise<HorizontalFacing> {
    const current = this.actuator.currentOrientation();
    if (current !== facing) {
      const side = relativeOrientation(this.actuator.currentPosition(), undefined, current, facing);
      if (side === 'left' || side === 'right' || side === 'back') {
        await this.actuator.turn(side);
      }
    }
    return this.actuator.currentOrientation();
  }

  /**
   * Face an adjacent block. Blocks above or below need no turning.
   */
  async faceBlock(node: Vec3Like): Promise<HorizontalFacing> {
    const current = this.actuator.currentOrientation();
    const target = calcOrientation(this.actuator.currentPosition(), node, current, true);
    if (!isHorizontalFacing(target)) return current;
    return this.smartTurn(target);
  }

  /**
   * Walk a goal-first path of adjacent cells, digging through anything in the way.
   * With `skipGoal` the agent stops before the goal and turns to face it.
   */
  async navigatePath(path: readonly Vec3Like[], skipGoal = false): Promise<void> {
    const lastIndex = skipGoal ? 1 : 0;

    for (let i = path.length - 1; i >= lastIndex; i--) {
      const node = path[i];
      await this.faceBlock(node);

      const direction = moveDirectionTo(this.actuator.currentPosition(), node);
      if (this.classifier.classify(this.map.get(node)) !== 'air') {
        await this.actuator.clearObstruction(direction);
      }
      await this.enter(node, direction);

      this.map.set(node, this.classifier.airValue);
    }

    if (skipGoal && path.length > 0) {
      await this.faceBlock(path[0]);
    }
  }

  /**
   * Plan from the agent's current position and walk the result
   */
  async goTo(goal: Vec3Like, options: GoToOptions = {}): Promise<PathResult> {
    const { skipGoal = false, ...searchOptions } = options;
    const start = this.actuator.currentPosition();
    const result = this.pathfinder.findPath(goal, start, this.actuator.currentOrientation(), {
      ...searchOptions,
      timeoutMs: searchOptions.timeoutMs ?? this.searchTimeoutMs,
    });

    logger.info('Navigating', { from: start, to: goal, steps: result.path.length, cost: result.cost });
    await this.navigatePath(result.path, skipGoal);
    return result;
  }

  /**
   * Visit every target in tour order. Targets the pathfinder cannot reach, or
   * gives up on, are reported and skipped.
   */
  async visitAll(targets: Iterable<Vec3Like>, options: VisitOptions = {}): Promise<VisitSummary> {
    const start = this.actuator.currentPosition();
    const facing = this.actuator.currentOrientation();
    const distance = options.pathCosts ? createPathCostDistance(this.pathfinder, facing) : undefined;

    let order: Vec3[];
    if (options.end !== undefined) {
      order = shortestTour(targets, { start, end: options.end }, { distance }).tour.slice(1);
    } else {
      const loop = shortestTour([start, ...targets], undefined, { distance }).tour;
      const startIndex = loop.findIndex((node) => node.equals(start));
      order = [...loop.slice(startIndex + 1), ...loop.slice(0, startIndex)];
    }

    const summary: VisitSummary = { visited: [], unreachable: [], cost: 0 };
    for (const target of order) {
      try {
        const leg = await this.goTo(target, { skipGoal: options.skipGoal });
        summary.visited.push(target);
        summary.cost += leg.cost;
      } catch (error) {
        if (!(error instanceof GoalUnreachableError || error instanceof SearchAbortedError)) throw error;
        logger.warn('Skipping unreachable target', { target, reason: error.message });
        summary.unreachable.push(target);
      }
    }

    logger.info('Tour complete', {
      visited: summary.visited.length,
      unreachable: summary.unreachable.length,
      cost: summary.cost,
    });
    return summary;
  }

  private async enter(node: Vec3Like, direction: MoveDirection): Promise<void> {
    for (let attempt = 1; attempt <= this.maxMoveAttempts; attempt++) {
      if (await this.actuator.attemptMove(direction)) return;
      logger.debug('Move blocked, clearing', { target: node, attempt });
      await this.actuator.clearObstruction(direction);
    }
    logger.warn('Giving up on move', { target: node, attempts: this.maxMoveAttempts });
    throw new MovementFailedError(node, this.maxMoveAttempts);
  }
}
