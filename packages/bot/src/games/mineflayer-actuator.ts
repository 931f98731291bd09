import type { Bot } from 'mineflayer';
import { Vec3 } from 'vec3';
import {
  Logger,
  type HorizontalFacing,
  type MoveDirection,
  type TurnDirection,
} from '@minenav/shared';
import type { Actuator } from '../navigation/navigator.js';
import { facingDelta, turnLeftOf, turnRightOf } from '../navigation/orientation.js';
import { movementLogger } from '../utils/movement-logger.js';

const logger = new Logger('MineflayerActuator');

type WorldBlock = NonNullable<ReturnType<Bot['blockAt']>>;

// Yaw is counter-clockwise from north, matching Math.atan2(-dx, -dz)
const FACING_YAW: Record<HorizontalFacing, number> = {
  north: 0,
  west: Math.PI / 2,
  south: Math.PI,
  east: -Math.PI / 2,
};

const YAW_ORDER: readonly HorizontalFacing[] = ['north', 'west', 'south', 'east'];

export function facingFromYaw(yaw: number): HorizontalFacing {
  const quarter = Math.round(yaw / (Math.PI / 2));
  return YAW_ORDER[((quarter % 4) + 4) % 4];
}

const PASSABLE_BLOCKS = new Set(['air', 'cave_air', 'void_air', 'water', 'lava']);

export interface MineflayerActuatorOptions {
  /** Ticks to wait for a one-block step before calling it blocked */
  stepTimeoutTicks?: number;
}

/**
 * Grid-step actuator on top of a mineflayer bot: faces the four cardinal
 * directions and moves one block at a time
 */
export class MineflayerActuator implements Actuator {
  private facing: HorizontalFacing;
  private readonly stepTimeoutTicks: number;

  constructor(private readonly bot: Bot, options: MineflayerActuatorOptions = {}) {
    this.facing = facingFromYaw(bot.entity.yaw);
    this.stepTimeoutTicks = options.stepTimeoutTicks ?? 20;
  }

  currentPosition(): Vec3 {
    return this.bot.entity.position.floored();
  }

  currentOrientation(): HorizontalFacing {
    return this.facing;
  }

  async turn(direction: TurnDirection): Promise<void> {
    switch (direction) {
      case 'left':
        this.facing = turnLeftOf(this.facing);
        break;
      case 'right':
        this.facing = turnRightOf(this.facing);
        break;
      case 'back':
        this.facing = turnRightOf(turnRightOf(this.facing));
        break;
    }
    const yaw = FACING_YAW[this.facing];
    await this.bot.look(yaw, 0, true);
    movementLogger.logTurn(direction, yaw);
  }

  async attemptMove(direction: MoveDirection): Promise<boolean> {
    const from = this.currentPosition();
    const target = this.targetOf(direction);
    const control = direction === 'forward' ? 'forward' : direction === 'up' ? 'jump' : null;

    if (control !== null) {
      this.bot.setControlState(control, true);
    }
    let reached = false;
    try {
      for (let tick = 0; tick < this.stepTimeoutTicks && !reached; tick++) {
        await this.bot.waitForTicks(1);
        reached = this.currentPosition().equals(target);
      }
    } finally {
      this.bot.clearControlStates();
    }

    movementLogger.logStep(direction, from, target, reached);
    if (!reached) {
      logger.debug('Step did not complete', { direction, from, target });
    }
    return reached;
  }

  async clearObstruction(direction: MoveDirection): Promise<boolean> {
    const target = this.targetOf(direction);
    const block = this.bot.blockAt(target);
    if (!block || PASSABLE_BLOCKS.has(block.name)) return false;

    if (!this.bot.canDigBlock(block)) {
      logger.warn('Cannot dig block in the way', { block: block.name, target });
      return false;
    }

    await this.dig(block);
    movementLogger.logDig(target, block.name);
    return true;
  }

  private async dig(block: WorldBlock): Promise<void> {
    // Swing while digging so the animation matches the break
    const swingInterval = setInterval(() => this.bot.swingArm('right'), 250);
    try {
      await this.bot.dig(block);
    } finally {
      clearInterval(swingInterval);
    }
  }

  private targetOf(direction: MoveDirection): Vec3 {
    const position = this.currentPosition();
    switch (direction) {
      case 'forward':
        return position.plus(facingDelta(this.facing));
      case 'up':
        return position.offset(0, 1, 0);
      case 'down':
        return position.offset(0, -1, 0);
    }
  }
}
