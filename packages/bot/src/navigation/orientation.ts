import { Vec3 } from 'vec3';
import type { Facing, HorizontalFacing, RelativeSide, Vec3Like } from '@minenav/shared';
import { AdjacencyError, NavigationError } from './errors.js';

// ============================================================================
// Facings
// ============================================================================

const FACING_DELTAS: Record<Facing, readonly [number, number, number]> = {
  down: [0, -1, 0],
  up: [0, 1, 0],
  north: [0, 0, -1],
  south: [0, 0, 1],
  west: [-1, 0, 0],
  east: [1, 0, 0],
};

const OPPOSITES: Record<Facing, Facing> = {
  down: 'up',
  up: 'down',
  north: 'south',
  south: 'north',
  west: 'east',
  east: 'west',
};

// Order of right turns seen from above
const CLOCKWISE: readonly HorizontalFacing[] = ['north', 'east', 'south', 'west'];

export const HORIZONTAL_FACINGS: readonly HorizontalFacing[] = CLOCKWISE;

export function isHorizontalFacing(facing: Facing): facing is HorizontalFacing {
  return facing !== 'up' && facing !== 'down';
}

/**
 * Unit step taken when moving one cell towards `facing`
 */
export function facingDelta(facing: Facing): Vec3 {
  const [dx, dy, dz] = FACING_DELTAS[facing];
  return new Vec3(dx, dy, dz);
}

export function isOppositeDirection(first: Facing, second: Facing): boolean {
  return OPPOSITES[first] === second;
}

export function turnRightOf(facing: HorizontalFacing): HorizontalFacing {
  return CLOCKWISE[(CLOCKWISE.indexOf(facing) + 1) % 4];
}

export function turnLeftOf(facing: HorizontalFacing): HorizontalFacing {
  return CLOCKWISE[(CLOCKWISE.indexOf(facing) + 3) % 4];
}

// ============================================================================
// Orientation Between Adjacent Cells
// ============================================================================

/**
 * Facing the agent has after stepping from `fromNode` into the adjacent `toNode`.
 *
 * Vertical steps keep the current facing unless `respectVertical` is set,
 * in which case they report 'up' or 'down'.
 */
export function calcOrientation(
  fromNode: Vec3Like,
  toNode: Vec3Like,
  fromFacing: HorizontalFacing,
  respectVertical?: false
): HorizontalFacing;
export function calcOrientation(
  fromNode: Vec3Like,
  toNode: Vec3Like,
  fromFacing: HorizontalFacing,
  respectVertical: true
): Facing;
export function calcOrientation(
  fromNode: Vec3Like,
  toNode: Vec3Like,
  fromFacing: HorizontalFacing,
  respectVertical = false
): Facing {
  const dx = toNode.x - fromNode.x;
  const dy = toNode.y - fromNode.y;
  const dz = toNode.z - fromNode.z;

  if (Math.abs(dx) + Math.abs(dy) + Math.abs(dz) !== 1) {
    throw new AdjacencyError(fromNode, toNode);
  }

  if (dx === -1) return 'west';
  if (dx === 1) return 'east';
  if (dz === -1) return 'north';
  if (dz === 1) return 'south';
  if (!respectVertical) return fromFacing;
  return dy === 1 ? 'up' : 'down';
}

/**
 * Side on which a block sits relative to an agent facing `fromFacing`, given
 * either the adjacent block itself or the facing needed to look at it.
 */
export function relativeOrientation(
  fromNode: Vec3Like,
  toNode: Vec3Like | undefined,
  fromFacing: HorizontalFacing,
  toFacing?: Facing
): RelativeSide {
  let target: Facing;
  if (toFacing !== undefined) {
    target = toFacing;
  } else if (toNode !== undefined) {
    target = calcOrientation(fromNode, toNode, fromFacing, true);
  } else {
    throw new NavigationError('relativeOrientation needs a target block or a target facing');
  }

  if (target === fromFacing) return 'front';
  if (!isHorizontalFacing(target)) return target;
  if (isOppositeDirection(target, fromFacing)) return 'back';
  return turnRightOf(fromFacing) === target ? 'right' : 'left';
}

// ============================================================================
// Relative Offsets
// ============================================================================

/**
 * Offset in the agent's own frame: forward (+) / backward (-), up / down, right / left
 */
export interface RelativeOffset {
  forward: number;
  up: number;
  right: number;
}

/**
 * World coordinates of `offset` applied to `base` by an agent facing `facing`
 */
export function coordsFromOffset(base: Vec3Like, offset: RelativeOffset, facing: HorizontalFacing): Vec3 {
  const y = base.y + offset.up;
  switch (facing) {
    case 'south':
      return new Vec3(base.x - offset.right, y, base.z + offset.forward);
    case 'north':
      return new Vec3(base.x + offset.right, y, base.z - offset.forward);
    case 'east':
      return new Vec3(base.x + offset.forward, y, base.z + offset.right);
    case 'west':
      return new Vec3(base.x - offset.forward, y, base.z - offset.right);
  }
}
