/**
 * Spatial Types
 *
 * Vocabulary shared by the world map, the pathfinder and the actuator layer.
 */

export interface Vec3Like {
  x: number;
  y: number;
  z: number;
}

/**
 * The six axis-aligned directions an agent can face.
 * north = -z, south = +z, west = -x, east = +x.
 */
export type Facing = 'down' | 'up' | 'north' | 'south' | 'west' | 'east';

export type HorizontalFacing = Exclude<Facing, 'up' | 'down'>;

/**
 * Where a neighbouring block sits relative to the agent,
 * i.e. the single turn (or none) needed to face it.
 */
export type RelativeSide = 'front' | 'back' | 'left' | 'right' | 'up' | 'down';

export type TurnDirection = 'left' | 'right' | 'back';

export type MoveDirection = 'forward' | 'up' | 'down';

/**
 * Coarse block classes the pathfinder cares about
 */
export type BlockCategory = 'air' | 'bedrock' | 'liquid' | 'solid' | 'unknown';

/**
 * Per-cell numeric encoding of a chunk file:
 * b = int8, h = int16, i = int32, f = float32, d = float64 (all little-endian)
 */
export type CellTypeTag = 'b' | 'h' | 'i' | 'f' | 'd';
