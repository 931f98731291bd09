import type { CellTypeTag } from './types/spatial.js';

// ============================================================================
// World Constants
// ============================================================================

/** Lowest Y a path may enter (y = 0 is solid bedrock) */
export const WORLD_MIN_Y = 1;

/** Highest Y a path may enter */
export const WORLD_MAX_Y = 255;

/** Bedrock only generates below this height, so the map is not consulted above it */
export const BEDROCK_CEILING_Y = 5;

// ============================================================================
// Chunk Storage Constants
// ============================================================================

export const CHUNK_MAGIC = 'CHNK';
export const CHUNK_EXTENSION = 'chnk';

/** On-disk marker for an unobserved cell */
export const ABSENT_SENTINEL = -1;

/** magic(4) + sizeX/Y/Z(3 x int32) + typeTag(1) */
export const CHUNK_HEADER_BYTES = 17;

export const DEFAULT_CHUNK_SIZE = { x: 16, y: 256, z: 16 } as const;
export const DEFAULT_CELL_TYPE: CellTypeTag = 'i';

// ============================================================================
// Movement Cost Constants
// ============================================================================

export const DEFAULT_COSTS = {
  move: 1,
  turn: 1,
  turnAround: 2,
  breaking: 1.555,
} as const;
