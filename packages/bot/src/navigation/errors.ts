import type { Vec3Like } from '@minenav/shared';

const fmt = (v: Vec3Like): string => `(${v.x}, ${v.y}, ${v.z})`;

export class NavigationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Thrown when an orientation is asked for between two cells that are not unit neighbours
 */
export class AdjacencyError extends NavigationError {
  constructor(readonly from: Vec3Like, readonly to: Vec3Like) {
    super(`Supplied blocks are not adjacent: ${fmt(from)} and ${fmt(to)}`);
  }
}

/**
 * The open set ran dry before the goal was popped
 */
export class GoalUnreachableError extends NavigationError {
  constructor(readonly start: Vec3Like, readonly goal: Vec3Like, readonly expansions: number) {
    super(`No path from ${fmt(start)} to ${fmt(goal)} after ${expansions} expansions`);
  }
}

export class SearchAbortedError extends NavigationError {
  constructor(reason: string) {
    super(`Search aborted: ${reason}`);
  }
}

/**
 * A chunk file could not be read or written, or its contents are malformed
 */
export class ChunkFileError extends NavigationError {
  constructor(readonly filePath: string, message: string, cause?: unknown) {
    super(`${message} (${filePath})`, cause === undefined ? undefined : { cause });
  }
}

export class InvalidCellValueError extends NavigationError {
  constructor(readonly value: number, readonly reason: string) {
    super(`Cell value ${value} rejected: ${reason}`);
  }
}

export class MovementFailedError extends NavigationError {
  constructor(readonly target: Vec3Like, readonly attempts: number) {
    super(`Could not move into ${fmt(target)} after ${attempts} attempts`);
  }
}
