import type { Vec3Like } from '@minenav/shared';

export interface ChunkSize {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface LocalCell {
  x: number;
  y: number;
  z: number;
  value: number;
}

/**
 * Dense cuboid of optional cell values.
 *
 * Cells live in one Float64Array in row-major order (x outer, y middle, z inner);
 * NaN marks an unobserved cell.
 */
export class Chunk {
  readonly size: ChunkSize;
  private cells: Float64Array;
  private present = 0;

  constructor(size: ChunkSize) {
    this.size = size;
    this.cells = new Float64Array(size.x * size.y * size.z).fill(NaN);
  }

  get volume(): number {
    return this.cells.length;
  }

  /** Number of observed cells */
  get presentCount(): number {
    return this.present;
  }

  indexOf(x: number, y: number, z: number): number {
    return (x * this.size.y + y) * this.size.z + z;
  }

  localOf(index: number): Vec3Like {
    const z = index % this.size.z;
    const rest = (index - z) / this.size.z;
    const y = rest % this.size.y;
    const x = (rest - y) / this.size.y;
    return { x, y, z };
  }

  get(x: number, y: number, z: number): number | undefined {
    return this.getAt(this.indexOf(x, y, z));
  }

  getAt(index: number): number | undefined {
    const value = this.cells[index];
    return Number.isNaN(value) ? undefined : value;
  }

  set(x: number, y: number, z: number, value: number | undefined): void {
    const index = this.indexOf(x, y, z);
    const wasPresent = !Number.isNaN(this.cells[index]);
    const isPresent = value !== undefined;
    this.cells[index] = isPresent ? value : NaN;
    this.present += Number(isPresent) - Number(wasPresent);
  }

  /**
   * Observed cells in row-major order
   */
  *entries(): Generator<LocalCell> {
    if (this.present === 0) return;
    for (let index = 0; index < this.cells.length; index++) {
      const value = this.cells[index];
      if (Number.isNaN(value)) continue;
      const { x, y, z } = this.localOf(index);
      yield { x, y, z, value };
    }
  }

  /** Raw view for serialisation; NaN = absent */
  snapshot(): Float64Array {
    return this.cells.slice();
  }

  /**
   * Swap in a complete cell array (as decoded from disk)
   */
  replaceCells(cells: Float64Array): void {
    if (cells.length !== this.cells.length) {
      throw new RangeError(`Expected ${this.cells.length} cells, got ${cells.length}`);
    }
    this.cells = cells;
    this.present = cells.reduce((count, value) => count + (Number.isNaN(value) ? 0 : 1), 0);
  }
}
