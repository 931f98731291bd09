import * as fs from 'fs';
import * as path from 'path';
import { Vec3 } from 'vec3';
import {
  CHUNK_EXTENSION,
  DEFAULT_CELL_TYPE,
  DEFAULT_CHUNK_SIZE,
  Logger,
  type CellTypeTag,
  type Vec3Like,
} from '@minenav/shared';
import { Chunk, type ChunkSize } from './chunk.js';
import { CELL_ENCODINGS, decodeChunk, encodeChunk } from './chunk-codec.js';
import { ChunkFileError, InvalidCellValueError } from './errors.js';

const logger = new Logger('WorldMap');

export interface WorldMapOptions {
  chunkSize?: ChunkSize;
  storedType?: CellTypeTag;
  /** Directory holding one .chnk file per saved chunk */
  chunkDir?: string;
}

export type MapEntry = [position: Vec3, value: number];

export type LoadResult = 'loaded' | 'missing' | 'mismatch';

interface ChunkSlot {
  key: Vec3;
  chunk: Chunk;
}

// ============================================================================
// Coordinate Conversions
// ============================================================================

function floorDiv(a: number, b: number): number {
  return Math.floor(a / b);
}

function floorMod(a: number, b: number): number {
  return ((a % b) + b) % b;
}

export function chunkKeyOf(coord: Vec3Like, size: ChunkSize): Vec3 {
  return new Vec3(floorDiv(coord.x, size.x), floorDiv(coord.y, size.y), floorDiv(coord.z, size.z));
}

export function localOffsetOf(coord: Vec3Like, size: ChunkSize): Vec3 {
  return new Vec3(floorMod(coord.x, size.x), floorMod(coord.y, size.y), floorMod(coord.z, size.z));
}

const hashKey = (key: Vec3Like): string => `${key.x},${key.y},${key.z}`;

// ============================================================================
// World Map
// ============================================================================

/**
 * Sparse 3-D map from integer coordinates to observed block values,
 * split into fixed-size chunks that are saved and loaded one at a time.
 *
 * Reading a coordinate allocates its (empty) chunk if it does not exist yet.
 * The chunk stays empty until something is written, but it does show up in
 * `chunkCount()` and in the chunk enumeration order.
 */
export class WorldMap implements Iterable<MapEntry> {
  readonly chunkSize: ChunkSize;
  readonly storedType: CellTypeTag;
  readonly chunkDir: string;
  private chunks = new Map<string, ChunkSlot>();

  constructor(options: WorldMapOptions = {}) {
    const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
    for (const axis of ['x', 'y', 'z'] as const) {
      if (!Number.isInteger(chunkSize[axis]) || chunkSize[axis] <= 0) {
        throw new RangeError(`Chunk size must be a positive integer on every axis, got ${axis}=${chunkSize[axis]}`);
      }
    }
    this.chunkSize = { x: chunkSize.x, y: chunkSize.y, z: chunkSize.z };
    this.storedType = options.storedType ?? DEFAULT_CELL_TYPE;
    this.chunkDir = options.chunkDir ?? path.join(process.cwd(), 'data', 'chunks');
  }

  // --------------------------------------------------------------------------
  // Coordinate access
  // --------------------------------------------------------------------------

  get(coord: Vec3Like): number | undefined {
    const { chunk } = this.slotFor(coord);
    const local = localOffsetOf(coord, this.chunkSize);
    return chunk.get(local.x, local.y, local.z);
  }

  /**
   * Write an observed value, or clear the cell with `undefined`
   */
  set(coord: Vec3Like, value: number | undefined): void {
    if (value !== undefined) {
      this.assertStorable(value);
    }
    const { chunk } = this.slotFor(coord);
    const local = localOffsetOf(coord, this.chunkSize);
    chunk.set(local.x, local.y, local.z, value);
  }

  has(coord: Vec3Like): boolean {
    return this.get(coord) !== undefined;
  }

  /**
   * Whether `value` can be stored (and written to disk) without colliding with the absent sentinel
   */
  isStorable(value: number): boolean {
    return this.rejectionReason(value) === null;
  }

  // --------------------------------------------------------------------------
  // Ordinal access (1-based, over observed cells in iteration order)
  // --------------------------------------------------------------------------

  getByIndex(index: number): MapEntry | undefined {
    if (!Number.isInteger(index) || index < 1) return undefined;

    let remaining = index;
    for (const { key, chunk } of this.chunks.values()) {
      if (remaining > chunk.presentCount) {
        remaining -= chunk.presentCount;
        continue;
      }
      for (const cell of chunk.entries()) {
        if (--remaining === 0) {
          return [this.absoluteOf(key, cell), cell.value];
        }
      }
    }
    return undefined;
  }

  /**
   * Move the value of the `index`-th observed cell to `coord`, or clear that
   * cell when `coord` is omitted. Returns false when there is no such cell.
   *
   * Moving a cell changes the ordinal of every later cell.
   */
  setByIndex(index: number, coord?: Vec3Like): boolean {
    const entry = this.getByIndex(index);
    if (entry === undefined) return false;

    const [position, value] = entry;
    this.set(position, undefined);
    if (coord !== undefined) {
      this.set(coord, value);
    }
    return true;
  }

  /**
   * Enumerate observed cells as [ordinal, position, value], ordinals starting at 1
   */
  *indexed(): Generator<[number, Vec3, number]> {
    let ordinal = 0;
    for (const [position, value] of this.iterate()) {
      yield [++ordinal, position, value];
    }
  }

  // --------------------------------------------------------------------------
  // Iteration
  // --------------------------------------------------------------------------

  /**
   * Fresh cursor over every observed cell. Chunks come in allocation order,
   * cells within a chunk in row-major order (x, then y, then z).
   */
  iterate(): WorldMapCursor {
    return new WorldMapCursor([...this.chunks.values()], this.chunkSize);
  }

  [Symbol.iterator](): Iterator<MapEntry> {
    return this.iterate();
  }

  /** Number of observed cells */
  size(): number {
    let total = 0;
    for (const { chunk } of this.chunks.values()) {
      total += chunk.presentCount;
    }
    return total;
  }

  chunkCount(): number {
    return this.chunks.size;
  }

  /**
   * Whether the chunk owning `coord` has been allocated (this does not allocate it)
   */
  hasChunk(coord: Vec3Like): boolean {
    return this.chunks.has(hashKey(chunkKeyOf(coord, this.chunkSize)));
  }

  chunkKeyOf(coord: Vec3Like): Vec3 {
    return chunkKeyOf(coord, this.chunkSize);
  }

  // --------------------------------------------------------------------------
  // Persistence
  // --------------------------------------------------------------------------

  fileNameFor(coord: Vec3Like): string {
    const key = chunkKeyOf(coord, this.chunkSize);
    return path.join(this.chunkDir, `${key.x}_${key.y}_${key.z}.${CHUNK_EXTENSION}`);
  }

  /**
   * Write the whole chunk containing `coord` to its file
   */
  save(coord: Vec3Like): string {
    const { key, chunk } = this.slotFor(coord);
    const filePath = this.fileNameFor(coord);
    const data = encodeChunk(this.chunkSize, this.storedType, chunk.snapshot());

    try {
      fs.mkdirSync(this.chunkDir, { recursive: true });
      fs.writeFileSync(filePath, data);
    } catch (error) {
      throw new ChunkFileError(filePath, 'Failed to write chunk', error);
    }

    logger.debug('Chunk saved', { chunk: key, cells: chunk.presentCount, bytes: data.length });
    return filePath;
  }

  /**
   * Replace the chunk containing `coord` with the contents of its file.
   *
   * A missing file leaves the map untouched. So does a file whose magic or
   * dimensions differ from this map's configuration: that case is logged as
   * a warning and reported as 'mismatch' rather than thrown.
   */
  load(coord: Vec3Like): LoadResult {
    const { key, chunk } = this.slotFor(coord);
    const filePath = this.fileNameFor(coord);

    if (!fs.existsSync(filePath)) {
      logger.debug('No chunk file to load', { chunk: key });
      return 'missing';
    }

    let data: Buffer;
    try {
      data = fs.readFileSync(filePath);
    } catch (error) {
      throw new ChunkFileError(filePath, 'Failed to read chunk', error);
    }

    const result = decodeChunk(data, this.chunkSize);
    switch (result.status) {
      case 'malformed':
        throw new ChunkFileError(filePath, `Malformed chunk file: ${result.reason}`);

      case 'mismatch':
        logger.warn('Chunk file does not match map configuration, skipping', {
          file: path.basename(filePath),
          magic: result.header.magic,
          size: result.header.size,
          expected: this.chunkSize,
        });
        return 'mismatch';

      case 'ok':
        chunk.replaceCells(result.cells);
        logger.debug('Chunk loaded', { chunk: key, cells: chunk.presentCount, type: result.tag });
        return 'loaded';
    }
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private slotFor(coord: Vec3Like): ChunkSlot {
    const key = chunkKeyOf(coord, this.chunkSize);
    const hash = hashKey(key);
    let slot = this.chunks.get(hash);
    if (slot === undefined) {
      slot = { key, chunk: new Chunk(this.chunkSize) };
      this.chunks.set(hash, slot);
    }
    return slot;
  }

  private absoluteOf(key: Vec3Like, local: Vec3Like): Vec3 {
    return absoluteFromLocal(key, local, this.chunkSize);
  }

  private rejectionReason(value: number): string | null {
    const encoding = CELL_ENCODINGS[this.storedType];
    if (!Number.isFinite(value)) return 'not a finite number';
    if (value < 0) return 'negative values are reserved';
    if (encoding.integer && !Number.isInteger(value)) return `'${this.storedType}' cells hold integers only`;
    if (value > encoding.max) return `exceeds the '${this.storedType}' maximum of ${encoding.max}`;
    if (this.storedType === 'f' && Math.fround(value) !== value) return 'not representable as a 32-bit float';
    return null;
  }

  private assertStorable(value: number): void {
    const reason = this.rejectionReason(value);
    if (reason !== null) {
      throw new InvalidCellValueError(value, reason);
    }
  }
}

function absoluteFromLocal(key: Vec3Like, local: Vec3Like, size: ChunkSize): Vec3 {
  return new Vec3(key.x * size.x + local.x, key.y * size.y + local.y, key.z * size.z + local.z);
}

// ============================================================================
// Cursor
// ============================================================================

/**
 * Explicit cursor over the observed cells of a fixed list of chunks.
 * Empty chunks are skipped; iteration only ends after the last chunk.
 */
export class WorldMapCursor implements IterableIterator<MapEntry> {
  private chunkIndex = 0;
  private cellIndex = 0;

  constructor(
    private readonly slots: readonly ChunkSlot[],
    private readonly chunkSize: ChunkSize
  ) {}

  next(): IteratorResult<MapEntry> {
    while (this.chunkIndex < this.slots.length) {
      const { key, chunk } = this.slots[this.chunkIndex];
      while (chunk.presentCount > 0 && this.cellIndex < chunk.volume) {
        const index = this.cellIndex++;
        const value = chunk.getAt(index);
        if (value !== undefined) {
          const position = absoluteFromLocal(key, chunk.localOf(index), this.chunkSize);
          return { done: false, value: [position, value] };
        }
      }
      this.chunkIndex++;
      this.cellIndex = 0;
    }
    return { done: true, value: undefined };
  }

  [Symbol.iterator](): WorldMapCursor {
    return this;
  }
}
