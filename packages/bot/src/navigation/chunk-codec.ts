import {
  ABSENT_SENTINEL,
  CHUNK_HEADER_BYTES,
  CHUNK_MAGIC,
  type CellTypeTag,
} from '@minenav/shared';
import type { ChunkSize } from './chunk.js';

// ============================================================================
// Cell Encodings
// ============================================================================

interface CellEncoding {
  bytes: number;
  integer: boolean;
  min: number;
  max: number;
  read(buf: Buffer, offset: number): number;
  write(buf: Buffer, value: number, offset: number): void;
}

export const CELL_ENCODINGS: Record<CellTypeTag, CellEncoding> = {
  b: {
    bytes: 1, integer: true, min: -128, max: 127,
    read: (buf, offset) => buf.readInt8(offset),
    write: (buf, value, offset) => buf.writeInt8(value, offset),
  },
  h: {
    bytes: 2, integer: true, min: -32768, max: 32767,
    read: (buf, offset) => buf.readInt16LE(offset),
    write: (buf, value, offset) => buf.writeInt16LE(value, offset),
  },
  i: {
    bytes: 4, integer: true, min: -2147483648, max: 2147483647,
    read: (buf, offset) => buf.readInt32LE(offset),
    write: (buf, value, offset) => buf.writeInt32LE(value, offset),
  },
  f: {
    bytes: 4, integer: false, min: -3.4028234663852886e38, max: 3.4028234663852886e38,
    read: (buf, offset) => buf.readFloatLE(offset),
    write: (buf, value, offset) => buf.writeFloatLE(value, offset),
  },
  d: {
    bytes: 8, integer: false, min: -Number.MAX_VALUE, max: Number.MAX_VALUE,
    read: (buf, offset) => buf.readDoubleLE(offset),
    write: (buf, value, offset) => buf.writeDoubleLE(value, offset),
  },
};

export function isCellTypeTag(tag: string): tag is CellTypeTag {
  return Object.prototype.hasOwnProperty.call(CELL_ENCODINGS, tag);
}

// ============================================================================
// Encode / Decode
// ============================================================================

/**
 * Serialise a full chunk: header followed by every cell, absent cells as the sentinel
 */
export function encodeChunk(size: ChunkSize, tag: CellTypeTag, cells: Float64Array): Buffer {
  const encoding = CELL_ENCODINGS[tag];
  const buf = Buffer.alloc(CHUNK_HEADER_BYTES + cells.length * encoding.bytes);

  buf.write(CHUNK_MAGIC, 0, 4, 'ascii');
  buf.writeInt32LE(size.x, 4);
  buf.writeInt32LE(size.y, 8);
  buf.writeInt32LE(size.z, 12);
  buf.write(tag, 16, 1, 'ascii');

  let offset = CHUNK_HEADER_BYTES;
  for (const value of cells) {
    encoding.write(buf, Number.isNaN(value) ? ABSENT_SENTINEL : value, offset);
    offset += encoding.bytes;
  }
  return buf;
}

export interface ChunkHeader {
  magic: string;
  size: ChunkSize;
  tag: string;
}

export type DecodeResult =
  | { status: 'ok'; tag: CellTypeTag; cells: Float64Array }
  | { status: 'mismatch'; header: ChunkHeader }
  | { status: 'malformed'; reason: string };

export function readChunkHeader(buf: Buffer): ChunkHeader | null {
  if (buf.length < CHUNK_HEADER_BYTES) return null;
  return {
    magic: buf.toString('ascii', 0, 4),
    size: { x: buf.readInt32LE(4), y: buf.readInt32LE(8), z: buf.readInt32LE(12) },
    tag: buf.toString('ascii', 16, 17),
  };
}

/**
 * Decode a chunk file written for chunks of `expected` size.
 *
 * A foreign magic or different dimensions yield 'mismatch' and nothing is
 * decoded. Cells are only returned once the whole body has been read.
 */
export function decodeChunk(buf: Buffer, expected: ChunkSize): DecodeResult {
  const header = readChunkHeader(buf);
  if (header === null) {
    return { status: 'malformed', reason: `header truncated at ${buf.length} bytes` };
  }

  if (
    header.magic !== CHUNK_MAGIC ||
    header.size.x !== expected.x ||
    header.size.y !== expected.y ||
    header.size.z !== expected.z
  ) {
    return { status: 'mismatch', header };
  }

  if (!isCellTypeTag(header.tag)) {
    return { status: 'malformed', reason: `unknown cell type '${header.tag}'` };
  }

  const encoding = CELL_ENCODINGS[header.tag];
  const count = expected.x * expected.y * expected.z;
  const needed = CHUNK_HEADER_BYTES + count * encoding.bytes;
  if (buf.length < needed) {
    return { status: 'malformed', reason: `expected ${needed} bytes, file has ${buf.length}` };
  }

  const cells = new Float64Array(count);
  let offset = CHUNK_HEADER_BYTES;
  for (let i = 0; i < count; i++) {
    const value = encoding.read(buf, offset);
    cells[i] = value === ABSENT_SENTINEL ? NaN : value;
    offset += encoding.bytes;
  }
  return { status: 'ok', tag: header.tag, cells };
}
