/**
 * Binary STL reader.
 *
 * Format: 80-byte header + uint32 count + 50 bytes per triangle
 * (normal, 3 vertices, uint16 attribute), little-endian throughout.
 */

import { BufferedReader, type ByteSource } from './io.js';
import type { Triangle, TriangleReader } from './mesh.js';
import { resolveReaderOptions, type ReaderOptions } from './options.js';
import type { Vec3 } from './vec3.js';

export const HEADER_BYTES = 80;
export const RECORD_BYTES = 50;

function readVec3(view: DataView, offset: number): Vec3 {
  return [
    view.getFloat32(offset, true),
    view.getFloat32(offset + 4, true),
    view.getFloat32(offset + 8, true),
  ];
}

export class BinaryStlReader implements TriangleReader {
  readonly format = 'binary';
  private index = 0;
  private done = false;

  private constructor(
    private readonly reader: BufferedReader,
    /** Raw header bytes, never interpreted. */
    readonly header: Uint8Array,
    /** Triangle count declared in the file. */
    readonly count: number,
  ) {}

  /** Reads header and count now; triangles are read on demand. */
  static create(source: ByteSource, options?: ReaderOptions): BinaryStlReader {
    const { bufferSize, logger } = resolveReaderOptions(options);
    const reader = new BufferedReader(source, bufferSize);
    const header = reader.readExact(HEADER_BYTES, 'binary STL header');
    const countBytes = reader.readExact(4, 'binary STL triangle count');
    const count = new DataView(countBytes.buffer).getUint32(0, true);
    logger.debug(`binary STL: ${count} triangles declared`);
    return new BinaryStlReader(reader, header, count);
  }

  /** Triangles not yet read. */
  get remaining(): number {
    return this.done ? 0 : this.count - this.index;
  }

  next(): IteratorResult<Triangle> {
    if (this.done || this.index >= this.count) {
      this.done = true;
      return { done: true, value: undefined };
    }
    const i = this.index;
    let record: Uint8Array;
    try {
      record = this.reader.readExact(RECORD_BYTES, `triangle #${i}`, { triangle: i });
    } catch (err) {
      this.done = true;
      throw err;
    }
    this.index++;
    const view = new DataView(record.buffer);
    return {
      done: false,
      value: {
        normal: readVec3(view, 0),
        vertices: [readVec3(view, 12), readVec3(view, 24), readVec3(view, 36)],
      },
    };
  }

  [Symbol.iterator](): this {
    return this;
  }
}
