/**
 * Binary STL export.
 *
 * Format: 80-byte header + uint32 count + 50 bytes per triangle.
 * The header is written as zeros; normals are written as given.
 */

import { StlError } from './errors.js';
import { BufferedWriter, MemorySink, type ByteSink } from './io.js';
import { HEADER_BYTES, RECORD_BYTES } from './binary-reader.js';
import type { Triangle } from './mesh.js';
import { resolveWriterOptions, type WriterOptions } from './options.js';

/** An iterable that knows its exact length before iteration. Arrays qualify. */
export type SizedIterable<T> = Iterable<T> & { readonly length: number };

const MAX_TRIANGLES = 0xffffffff;

/**
 * Write `triangles` as binary STL and flush the sink.
 *
 * The count precedes the data, so the length must be known up front. If
 * the iterable then yields a different number of triangles, this throws
 * `length-mismatch`; whatever was already written stays in the sink.
 */
export function writeStl(sink: ByteSink, triangles: SizedIterable<Triangle>, options?: WriterOptions): void {
  const { bufferSize } = resolveWriterOptions(options);
  const triangleCount = triangles.length;
  if (!Number.isInteger(triangleCount) || triangleCount < 0 || triangleCount > MAX_TRIANGLES) {
    throw new StlError(
      'invalid-input',
      `Triangle count must be an integer in [0, ${MAX_TRIANGLES}], got ${triangleCount}`,
    );
  }

  const writer = new BufferedWriter(sink, bufferSize);

  // Header (80 bytes of zeros) + triangle count
  const head = new Uint8Array(HEADER_BYTES + 4);
  new DataView(head.buffer).setUint32(HEADER_BYTES, triangleCount, true);
  writer.write(head);

  const record = new Uint8Array(RECORD_BYTES);
  const view = new DataView(record.buffer);
  let t = 0;
  for (const tri of triangles) {
    if (t === triangleCount) {
      throw new StlError(
        'length-mismatch',
        `Iterable declared ${triangleCount} triangles but yielded more`,
        { triangle: t },
      );
    }
    const [v0, v1, v2] = tri.vertices;
    let offset = 0;
    for (const p of [tri.normal, v0, v1, v2]) {
      view.setFloat32(offset, p[0], true); offset += 4;
      view.setFloat32(offset, p[1], true); offset += 4;
      view.setFloat32(offset, p[2], true); offset += 4;
    }
    // Attribute byte count
    view.setUint16(offset, 0, true);
    writer.write(record);
    t++;
  }

  if (t !== triangleCount) {
    throw new StlError(
      'length-mismatch',
      `Iterable declared ${triangleCount} triangles but yielded ${t}`,
      { triangle: t },
    );
  }
  writer.flush();
}

/** Encode to an in-memory binary STL. */
export function encodeStl(triangles: SizedIterable<Triangle>, options?: WriterOptions): Uint8Array {
  const sink = new MemorySink();
  writeStl(sink, triangles, options);
  return sink.toUint8Array();
}
