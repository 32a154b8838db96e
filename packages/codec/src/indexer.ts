/**
 * Fold a triangle stream into an indexed mesh.
 *
 * Vertices are merged only when all three components have the same float32
 * bit pattern. This is deliberately stricter than `approxEqual`: `0` and
 * `-0` stay separate vertices, and no tolerance decides identity.
 */

import { createIndexedMesh, type IndexedMesh, type IndexedTriangle, type Triangle } from './mesh.js';
import { resolveReaderOptions, type ReaderOptions } from './options.js';
import type { Vec3 } from './vec3.js';

/** Exact float32 bit identity of a vertex: its three uint32 bit patterns. */
export type VertexKey = `${number},${number},${number}`;

const f32 = new Float32Array(3);
const bits = new Uint32Array(f32.buffer);

export function vertexKey(v: Vec3): VertexKey {
  f32[0] = v[0];
  f32[1] = v[1];
  f32[2] = v[2];
  return `${bits[0]},${bits[1]},${bits[2]}`;
}

/**
 * Consume `triangles` to the end. Decode errors propagate as thrown and
 * nothing partial is returned.
 */
export function indexTriangles(triangles: Iterable<Triangle>, options?: ReaderOptions): IndexedMesh {
  const { logger } = resolveReaderOptions(options);
  const vertices: Vec3[] = [];
  const faces: IndexedTriangle[] = [];
  const vertexToIndex = new Map<VertexKey, number>();

  const resolve = (v: Vec3): number => {
    const key = vertexKey(v);
    let index = vertexToIndex.get(key);
    if (index === undefined) {
      index = vertices.length;
      vertexToIndex.set(key, index);
      vertices.push(v);
    }
    return index;
  };

  for (const t of triangles) {
    const [a, b, c] = t.vertices;
    faces.push({ normal: t.normal, vertices: [resolve(a), resolve(b), resolve(c)] });
  }

  logger.debug(`indexed ${faces.length} triangles, ${vertices.length} unique vertices`);
  return createIndexedMesh(vertices, faces);
}
