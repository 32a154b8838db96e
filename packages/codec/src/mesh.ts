/**
 * Triangle mesh types produced by the readers and consumed by the writer.
 */

import type { Vec3 } from './vec3.js';

/** One STL facet: a normal and three corners, in file order. */
export interface Triangle {
  readonly normal: Vec3;
  readonly vertices: readonly [Vec3, Vec3, Vec3];
}

/** A facet whose corners are indices into `IndexedMesh.vertices`. */
export interface IndexedTriangle {
  readonly normal: Vec3;
  readonly vertices: readonly [number, number, number];
}

export interface IndexedMesh {
  /** Distinct vertices in first-occurrence order. */
  readonly vertices: readonly Vec3[];
  /** Faces in arrival order. */
  readonly faces: readonly IndexedTriangle[];
}

export function createTriangle(normal: Vec3, a: Vec3, b: Vec3, c: Vec3): Triangle {
  return { normal, vertices: [a, b, c] };
}

/** Frozen copy of `v`, detached from the caller's array. */
function freezeVec3(v: Vec3): Vec3 {
  const copy: Vec3 = [v[0], v[1], v[2]];
  return Object.freeze(copy);
}

/**
 * Build an immutable mesh. Every vertex tuple, face and index triple is
 * copied and frozen, so later edits to the inputs do not reach the mesh.
 */
export function createIndexedMesh(
  vertices: readonly Vec3[],
  faces: readonly IndexedTriangle[],
): IndexedMesh {
  return Object.freeze({
    vertices: Object.freeze(vertices.map(freezeVec3)),
    faces: Object.freeze(faces.map(freezeFace)),
  });
}

function freezeFace(face: IndexedTriangle): IndexedTriangle {
  const indices: readonly [number, number, number] = [face.vertices[0], face.vertices[1], face.vertices[2]];
  return Object.freeze({ normal: freezeVec3(face.normal), vertices: Object.freeze(indices) });
}

/**
 * Expand an indexed mesh back into standalone triangles.
 * The result is an array, so it can be handed to `writeStl` as is.
 */
export function meshTriangles(mesh: IndexedMesh): readonly Triangle[] {
  const { vertices } = mesh;
  return Object.freeze(
    mesh.faces.map((face) => {
      const [i0, i1, i2] = face.vertices;
      return createTriangle(face.normal, vertices[i0], vertices[i1], vertices[i2]);
    }),
  );
}

export type StlFormat = 'ascii' | 'binary';

/**
 * Pull sequence of triangles over a borrowed byte source.
 * `next()` throws on malformed input; after it has thrown or finished,
 * every further call reports done.
 */
export interface TriangleReader extends IterableIterator<Triangle> {
  readonly format: StlFormat;
}
