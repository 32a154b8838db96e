/** Minimal 3D vectors: plain tuples with small helpers. */
export type Vec3 = readonly [number, number, number];

/** Tolerance used by approxEqual when none is given. */
export const DEFAULT_EPSILON = 1e-6;

/** float32 machine epsilon (2^-23). */
export const F32_EPSILON = 2 ** -23;

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function length(a: Vec3): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1] + a[2] * a[2]);
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** Area of triangle abc: |(c - b) x (a - b)| / 2. */
export function triangleArea(a: Vec3, b: Vec3, c: Vec3): number {
  return length(cross(sub(c, b), sub(a, b))) * 0.5;
}

/**
 * Component-wise comparison within `epsilon`.
 *
 * Not an identity: it is not transitive and `0` equals `-0` here. Vertex
 * deduplication uses `vertexKey` from the indexer instead.
 */
export function approxEqual(a: Vec3, b: Vec3, epsilon = DEFAULT_EPSILON): boolean {
  return (
    Math.abs(a[0] - b[0]) < epsilon &&
    Math.abs(a[1] - b[1]) < epsilon &&
    Math.abs(a[2] - b[2]) < epsilon
  );
}
