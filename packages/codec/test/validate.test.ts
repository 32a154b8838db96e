import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import {
  validateMesh, assertManifold, indexTriangles, readStl, encodeStl, meshTriangles,
  createIndexedMesh, createTriangle, MemorySource, isStlError,
  type IndexedMesh, type ManifoldResult, type StlError, type Triangle, type Vec3,
} from '../src/index.js';

// ─── Fixtures ─────────────────────────────────────────────────

const A: Vec3 = [0, 0, 0];
const B: Vec3 = [1, 0, 0];
const C: Vec3 = [0, 1, 0];
const D: Vec3 = [0, 0, 1];

/** Unit tetrahedron, every face wound counter-clockwise seen from outside. */
const TETRA: Triangle[] = [
  createTriangle([0, 0, -1], A, C, B),
  createTriangle([0, -1, 0], A, B, D),
  createTriangle([-1, 0, 0], A, D, C),
  createTriangle([1, 1, 1], B, C, D),
];

function failure(result: ManifoldResult): StlError {
  if (result.ok) throw new Error('expected validation to fail');
  return result.error;
}

function scaled(mesh: IndexedMesh, s: number): IndexedMesh {
  return createIndexedMesh(mesh.vertices.map(([x, y, z]): Vec3 => [x * s, y * s, z * s]), mesh.faces);
}

describe('validateMesh', () => {
  it('accepts a closed, consistently wound tetrahedron', () => {
    expect(validateMesh(indexTriangles(TETRA))).toEqual({ ok: true });
  });

  it('accepts the tetrahedron after a binary round trip', () => {
    const mesh = readStl(new MemorySource(encodeStl(TETRA)));
    expect(validateMesh(mesh).ok).toBe(true);
  });

  it('accepts an empty mesh', () => {
    expect(validateMesh(indexTriangles([])).ok).toBe(true);
  });

  it('rejects a tetrahedron with a missing face as an unmatched edge', () => {
    const err = failure(validateMesh(indexTriangles(TETRA.slice(0, 3))));
    expect(err.kind).toBe('unmatched-edge');
    expect([0, 1, 2]).toContain(err.face);
    expect(err.edge).toBeDefined();
    expect(err.message).toMatch(/^did not find facing edge for face #\d, edge #v\d -> #v\d$/);
  });

  it('rejects a face wound the wrong way', () => {
    const flipped = [...TETRA.slice(0, 3), createTriangle([1, 1, 1], B, D, C)];
    const err = failure(validateMesh(indexTriangles(flipped)));
    expect(err.kind).toBe('unmatched-edge');
  });

  it('rejects a lone triangle', () => {
    const err = failure(validateMesh(indexTriangles([TETRA[0]])));
    expect(err.kind).toBe('unmatched-edge');
    expect(err.face).toBe(0);
  });

  it('rejects a degenerate face by index even when its edges would match', () => {
    // b-c-b collapses to a segment; its edges b→c and c→b cancel each other.
    const withSliver = [...TETRA, createTriangle([0, 0, 0], B, C, B)];
    const err = failure(validateMesh(indexTriangles(withSliver)));
    expect(err.kind).toBe('degenerate-face');
    expect(err.face).toBe(4);
    expect(err.message).toBe('face #4 has zero area');
  });

  it('rejects a face with three identical vertices', () => {
    const err = failure(validateMesh(indexTriangles([TETRA[0], createTriangle([0, 0, 1], D, D, D)])));
    expect(err.kind).toBe('degenerate-face');
    expect(err.face).toBe(1);
  });

  it('checks faces in order and stops at the first degenerate one', () => {
    const err = failure(validateMesh(indexTriangles([createTriangle([0, 0, 1], A, B, A), TETRA[1]])));
    expect(err.kind).toBe('degenerate-face');
    expect(err.face).toBe(0);
  });

  it('treats areas below float32 epsilon as degenerate by default', () => {
    const tiny = scaled(indexTriangles(TETRA), 1e-4);
    const err = failure(validateMesh(tiny));
    expect(err.kind).toBe('degenerate-face');
    expect(err.face).toBe(0);
  });

  it('honours a custom areaEpsilon', () => {
    const tiny = scaled(indexTriangles(TETRA), 1e-4);
    expect(validateMesh(tiny, { areaEpsilon: 1e-12 }).ok).toBe(true);
    expect(failure(validateMesh(indexTriangles(TETRA), { areaEpsilon: 0.6 })).face).toBe(0);
  });

  it('validates its options with zod', () => {
    expect(() => validateMesh(indexTriangles(TETRA), { areaEpsilon: -1 })).toThrow(ZodError);
  });

  it('refuses a zero areaEpsilon, which would let collinear faces through', () => {
    const collinear = indexTriangles([createTriangle([0, 0, 1], A, B, [2, 0, 0])]);
    expect(() => validateMesh(collinear, { areaEpsilon: 0 })).toThrow(ZodError);
    expect(failure(validateMesh(collinear)).kind).toBe('degenerate-face');
  });

  it('does not mutate the mesh', () => {
    const mesh = indexTriangles(TETRA.slice(0, 3));
    const before = JSON.stringify(mesh);
    validateMesh(mesh);
    expect(JSON.stringify(mesh)).toBe(before);
    expect(meshTriangles(mesh)).toEqual(TETRA.slice(0, 3));
  });
});

describe('assertManifold', () => {
  it('returns quietly for a valid mesh', () => {
    expect(() => assertManifold(indexTriangles(TETRA))).not.toThrow();
  });

  it('throws the validation error', () => {
    let caught: unknown;
    try {
      assertManifold(indexTriangles(TETRA.slice(1)));
    } catch (err) {
      caught = err;
    }
    expect(isStlError(caught, 'unmatched-edge')).toBe(true);
  });
});
