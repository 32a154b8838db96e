/**
 * Manifold check for indexed meshes.
 *
 * A mesh passes when no face is degenerate and every directed edge u→v is
 * cancelled by exactly one v→u from a neighbouring face. A leftover edge is
 * either a hole or a neighbour wound the wrong way round.
 */

import { StlError, type EdgeRef } from './errors.js';
import type { IndexedMesh } from './mesh.js';
import { resolveValidateOptions, type ValidateOptions } from './options.js';
import { triangleArea } from './vec3.js';

export type ManifoldResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: StlError };

interface OpenEdge extends EdgeRef {
  face: number;
}

const edgeKey = (u: number, v: number): string => `${u}>${v}`;

export function validateMesh(mesh: IndexedMesh, options?: ValidateOptions): ManifoldResult {
  const { areaEpsilon } = resolveValidateOptions(options);
  const { vertices, faces } = mesh;
  const openEdges = new Map<string, OpenEdge>();

  for (let fi = 0; fi < faces.length; fi++) {
    const idx = faces[fi].vertices;
    const area = triangleArea(vertices[idx[0]], vertices[idx[1]], vertices[idx[2]]);
    if (!(area >= areaEpsilon)) {
      return {
        ok: false,
        error: new StlError('degenerate-face', `face #${fi} has zero area`, { face: fi }),
      };
    }

    for (let i = 0; i < 3; i++) {
      const j = (i + 1) % 3;
      const u = idx[i];
      const v = idx[j];
      const opposite = edgeKey(v, u);
      if (openEdges.has(opposite)) {
        openEdges.delete(opposite);
      } else {
        openEdges.set(edgeKey(u, v), { face: fi, from: i, to: j });
      }
    }
  }

  // Which leftover edge gets reported is unspecified.
  for (const { face, from, to } of openEdges.values()) {
    return {
      ok: false,
      error: new StlError(
        'unmatched-edge',
        `did not find facing edge for face #${face}, edge #v${from} -> #v${to}`,
        { face, edge: { from, to } },
      ),
    };
  }
  return { ok: true };
}

/** Like validateMesh, but throws the failure. */
export function assertManifold(mesh: IndexedMesh, options?: ValidateOptions): void {
  const result = validateMesh(mesh, options);
  if (!result.ok) throw result.error;
}
