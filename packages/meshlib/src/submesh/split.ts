/**
 * Vertex-limit splitting
 *
 * GMD submeshes index their vertices with 16 bits, so a material with more
 * distinct vertices than the limit is spread over several submeshes.
 */

import { ERROR_CODES, MeshlibError, SubmeshLimitError } from "../errors.js";
import { MAX_SUBMESH_VERTICES, type Triple } from "../types.js";

export type SubmeshFactory<T> = (verts: number[], triangles: Triple[]) => T;

/**
 * Pack triangles, in order, into chunks of at most maxVertices distinct
 * vertices. A triangle that would push the current chunk over the limit
 * closes it and starts the next one.
 *
 * @param dedupedVerts Representative loop per deduplicated vertex
 * @param loopToDeduped Loop id -> index into dedupedVerts
 * @param triangles Loop ids per triangle
 * @param factory Receives each chunk's loop ids and its triangles renumbered
 *   into that list
 */
export function splitByVertexLimit<T>(
  dedupedVerts: readonly number[],
  loopToDeduped: ReadonlyMap<number, number>,
  triangles: readonly Triple[],
  factory: SubmeshFactory<T>,
  maxVertices: number = MAX_SUBMESH_VERTICES,
): T[] {
  if (maxVertices < 3) {
    throw new SubmeshLimitError(
      `A submesh must hold at least one triangle, got a limit of ${maxVertices} vertices`,
      { maxVertices },
    );
  }

  const chunks: T[] = [];
  let local = new Map<number, number>();
  let verts: number[] = [];
  let tris: Triple[] = [];

  const dedupedOf = (loop: number): number => {
    const deduped = loopToDeduped.get(loop);
    if (deduped === undefined) {
      throw new MeshlibError(
        `Loop ${loop} has no deduplicated vertex`,
        ERROR_CODES.INTERNAL_CONSISTENCY,
        { loop },
      );
    }
    return deduped;
  };

  for (const tri of triangles) {
    const d0 = dedupedOf(tri[0]);
    const d1 = dedupedOf(tri[1]);
    const d2 = dedupedOf(tri[2]);
    const fresh = new Set([d0, d1, d2].filter((d) => !local.has(d))).size;

    if (verts.length + fresh > maxVertices) {
      chunks.push(factory(verts, tris));
      local = new Map();
      verts = [];
      tris = [];
    }

    const localOf = (deduped: number): number => {
      let idx = local.get(deduped);
      if (idx === undefined) {
        idx = verts.length;
        verts.push(dedupedVerts[deduped]);
        local.set(deduped, idx);
      }
      return idx;
    };
    tris.push([localOf(d0), localOf(d1), localOf(d2)]);
  }

  if (tris.length > 0) {
    chunks.push(factory(verts, tris));
  }
  return chunks;
}
