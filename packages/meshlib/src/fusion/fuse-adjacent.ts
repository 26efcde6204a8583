/**
 * Adjacency Fuser
 *
 * Partitions the vertices of every buffer into fused groups. Two vertices
 * fuse when every compared attribute channel is exactly equal and each
 * position component is within epsilon. Matching is transitive through the
 * union-find, so chains of near-coincident vertices end up in one group.
 */

import { parseFusionOptions, type FusionOptionsInput } from "../config.js";
import { VertexIdSpace, type FusedGroup, type FusionIndex } from "../types.js";
import type { VertexBuffer } from "../vertex-buffer.js";
import { buildFusionIndex } from "./fusion-index.js";
import { VertexSpatialHash } from "./spatial-hash.js";
import { UnionFind } from "./union-find.js";

/**
 * Compute the initial fusion partition for a set of vertex buffers.
 *
 * Index buffers are not needed: fusion is purely vertex-based.
 *
 * @example
 * ```typescript
 * const { fusedIdxToBufIdx } = fuseAdjacentVertices([buf]);
 * // [[[0, 0], [0, 1]], [[0, 2]]] when vertices 0 and 1 coincide
 * ```
 */
export function fuseAdjacentVertices(
  vertexBuffers: readonly VertexBuffer[],
  options?: FusionOptionsInput,
): FusionIndex {
  const { epsilon, cellSize, attributes } = parseFusionOptions(options);
  const counts = vertexBuffers.map((buf) => buf.vertexCount);
  const space = new VertexIdSpace(counts);
  const uf = new UnionFind(space.size);
  const hash = new VertexSpatialHash(cellSize);

  // Flat position copy so candidate checks don't need to find the owning buffer
  const flatPositions = new Float32Array(space.size * 3);
  for (let b = 0; b < vertexBuffers.length; b++) {
    flatPositions.set(vertexBuffers[b].positions, space.offsets[b] * 3);
  }

  for (let b = 0; b < vertexBuffers.length; b++) {
    const buf = vertexBuffers[b];
    for (let vi = 0; vi < buf.vertexCount; vi++) {
      const id = space.flat(b, vi);
      const x = flatPositions[id * 3];
      const y = flatPositions[id * 3 + 1];
      const z = flatPositions[id * 3 + 2];
      const attrKey = buf.attributeKey(vi, attributes);

      hash.forEachNear(attrKey, x, y, z, (other) => {
        if (uf.connected(id, other)) return;
        const o = other * 3;
        if (
          Math.abs(flatPositions[o] - x) <= epsilon &&
          Math.abs(flatPositions[o + 1] - y) <= epsilon &&
          Math.abs(flatPositions[o + 2] - z) <= epsilon
        ) {
          uf.union(id, other);
        }
      });

      hash.insert(attrKey, x, y, z, id);
    }
  }

  const groups: FusedGroup[] = uf
    .groups()
    .map((members) => members.map((flat) => space.ref(flat)));

  return buildFusionIndex(groups, counts);
}
