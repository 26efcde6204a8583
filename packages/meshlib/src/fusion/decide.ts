/**
 * Unfusion Decider
 *
 * Chooses which pairs of original vertices must stop sharing a fused
 * vertex so that every colliding triangle becomes distinguishable.
 *
 * A typical collision comes from a duplicated surface layer: two sheets of
 * triangles at the same positions, sharing their outline. Inside such a
 * layer every triangle touching a fused vertex collides with its twin, while
 * vertices on the outline also touch ordinary triangles. Splitting only the
 * interior vertices separates the layers and keeps the outline fused.
 */

import {
  UnfuseConstraints,
  VertexIdSpace,
  type CollisionMap,
  type FusedGroup,
  type IndexBuffer,
  type Triple,
  type VertexRef,
} from "../types.js";
import { invertFusedGroups } from "./fusion-index.js";

/**
 * Decide the unfusions needed to resolve a round of collisions.
 *
 * For each pair of triangles in a collision group, corners are aligned with
 * the group's sorted fused-id key. The pair is separated at every aligned
 * position whose fused vertex is interior and whose originals differ; if no
 * interior position separates them, at the first position (in key order)
 * where the originals differ. Pairs whose originals are identical at all
 * three positions are the same triangle listed twice and are skipped.
 */
export function decideOnUnfusions(
  indexBuffers: readonly IndexBuffer[],
  fusedIdxToBufIdx: readonly FusedGroup[],
  collisions: CollisionMap,
): UnfuseConstraints {
  const space = VertexIdSpace.fromGroups(fusedIdxToBufIdx);
  const toFused = invertFusedGroups(fusedIdxToBufIdx);
  const interior = findInteriorFusedVertices(
    indexBuffers,
    toFused,
    fusedIdxToBufIdx.length,
    collisions,
  );
  const constraints = new UnfuseConstraints(space);

  for (const group of collisions.values()) {
    const aligned = group.triangles.map(([b, tri]) =>
      alignCorners(b, tri, toFused[b]),
    );

    for (let i = 0; i < aligned.length; i++) {
      for (let j = i + 1; j < aligned.length; j++) {
        const a = aligned[i];
        const c = aligned[j];

        const differing: number[] = [];
        for (let p = 0; p < 3; p++) {
          if (a[p][0] !== c[p][0] || a[p][1] !== c[p][1]) {
            differing.push(p);
          }
        }
        if (differing.length === 0) continue;

        let chosen = differing.filter((p) => interior[group.fused[p]] === 1);
        if (chosen.length === 0) {
          chosen = [differing[0]];
        }
        for (const p of chosen) {
          constraints.add(a[p], c[p]);
        }
      }
    }
  }

  return constraints;
}

/**
 * Corners of a triangle as vertex refs, ordered by fused id and then by
 * original index, so position p lines up with position p of the sorted
 * collision key.
 */
function alignCorners(
  bufferId: number,
  tri: Triple,
  toFused: readonly number[],
): VertexRef[] {
  const corners = [tri[0], tri[1], tri[2]];
  corners.sort((x, y) => toFused[x] - toFused[y] || x - y);
  return corners.map((index): VertexRef => [bufferId, index]);
}

/**
 * Flag fused vertices whose every triangle (across all buffers) belongs to
 * some collision group.
 *
 * @returns 1 for interior fused ids, 0 otherwise
 */
export function findInteriorFusedVertices(
  indexBuffers: readonly IndexBuffer[],
  toFused: readonly (readonly number[])[],
  fusedCount: number,
  collisions: CollisionMap,
): Uint8Array {
  const touching = new Uint32Array(fusedCount);
  const colliding = new Uint32Array(fusedCount);

  const count = (fused: Triple, into: Uint32Array) => {
    into[fused[0]]++;
    if (fused[1] !== fused[0]) into[fused[1]]++;
    if (fused[2] !== fused[0] && fused[2] !== fused[1]) into[fused[2]]++;
  };

  for (let b = 0; b < indexBuffers.length; b++) {
    const indices = indexBuffers[b];
    const map = toFused[b];
    const triangleCount = Math.floor(indices.length / 3);
    for (let t = 0; t < triangleCount; t++) {
      count(
        [map[indices[t * 3]], map[indices[t * 3 + 1]], map[indices[t * 3 + 2]]],
        touching,
      );
    }
  }

  for (const group of collisions.values()) {
    for (let k = 0; k < group.triangles.length; k++) {
      count(group.fused, colliding);
    }
  }

  const interior = new Uint8Array(fusedCount);
  for (let f = 0; f < fusedCount; f++) {
    interior[f] = touching[f] > 0 && touching[f] === colliding[f] ? 1 : 0;
  }
  return interior;
}
