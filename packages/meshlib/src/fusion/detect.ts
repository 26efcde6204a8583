/**
 * Fully-Fused-Triangle Detection
 *
 * After fusion, two distinct triangles can land on the same three fused
 * vertices. An editor that keys faces by vertex identity cannot hold both,
 * so these collisions have to be found and unfused.
 */

import {
  collisionKey,
  type CollisionMap,
  type FusionIndex,
  type IndexBuffer,
  type Triple,
} from "../types.js";

/**
 * Group every triangle by its sorted fused-id triple and keep the groups
 * with at least two triangles.
 *
 * Detection ignores winding; each entry keeps the triangle's original
 * indices in original order. Entries are ordered by buffer, then by
 * triangle position in the buffer. Trailing indices that don't form a
 * full triangle are ignored.
 */
export function detectFullyFusedTriangles(
  indexBuffers: readonly IndexBuffer[],
  fusion: Pick<FusionIndex, "bufIdxToFusedIdx">,
): CollisionMap {
  const all: CollisionMap = new Map();

  for (let b = 0; b < indexBuffers.length; b++) {
    const indices = indexBuffers[b];
    const toFused = fusion.bufIdxToFusedIdx[b];
    const triangleCount = Math.floor(indices.length / 3);

    for (let t = 0; t < triangleCount; t++) {
      const original: Triple = [
        indices[t * 3],
        indices[t * 3 + 1],
        indices[t * 3 + 2],
      ];
      const fused: Triple = [
        toFused[original[0]],
        toFused[original[1]],
        toFused[original[2]],
      ];
      fused.sort((x, y) => x - y);

      const key = collisionKey(fused);
      const entry = all.get(key);
      if (entry) {
        entry.triangles.push([b, original]);
      } else {
        all.set(key, { fused, triangles: [[b, original]] });
      }
    }
  }

  const collisions: CollisionMap = new Map();
  for (const [key, group] of all) {
    if (group.triangles.length >= 2) {
      collisions.set(key, group);
    }
  }
  return collisions;
}

/**
 * Plain-object view of a collision map, for logging and assertions:
 * `{ "3,4,5": [[0, [3, 4, 5]], [0, [6, 7, 8]]] }`
 */
export function collisionsToRecord(
  collisions: CollisionMap,
): Record<string, [number, Triple][]> {
  const out: Record<string, [number, Triple][]> = {};
  for (const [key, group] of collisions) {
    out[key] = group.triangles.map(([b, tri]): [number, Triple] => [
      b,
      [tri[0], tri[1], tri[2]],
    ]);
  }
  return out;
}
