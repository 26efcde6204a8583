/**
 * Loop deduplication: loops whose vertex data is identical share one
 * exported vertex.
 */

import type { VertexBuffer } from "../vertex-buffer.js";

export interface DedupedLoops {
  /** One representative loop per distinct vertex, in first-seen order */
  dedupedVerts: number[];
  /** Loop id -> index into dedupedVerts */
  loopToDeduped: Map<number, number>;
}

export function dedupeLoops(
  loops: Iterable<number>,
  vertices: VertexBuffer,
): DedupedLoops {
  const dedupedVerts: number[] = [];
  const loopToDeduped = new Map<number, number>();
  const byKey = new Map<string, number>();

  for (const loop of loops) {
    const key = vertices.vertexKey(loop);
    let deduped = byKey.get(key);
    if (deduped === undefined) {
      deduped = dedupedVerts.length;
      dedupedVerts.push(loop);
      byKey.set(key, deduped);
    }
    loopToDeduped.set(loop, deduped);
  }

  return { dedupedVerts, loopToDeduped };
}
