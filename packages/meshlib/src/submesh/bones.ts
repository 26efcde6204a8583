/**
 * Bone-limit partitioning for skinned submeshes.
 */

import type { ErrorReporter } from "../errors.js";
import { MIN_BONES_PER_SUBMESH, type Triple } from "../types.js";

export interface BonePartition {
  triangles: Triple[];
  /** Bones referenced by the triangles, ascending */
  bones: number[];
}

/**
 * Split triangles, in order, into runs that reference at most maxBones
 * bones each. A triangle whose bones would push the current run over the
 * limit starts a new run.
 *
 * A triangle can reference up to 12 bones (3 vertices × 4 weights), so a
 * limit below that is fatal.
 */
export function partitionTrianglesByBones(
  triangles: readonly Triple[],
  bonesOf: (tri: Triple) => ReadonlySet<number>,
  maxBones: number,
  reporter: ErrorReporter,
): BonePartition[] {
  if (maxBones < MIN_BONES_PER_SUBMESH) {
    reporter.fatal(
      `Bone limit ${maxBones} per submesh is impossible, a triangle can reference up to ${MIN_BONES_PER_SUBMESH} bones`,
      { maxBones },
    );
  }

  const partitions: BonePartition[] = [];
  let pendingTris: Triple[] = [];
  let pendingBones = new Set<number>();

  const flush = () => {
    partitions.push({
      triangles: pendingTris,
      bones: [...pendingBones].sort((a, b) => a - b),
    });
  };

  for (const tri of triangles) {
    const triBones = bonesOf(tri);
    if (triBones.size > maxBones) {
      reporter.fatal(
        `Triangle (${tri.join(", ")}) references ${triBones.size} bones, limit is ${maxBones}`,
        { maxBones },
      );
    }

    const combined = new Set([...pendingBones, ...triBones]);
    if (combined.size > maxBones) {
      flush();
      pendingTris = [tri];
      pendingBones = new Set(triBones);
    } else {
      pendingTris.push(tri);
      pendingBones = combined;
    }
  }

  if (pendingTris.length > 0) {
    flush();
  }
  return partitions;
}
