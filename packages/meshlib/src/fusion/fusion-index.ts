/**
 * Fusion Index bookkeeping
 *
 * Builds the reverse mapping (bufIdxToFusedIdx) and representative flags
 * from a list of fused groups, normalising group order on the way.
 */

import { FusionInvariantError } from "../errors.js";
import {
  compareVertexRefs,
  formatVertexRef,
  type FusedGroup,
  type FusionIndex,
} from "../types.js";

/**
 * Build a FusionIndex from fused groups.
 *
 * Members are sorted ascending by (bufferId, index), groups by their lowest
 * member; fused ids are positions in that order. The groups must partition
 * every vertex of every buffer exactly once.
 *
 * @param groups Fused groups, in any order
 * @param vertexCounts Vertex count of each buffer
 * @throws FusionInvariantError if a vertex is missing, duplicated or out of range
 */
export function buildFusionIndex(
  groups: readonly FusedGroup[],
  vertexCounts: readonly number[],
): FusionIndex {
  const fusedIdxToBufIdx = groups.map((group) => {
    if (group.length === 0) {
      throw new FusionInvariantError("Empty fused group");
    }
    return [...group].sort(compareVertexRefs);
  });
  fusedIdxToBufIdx.sort((a, b) => compareVertexRefs(a[0], b[0]));

  const bufIdxToFusedIdx = vertexCounts.map((n) => new Array<number>(n).fill(-1));
  const isFused = vertexCounts.map((n) => new Array<boolean>(n).fill(false));

  for (let fusedIdx = 0; fusedIdx < fusedIdxToBufIdx.length; fusedIdx++) {
    const group = fusedIdxToBufIdx[fusedIdx];
    for (let k = 0; k < group.length; k++) {
      const [bufferId, index] = group[k];
      if (
        bufferId < 0 ||
        bufferId >= vertexCounts.length ||
        index < 0 ||
        index >= vertexCounts[bufferId]
      ) {
        throw new FusionInvariantError(
          `Fused group ${fusedIdx} references out-of-range vertex ${formatVertexRef(group[k])}`,
          { fusedIdx },
        );
      }
      if (bufIdxToFusedIdx[bufferId][index] !== -1) {
        throw new FusionInvariantError(
          `Vertex ${formatVertexRef(group[k])} is in fused groups ${bufIdxToFusedIdx[bufferId][index]} and ${fusedIdx}`,
          { fusedIdx },
        );
      }
      bufIdxToFusedIdx[bufferId][index] = fusedIdx;
      isFused[bufferId][index] = k > 0;
    }
  }

  for (let b = 0; b < bufIdxToFusedIdx.length; b++) {
    const missing = bufIdxToFusedIdx[b].indexOf(-1);
    if (missing !== -1) {
      throw new FusionInvariantError(
        `Vertex ${b}:${missing} is not in any fused group`,
        { bufferId: b, index: missing },
      );
    }
  }

  return { fusedIdxToBufIdx, bufIdxToFusedIdx, isFused };
}

/**
 * FusionIndex in which every vertex is its own group.
 */
export function unfusedFusionIndex(vertexCounts: readonly number[]): FusionIndex {
  const groups: FusedGroup[] = [];
  for (let b = 0; b < vertexCounts.length; b++) {
    for (let i = 0; i < vertexCounts[b]; i++) {
      groups.push([[b, i]]);
    }
  }
  return buildFusionIndex(groups, vertexCounts);
}

/**
 * Rebuild [bufferId][index] -> fused id from the groups alone.
 * Buffers are sized by their highest referenced index.
 */
export function invertFusedGroups(groups: readonly FusedGroup[]): number[][] {
  const out: number[][] = [];
  for (let fusedIdx = 0; fusedIdx < groups.length; fusedIdx++) {
    for (const [b, i] of groups[fusedIdx]) {
      while (out.length <= b) out.push([]);
      out[b][i] = fusedIdx;
    }
  }
  return out;
}

/**
 * Check that a FusionIndex's three views agree and partition every vertex.
 *
 * @throws FusionInvariantError on the first inconsistency
 */
export function assertPartition(
  index: FusionIndex,
  vertexCounts: readonly number[],
): void {
  const rebuilt = buildFusionIndex(index.fusedIdxToBufIdx, vertexCounts);
  for (let b = 0; b < vertexCounts.length; b++) {
    for (let i = 0; i < vertexCounts[b]; i++) {
      if (
        rebuilt.bufIdxToFusedIdx[b][i] !== index.bufIdxToFusedIdx[b]?.[i] ||
        rebuilt.isFused[b][i] !== index.isFused[b]?.[i]
      ) {
        throw new FusionInvariantError(
          `Fusion index views disagree at vertex ${b}:${i}`,
          { bufferId: b, index: i },
        );
      }
    }
  }
}

/** Per-buffer vertex counts implied by a FusionIndex */
export function fusionVertexCounts(index: FusionIndex): number[] {
  return index.bufIdxToFusedIdx.map((row) => row.length);
}
