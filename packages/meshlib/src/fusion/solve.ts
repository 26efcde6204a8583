/**
 * Unfusion Solver
 *
 * Refines a fusion partition so that no fused group holds two vertices
 * that are constrained apart, keeping as much of each old group together
 * as a greedy colouring allows.
 */

import { FusionInvariantError } from "../errors.js";
import {
  formatVertexRef,
  type FusedGroup,
  type FusionIndex,
  type UnfuseConstraints,
} from "../types.js";
import type { VertexBuffer } from "../vertex-buffer.js";
import { buildFusionIndex } from "./fusion-index.js";

/**
 * Split every old fused group into conflict-free subgroups.
 *
 * Within a group: take the first unassigned member, open a subgroup, then
 * scan the remaining unassigned members in order and add each one that
 * conflicts with nobody already in the subgroup. Repeat until every member
 * is placed. Groups without constrained members pass through unchanged.
 *
 * @param vertexBuffers Source buffers, for the per-buffer vertex counts
 * @throws FusionInvariantError if the result still fuses a constrained pair
 */
export function solveUnfusion(
  vertexBuffers: readonly VertexBuffer[],
  oldFusedIdxToBufIdx: readonly FusedGroup[],
  constraints: UnfuseConstraints,
): FusionIndex {
  const { space } = constraints;
  const groups: FusedGroup[] = [];

  for (const group of oldFusedIdxToBufIdx) {
    const flats = group.map((ref) => space.flatOf(ref));
    if (!flats.some((f) => constraints.involves(f))) {
      groups.push(group);
      continue;
    }

    const assigned = new Uint8Array(group.length);
    let remaining = group.length;
    while (remaining > 0) {
      const members: number[] = [];
      for (let k = 0; k < group.length; k++) {
        if (assigned[k]) continue;
        const fits = members.every(
          (m) => !constraints.conflicts(flats[k], flats[m]),
        );
        if (fits) {
          members.push(k);
          assigned[k] = 1;
          remaining--;
        }
      }
      groups.push(members.map((k) => group[k]));
    }
  }

  const result = buildFusionIndex(
    groups,
    vertexBuffers.map((buf) => buf.vertexCount),
  );
  assertConstraintsHold(result, constraints);
  return result;
}

/**
 * @throws FusionInvariantError if any constrained pair shares a fused id
 */
export function assertConstraintsHold(
  fusion: FusionIndex,
  constraints: UnfuseConstraints,
): void {
  const { space } = constraints;
  for (const [flat, partners] of constraints.entries()) {
    const a = space.ref(flat);
    const fa = fusion.bufIdxToFusedIdx[a[0]][a[1]];
    for (const partner of partners) {
      const b = space.ref(partner);
      if (fusion.bufIdxToFusedIdx[b[0]][b[1]] === fa) {
        throw new FusionInvariantError(
          `Vertices ${formatVertexRef(a)} and ${formatVertexRef(b)} are constrained apart but share fused id ${fa}`,
          { fusedIdx: fa },
        );
      }
    }
  }
}
