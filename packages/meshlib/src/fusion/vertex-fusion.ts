/**
 * Vertex Fusion
 *
 * Main entry point: fuse adjacent vertices, then alternate detection,
 * decision and solving until no fully fused triangles remain.
 *
 * fusing -> detecting -> done
 *               ^   \
 *               |    deciding -> solving
 *               +-------------------+
 */

import { parseFusionOptions, type FusionOptionsInput } from "../config.js";
import { ERROR_CODES, FusionInvariantError, MeshlibError } from "../errors.js";
import { StageLogger } from "../logger.js";
import type {
  CollisionMap,
  FusionIndex,
  IndexBuffer,
  UnfuseConstraints,
} from "../types.js";
import type { VertexBuffer } from "../vertex-buffer.js";
import { decideOnUnfusions } from "./decide.js";
import { detectFullyFusedTriangles } from "./detect.js";
import { fuseAdjacentVertices } from "./fuse-adjacent.js";
import { unfusedFusionIndex } from "./fusion-index.js";
import { solveUnfusion } from "./solve.js";

const logger = new StageLogger("fusion");

export type FusionState = "fusing" | "detecting" | "deciding" | "solving" | "done";

export interface VertexFusionResult extends FusionIndex {
  /** Detect/decide/solve rounds that changed the partition */
  rounds: number;
  /**
   * Collisions left when fusion stopped. Non-empty only when the remaining
   * collisions are exact duplicates (the same original triangle listed twice).
   */
  residualCollisions: number;
}

/**
 * Fuse vertices across buffers without creating fully fused triangles.
 *
 * Buffers are paired by position: indexBuffers[i] indexes vertexBuffers[i].
 * Indices must be in range for their paired buffer.
 *
 * @example
 * ```typescript
 * const { fusedIdxToBufIdx, bufIdxToFusedIdx, isFused } = vertexFusion(
 *   [Uint16Array.from([0, 1, 2, 1, 3, 2])],
 *   [VertexBuffer.fromArrays(positions)],
 * );
 * ```
 */
export function vertexFusion(
  indexBuffers: readonly IndexBuffer[],
  vertexBuffers: readonly VertexBuffer[],
  options?: FusionOptionsInput,
): VertexFusionResult {
  if (indexBuffers.length !== vertexBuffers.length) {
    throw new MeshlibError(
      `Got ${indexBuffers.length} index buffers for ${vertexBuffers.length} vertex buffers`,
      ERROR_CODES.INVALID_INPUT,
    );
  }
  const fusionOptions = parseFusionOptions(options);

  let state: FusionState = "fusing";
  let fusion: FusionIndex = unfusedFusionIndex([]);
  let collisions: CollisionMap = new Map();
  let constraints: UnfuseConstraints | null = null;
  let rounds = 0;

  while (state !== "done") {
    switch (state) {
      case "fusing": {
        fusion = fuseAdjacentVertices(vertexBuffers, fusionOptions);
        logger.debug("Adjacent fusion complete", {
          buffers: vertexBuffers.length,
          fusedVertices: fusion.fusedIdxToBufIdx.length,
        });
        state = "detecting";
        break;
      }
      case "detecting": {
        collisions = detectFullyFusedTriangles(indexBuffers, fusion);
        state = collisions.size === 0 ? "done" : "deciding";
        break;
      }
      case "deciding": {
        constraints = decideOnUnfusions(
          indexBuffers,
          fusion.fusedIdxToBufIdx,
          collisions,
        );
        if (constraints.size === 0) {
          // Only exact duplicate triangles are left, unfusing cannot separate them
          logger.debug("Stopping with duplicate triangles", {
            collisions: collisions.size,
          });
          state = "done";
        } else {
          state = "solving";
        }
        break;
      }
      case "solving": {
        if (constraints === null) {
          throw new FusionInvariantError("Solving without unfusion constraints");
        }
        const previousGroups = fusion.fusedIdxToBufIdx.length;
        fusion = solveUnfusion(
          vertexBuffers,
          fusion.fusedIdxToBufIdx,
          constraints,
        );
        rounds++;

        if (fusion.fusedIdxToBufIdx.length <= previousGroups) {
          throw new FusionInvariantError(
            `Unfusion round ${rounds} did not split any group`,
            { round: rounds, groups: previousGroups },
          );
        }
        logger.debug("Unfusion round", {
          round: rounds,
          collisions: collisions.size,
          constrainedVertices: constraints.size,
          fusedVertices: fusion.fusedIdxToBufIdx.length,
        });
        constraints = null;
        state = "detecting";
        break;
      }
    }
  }

  return {
    ...fusion,
    rounds,
    residualCollisions: collisions.size,
  };
}
