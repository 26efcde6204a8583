/**
 * Vertex fusion / unfusion engine.
 *
 * @module fusion
 */

export { UnionFind } from "./union-find.js";
export { VertexSpatialHash } from "./spatial-hash.js";
export {
  buildFusionIndex,
  unfusedFusionIndex,
  invertFusedGroups,
  assertPartition,
  fusionVertexCounts,
} from "./fusion-index.js";
export { fuseAdjacentVertices } from "./fuse-adjacent.js";
export { detectFullyFusedTriangles, collisionsToRecord } from "./detect.js";
export { decideOnUnfusions, findInteriorFusedVertices } from "./decide.js";
export { solveUnfusion, assertConstraintsHold } from "./solve.js";
export { vertexFusion } from "./vertex-fusion.js";
export type { FusionState, VertexFusionResult } from "./vertex-fusion.js";
