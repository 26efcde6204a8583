export { dedupeLoops, type DedupedLoops } from "./dedupe.js";
export { MeshIndices } from "./mesh-indices.js";
export { splitByVertexLimit, type SubmeshFactory } from "./split.js";
export { partitionTrianglesByBones, type BonePartition } from "./bones.js";
export { buildSubmeshes, exportEditorMesh, type Submesh } from "./build.js";
