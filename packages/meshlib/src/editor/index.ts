export {
  buildEditorMesh,
  editorFaceCount,
  type EditorMesh,
  type EditorMeshStats,
} from "./editor-mesh.js";
export { collectLoopMeshes, type LoopMesh } from "./loops.js";
export { toBufferGeometry } from "./three-geometry.js";
