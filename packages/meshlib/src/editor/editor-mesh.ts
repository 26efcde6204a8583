/**
 * Editor Mesh
 *
 * Import-side consumer of vertex fusion. The editor keys vertices by
 * identity and keeps per-corner ("loop") data separately, so:
 * - one editor vertex per fused group, at its representative's position
 * - one face per source triangle, referencing editor vertices
 * - per loop, the (bufferId, index) record its attributes come from
 */

import { parseImportOptions, type ImportOptionsInput } from "../config.js";
import { ErrorReporter } from "../errors.js";
import { unfusedFusionIndex } from "../fusion/fusion-index.js";
import { vertexFusion } from "../fusion/vertex-fusion.js";
import {
  collisionKey,
  type FusionIndex,
  type IndexBuffer,
  type Triple,
} from "../types.js";
import { validateMeshBuffers } from "../validation.js";
import type { VertexBuffer } from "../vertex-buffer.js";

export interface EditorMeshStats {
  /** Vertex records across all source buffers */
  sourceVertices: number;
  /** Vertices in the editor mesh */
  editorVertices: number;
  /** Source vertices merged into another vertex */
  fusedVertices: number;
  /** Faces with two corners on one editor vertex */
  droppedFaces: number;
  /** Faces with the same three editor vertices as an earlier face */
  duplicateFaces: number;
}

export interface EditorMesh {
  /** Editor vertex positions: [x, y, z, ...] */
  positions: Float32Array;
  /** Editor vertex ids, 3 per face */
  faces: Uint32Array;
  /** Material (source buffer id) per face */
  faceMaterials: Uint16Array;
  /** Source buffer id per loop (3 per face) */
  loopBuffers: Uint16Array;
  /** Source vertex index per loop (3 per face) */
  loopVertices: Uint32Array;
  fusion: FusionIndex;
  stats: EditorMeshStats;
}

/**
 * Build an editor mesh from GMD vertex and index buffers.
 *
 * Faces that collapse onto fewer than three editor vertices, and faces that
 * repeat an earlier face's vertices, are dropped and reported as
 * recoverable problems.
 */
export function buildEditorMesh(
  vertexBuffers: readonly VertexBuffer[],
  indexBuffers: readonly IndexBuffer[],
  options?: ImportOptionsInput,
): EditorMesh {
  const opts = parseImportOptions(options);
  const reporter = new ErrorReporter(opts.strict, "import");
  validateMeshBuffers(indexBuffers, vertexBuffers, reporter);

  const counts = vertexBuffers.map((buf) => buf.vertexCount);
  const fusion: FusionIndex = opts.fuseVertices
    ? vertexFusion(indexBuffers, vertexBuffers, opts.fusion)
    : unfusedFusionIndex(counts);

  const editorVertices = fusion.fusedIdxToBufIdx.length;
  const positions = new Float32Array(editorVertices * 3);
  for (let v = 0; v < editorVertices; v++) {
    const [b, i] = fusion.fusedIdxToBufIdx[v][0];
    positions.set(vertexBuffers[b].positions.subarray(i * 3, i * 3 + 3), v * 3);
  }

  let totalTriangles = 0;
  for (const indices of indexBuffers) {
    totalTriangles += Math.floor(indices.length / 3);
  }

  const faces = new Uint32Array(totalTriangles * 3);
  const faceMaterials = new Uint16Array(totalTriangles);
  const loopBuffers = new Uint16Array(totalTriangles * 3);
  const loopVertices = new Uint32Array(totalTriangles * 3);
  const seen = new Set<string>();
  let faceCount = 0;
  let droppedFaces = 0;
  let duplicateFaces = 0;

  for (let b = 0; b < indexBuffers.length; b++) {
    const indices = indexBuffers[b];
    const toFused = fusion.bufIdxToFusedIdx[b];
    const triangleCount = Math.floor(indices.length / 3);

    for (let t = 0; t < triangleCount; t++) {
      const i0 = indices[t * 3];
      const i1 = indices[t * 3 + 1];
      const i2 = indices[t * 3 + 2];
      const v0 = toFused[i0];
      const v1 = toFused[i1];
      const v2 = toFused[i2];

      if (v0 === v1 || v1 === v2 || v0 === v2) {
        droppedFaces++;
        continue;
      }
      const sorted: Triple = [v0, v1, v2];
      sorted.sort((x, y) => x - y);
      const key = collisionKey(sorted);
      if (seen.has(key)) {
        duplicateFaces++;
        continue;
      }
      seen.add(key);

      const base = faceCount * 3;
      faces[base] = v0;
      faces[base + 1] = v1;
      faces[base + 2] = v2;
      loopBuffers.fill(b, base, base + 3);
      loopVertices[base] = i0;
      loopVertices[base + 1] = i1;
      loopVertices[base + 2] = i2;
      faceMaterials[faceCount] = b;
      faceCount++;
    }
  }

  if (droppedFaces > 0) {
    reporter.recoverable(
      `${droppedFaces} faces collapsed onto fewer than three vertices and were dropped`,
      { droppedFaces },
    );
  }
  if (duplicateFaces > 0) {
    reporter.recoverable(
      `${duplicateFaces} faces duplicated an existing face and were dropped`,
      { duplicateFaces },
    );
  }

  let fusedVertices = 0;
  for (const row of fusion.isFused) {
    for (const fused of row) {
      if (fused) fusedVertices++;
    }
  }

  reporter.debug(
    "MESH",
    `Built editor mesh: ${editorVertices} vertices, ${faceCount} faces`,
  );

  return {
    positions,
    faces: faces.slice(0, faceCount * 3),
    faceMaterials: faceMaterials.slice(0, faceCount),
    loopBuffers: loopBuffers.slice(0, faceCount * 3),
    loopVertices: loopVertices.slice(0, faceCount * 3),
    fusion: {
      fusedIdxToBufIdx: fusion.fusedIdxToBufIdx,
      bufIdxToFusedIdx: fusion.bufIdxToFusedIdx,
      isFused: fusion.isFused,
    },
    stats: {
      sourceVertices: counts.reduce((sum, n) => sum + n, 0),
      editorVertices,
      fusedVertices,
      droppedFaces,
      duplicateFaces,
    },
  };
}

export function editorFaceCount(mesh: EditorMesh): number {
  return mesh.faceMaterials.length;
}
