/**
 * Loop meshes: the export-side view of an editor mesh.
 *
 * Every face corner becomes its own vertex row, positioned at its editor
 * vertex and carrying the attributes of the source record it came from.
 * Submesh building deduplicates these rows again.
 */

import type { Triple } from "../types.js";
import type { VertexBuffer } from "../vertex-buffer.js";
import type { EditorMesh } from "./editor-mesh.js";

export interface LoopMesh {
  materialIndex: number;
  /** One row per loop */
  vertices: VertexBuffer;
  /** Loop rows per triangle */
  triangles: Triple[];
}

/**
 * Split an editor mesh into per-material loop meshes, ordered by material.
 *
 * @param vertexBuffers The source buffers the editor mesh was built from
 */
export function collectLoopMeshes(
  mesh: EditorMesh,
  vertexBuffers: readonly VertexBuffer[],
): LoopMesh[] {
  const facesByMaterial = new Map<number, number[]>();
  for (let f = 0; f < mesh.faceMaterials.length; f++) {
    const material = mesh.faceMaterials[f];
    let faces = facesByMaterial.get(material);
    if (!faces) {
      faces = [];
      facesByMaterial.set(material, faces);
    }
    faces.push(f);
  }

  const materials = [...facesByMaterial.keys()].sort((a, b) => a - b);
  return materials.map((materialIndex) => {
    const faces = facesByMaterial.get(materialIndex) ?? [];
    const loopCount = faces.length * 3;
    const rows = new Uint32Array(loopCount);
    const positions = new Float32Array(loopCount * 3);
    const triangles: Triple[] = [];

    for (let k = 0; k < faces.length; k++) {
      for (let c = 0; c < 3; c++) {
        const loop = faces[k] * 3 + c;
        const row = k * 3 + c;
        rows[row] = mesh.loopVertices[loop];
        const v = mesh.faces[loop];
        positions.set(mesh.positions.subarray(v * 3, v * 3 + 3), row * 3);
      }
      triangles.push([k * 3, k * 3 + 1, k * 3 + 2]);
    }

    return {
      materialIndex,
      vertices: vertexBuffers[materialIndex].select(rows, positions),
      triangles,
    };
  });
}
