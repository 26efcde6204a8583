/**
 * three.js bridge for editor meshes.
 */

import { BufferAttribute, BufferGeometry } from "three";
import type { EditorMesh } from "./editor-mesh.js";

/**
 * Indexed BufferGeometry over the editor vertices.
 *
 * Each contiguous run of faces with one material becomes a geometry group
 * whose materialIndex is the source buffer id. Normals are recomputed from
 * the fused topology, so shading is continuous across fused seams.
 */
export function toBufferGeometry(mesh: EditorMesh): BufferGeometry {
  const geometry = new BufferGeometry();
  geometry.setAttribute(
    "position",
    new BufferAttribute(mesh.positions.slice(), 3),
  );
  geometry.setIndex(new BufferAttribute(mesh.faces.slice(), 1));

  const faceCount = mesh.faceMaterials.length;
  let runStart = 0;
  for (let f = 1; f <= faceCount; f++) {
    if (
      f === faceCount ||
      mesh.faceMaterials[f] !== mesh.faceMaterials[runStart]
    ) {
      geometry.addGroup(
        runStart * 3,
        (f - runStart) * 3,
        mesh.faceMaterials[runStart],
      );
      runStart = f;
    }
  }

  geometry.computeVertexNormals();
  return geometry;
}
