/**
 * Submesh Builder
 *
 * Turns loop meshes back into GMD submeshes: deduplicate loops, split
 * skinned meshes by bone count, split by vertex count, then encode indices.
 */

import { parseExportOptions, type ExportOptionsInput } from "../config.js";
import { ErrorReporter } from "../errors.js";
import { collectLoopMeshes, type LoopMesh } from "../editor/loops.js";
import type { EditorMesh } from "../editor/editor-mesh.js";
import type { Triple } from "../types.js";
import type { VertexAttribute, VertexBuffer } from "../vertex-buffer.js";
import { partitionTrianglesByBones, type BonePartition } from "./bones.js";
import { dedupeLoops } from "./dedupe.js";
import { MeshIndices } from "./mesh-indices.js";
import { splitByVertexLimit } from "./split.js";

const BONE_CHANNEL = "boneData";
const WEIGHT_CHANNEL = "weightData";

export interface Submesh {
  materialIndex: number;
  vertices: VertexBuffer;
  indices: MeshIndices;
  /**
   * Global bone ids; local bone index i in boneData refers to
   * relevantBones[i]. Empty for unskinned submeshes.
   */
  relevantBones: number[];
}

/**
 * Build the submeshes for one material.
 *
 * Skinned export reads bones from boneData wherever weightData is non-zero.
 * Weights above 1 are a recoverable problem and are clamped.
 */
export function buildSubmeshes(
  loopMesh: LoopMesh,
  options?: ExportOptionsInput,
  reporter?: ErrorReporter,
): Submesh[] {
  const opts = parseExportOptions(options);
  const report: ErrorReporter =
    reporter ?? new ErrorReporter(opts.strict, "export");
  const { materialIndex, triangles } = loopMesh;

  let vertices = loopMesh.vertices;
  let partitions: BonePartition[];

  if (opts.skinned) {
    const bones = vertices.getAttribute(BONE_CHANNEL);
    const weights = vertices.getAttribute(WEIGHT_CHANNEL);
    if (!bones || !weights) {
      report.fatal(
        `Material ${materialIndex} has no ${BONE_CHANNEL}/${WEIGHT_CHANNEL} channels for skinned export`,
        { materialIndex },
      );
    }
    const clamped = clampWeights(weights, materialIndex, report);
    if (clamped !== weights.data) {
      vertices = vertices.withAttribute(WEIGHT_CHANNEL, clamped);
    }

    const bonesOfLoop = (loop: number): number[] => {
      const out: number[] = [];
      for (let c = 0; c < weights.size; c++) {
        if (clamped[loop * weights.size + c] > 0) {
          out.push(Math.round(bones.data[loop * bones.size + c]));
        }
      }
      return out;
    };
    partitions = partitionTrianglesByBones(
      triangles,
      (tri) =>
        new Set([...bonesOfLoop(tri[0]), ...bonesOfLoop(tri[1]), ...bonesOfLoop(tri[2])]),
      opts.maxBonesPerSubmesh,
      report,
    );
  } else {
    partitions = [{ triangles, bones: [] }];
  }

  const allLoops = new Set<number>();
  for (const tri of triangles) {
    allLoops.add(tri[0]);
    allLoops.add(tri[1]);
    allLoops.add(tri[2]);
  }
  const { dedupedVerts, loopToDeduped } = dedupeLoops(allLoops, vertices);

  const submeshes: Submesh[] = [];
  for (const partition of partitions) {
    submeshes.push(
      ...splitByVertexLimit(
        dedupedVerts,
        loopToDeduped,
        partition.triangles,
        (verts: number[], tris: Triple[]): Submesh => ({
          materialIndex,
          vertices: opts.skinned
            ? remapBones(vertices.select(verts), partition.bones)
            : vertices.select(verts),
          indices: MeshIndices.fromTriangles(tris),
          relevantBones: partition.bones,
        }),
        opts.maxVerticesPerSubmesh,
      ),
    );
  }

  report.debug(
    "MESH",
    `Material ${materialIndex}: ${triangles.length} triangles, ${dedupedVerts.length} vertices, ${submeshes.length} submeshes`,
  );
  return submeshes;
}

/**
 * Export every material of an editor mesh.
 *
 * @example
 * ```typescript
 * const editorMesh = buildEditorMesh(vertexBuffers, indexBuffers);
 * const submeshes = exportEditorMesh(editorMesh, vertexBuffers, { skinned: true });
 * ```
 */
export function exportEditorMesh(
  editorMesh: EditorMesh,
  vertexBuffers: readonly VertexBuffer[],
  options?: ExportOptionsInput,
): Submesh[] {
  const opts = parseExportOptions(options);
  const reporter = new ErrorReporter(opts.strict, "export");

  const submeshes = collectLoopMeshes(editorMesh, vertexBuffers).flatMap(
    (loopMesh) => buildSubmeshes(loopMesh, opts, reporter),
  );
  reporter.info(`Exported ${submeshes.length} submeshes`);
  return submeshes;
}

function clampWeights(
  weights: VertexAttribute,
  materialIndex: number,
  reporter: ErrorReporter,
): Float32Array {
  if (!weights.data.some((w) => w > 1)) {
    return weights.data;
  }
  reporter.recoverable(
    `Some weights in material ${materialIndex} are greater than 1, normalize them or disable strict export to clamp them to 1`,
    { materialIndex },
  );
  return weights.data.map((w) => Math.min(w, 1));
}

/** Rewrite global bone ids to indices into the submesh's bone list */
function remapBones(vertices: VertexBuffer, relevantBones: readonly number[]): VertexBuffer {
  const bones = vertices.getAttribute(BONE_CHANNEL);
  const weights = vertices.getAttribute(WEIGHT_CHANNEL);
  if (!bones || !weights) {
    return vertices;
  }

  const local = new Map(
    relevantBones.map((bone, i): [number, number] => [bone, i]),
  );
  const data = new Float32Array(bones.data.length);
  for (let v = 0; v < vertices.vertexCount; v++) {
    for (let c = 0; c < bones.size; c++) {
      const weight = c < weights.size ? weights.data[v * weights.size + c] : 0;
      if (weight > 0) {
        data[v * bones.size + c] =
          local.get(Math.round(bones.data[v * bones.size + c])) ?? 0;
      }
    }
  }
  return vertices.withAttribute(BONE_CHANNEL, data);
}
