/**
 * Input validation for mesh buffers.
 *
 * The fusion engine treats in-range indices as a precondition; callers
 * reading buffers from a file run this first.
 */

import type { ErrorReporter } from "./errors.js";
import type { IndexBuffer } from "./types.js";
import type { VertexBuffer } from "./vertex-buffer.js";

const MAX_INDEX = 0xffff;

/**
 * Check that index buffers pair up with vertex buffers and stay in range.
 *
 * - mismatched buffer counts: fatal
 * - index count not a multiple of three: recoverable (the tail is ignored)
 * - index outside its vertex buffer or above 0xffff: fatal
 */
export function validateMeshBuffers(
  indexBuffers: readonly IndexBuffer[],
  vertexBuffers: readonly VertexBuffer[],
  reporter: ErrorReporter,
): void {
  if (indexBuffers.length !== vertexBuffers.length) {
    reporter.fatal(
      `Got ${indexBuffers.length} index buffers for ${vertexBuffers.length} vertex buffers`,
    );
  }

  for (let b = 0; b < indexBuffers.length; b++) {
    const indices = indexBuffers[b];
    const vertexCount = vertexBuffers[b].vertexCount;

    if (indices.length % 3 !== 0) {
      reporter.recoverable(
        `Index buffer ${b} has ${indices.length} indices, trailing ${indices.length % 3} ignored`,
        { bufferId: b },
      );
    }

    for (let k = 0; k < indices.length; k++) {
      const index = indices[k];
      if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX) {
        reporter.fatal(`Index buffer ${b} entry ${k} is not a 16-bit index: ${index}`, {
          bufferId: b,
          position: k,
        });
      }
      if (index >= vertexCount) {
        reporter.fatal(
          `Index buffer ${b} entry ${k} references vertex ${index}, buffer has ${vertexCount}`,
          { bufferId: b, position: k },
        );
      }
    }
  }
}
