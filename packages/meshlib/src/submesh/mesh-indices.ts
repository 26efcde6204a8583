/**
 * GMD index encodings for one submesh.
 *
 * Every submesh stores its triangles three ways:
 * - triangleList: 3 indices per triangle
 * - stripNoReset: one strip, separate runs joined by degenerate triangles
 * - stripReset: runs separated by the 0xffff restart index
 */

import { SubmeshLimitError } from "../errors.js";
import { STRIP_RESET_INDEX, type Triple } from "../types.js";

export class MeshIndices {
  constructor(
    readonly triangleList: Uint16Array,
    readonly stripNoReset: Uint16Array,
    readonly stripReset: Uint16Array,
  ) {}

  get triangleCount(): number {
    return this.triangleList.length / 3;
  }

  /**
   * Encode triangles. A strip run continues while a triangle's first two
   * indices equal the last two indices already in the strip.
   *
   * @throws SubmeshLimitError if an index does not fit below the restart index
   */
  static fromTriangles(triangles: readonly Triple[]): MeshIndices {
    const list: number[] = [];
    const noReset: number[] = [];
    const reset: number[] = [];

    for (const [t0, t1, t2] of triangles) {
      if (t0 >= STRIP_RESET_INDEX || t1 >= STRIP_RESET_INDEX || t2 >= STRIP_RESET_INDEX) {
        throw new SubmeshLimitError(
          `Triangle (${t0}, ${t1}, ${t2}) uses an index above ${STRIP_RESET_INDEX - 1}`,
        );
      }
      list.push(t0, t1, t2);

      if (noReset.length === 0) {
        noReset.push(t0, t1, t2);
      } else if (
        noReset[noReset.length - 2] === t0 &&
        noReset[noReset.length - 1] === t1
      ) {
        noReset.push(t2);
      } else {
        // Degenerate join: repeat the last index, then the next run's first
        noReset.push(noReset[noReset.length - 1], t0);
        noReset.push(t0, t1, t2);
      }

      if (reset.length === 0) {
        reset.push(t0, t1, t2);
      } else if (
        reset[reset.length - 2] === t0 &&
        reset[reset.length - 1] === t1
      ) {
        reset.push(t2);
      } else {
        reset.push(STRIP_RESET_INDEX, t0, t1, t2);
      }
    }

    return new MeshIndices(
      Uint16Array.from(list),
      Uint16Array.from(noReset),
      Uint16Array.from(reset),
    );
  }
}
