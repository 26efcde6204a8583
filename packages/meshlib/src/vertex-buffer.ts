/**
 * Vertex Buffer
 *
 * Immutable vertex records stored as flat typed arrays:
 * - positions: [x0, y0, z0, x1, y1, z1, ...] (V × 3 floats)
 * - attributes: one flat array per named channel (V × size floats)
 *
 * Channel names follow the GMD layout: normal, tangent, unk, col0, col1,
 * boneData, weightData, uv0..uvN.
 */

import { ERROR_CODES, MeshlibError } from "./errors.js";
import type { Vec3 } from "./types.js";

export interface VertexAttribute {
  readonly name: string;
  /** Components per vertex */
  readonly size: number;
  readonly data: Float32Array;
}

export class VertexBuffer {
  /** Vertex positions: [x, y, z, x, y, z, ...] */
  readonly positions: Float32Array;

  /** Non-position channels, in layout order */
  readonly attributes: readonly VertexAttribute[];

  readonly vertexCount: number;

  constructor(positions: Float32Array, attributes: VertexAttribute[] = []) {
    if (positions.length % 3 !== 0) {
      throw new MeshlibError(
        `Position array length ${positions.length} is not a multiple of 3`,
        ERROR_CODES.INVALID_INPUT,
      );
    }
    this.positions = positions;
    this.vertexCount = positions.length / 3;

    const seen = new Set<string>();
    for (const attr of attributes) {
      if (seen.has(attr.name)) {
        throw new MeshlibError(
          `Duplicate vertex channel "${attr.name}"`,
          ERROR_CODES.INVALID_INPUT,
          { channel: attr.name },
        );
      }
      seen.add(attr.name);
      if (attr.size <= 0 || attr.data.length !== this.vertexCount * attr.size) {
        throw new MeshlibError(
          `Channel "${attr.name}" has ${attr.data.length} components, expected ${this.vertexCount} × ${attr.size}`,
          ERROR_CODES.INVALID_INPUT,
          { channel: attr.name, size: attr.size },
        );
      }
    }
    this.attributes = attributes;
  }

  /**
   * Create from per-vertex arrays.
   *
   * @example
   * ```typescript
   * const buf = VertexBuffer.fromArrays(
   *   [[0, 0, 0], [1, 0, 0]],
   *   { normal: [[0, 0, 1], [0, 0, 1]] },
   * );
   * ```
   */
  static fromArrays(
    positions: readonly Vec3[],
    attributes: Record<string, readonly (readonly number[])[]> = {},
  ): VertexBuffer {
    const pos = new Float32Array(positions.length * 3);
    for (let i = 0; i < positions.length; i++) {
      pos[i * 3] = positions[i][0];
      pos[i * 3 + 1] = positions[i][1];
      pos[i * 3 + 2] = positions[i][2];
    }

    const channels: VertexAttribute[] = [];
    for (const [name, rows] of Object.entries(attributes)) {
      const size = rows.length > 0 ? rows[0].length : 1;
      const data = new Float32Array(rows.length * size);
      for (let i = 0; i < rows.length; i++) {
        if (rows[i].length !== size) {
          throw new MeshlibError(
            `Channel "${name}" row ${i} has ${rows[i].length} components, expected ${size}`,
            ERROR_CODES.INVALID_INPUT,
            { channel: name, row: i },
          );
        }
        data.set(rows[i], i * size);
      }
      channels.push({ name, size, data });
    }

    return new VertexBuffer(pos, channels);
  }

  getPosition(vi: number, out: Float32Array | number[]): void {
    const base = vi * 3;
    out[0] = this.positions[base];
    out[1] = this.positions[base + 1];
    out[2] = this.positions[base + 2];
  }

  getAttribute(name: string): VertexAttribute | undefined {
    return this.attributes.find((attr) => attr.name === name);
  }

  get channelNames(): string[] {
    return this.attributes.map((attr) => attr.name);
  }

  /**
   * Key over non-position channels. Two vertices have equal keys exactly
   * when every listed channel holds equal values; 0 and -0 share a key.
   *
   * @param names Channels to include, in order; all channels when omitted.
   *   Channels this buffer lacks contribute an empty segment.
   */
  attributeKey(vi: number, names?: readonly string[]): string {
    const parts: string[] = [];
    if (names) {
      for (const name of names) {
        const attr = this.getAttribute(name);
        parts.push(attr ? channelSegment(attr, vi) : "");
      }
    } else {
      for (const attr of this.attributes) {
        parts.push(`${attr.name}=${channelSegment(attr, vi)}`);
      }
    }
    return parts.join("|");
  }

  /** Key over position and every channel; equal keys mean identical vertex data */
  vertexKey(vi: number): string {
    const base = vi * 3;
    return `${this.positions[base]},${this.positions[base + 1]},${this.positions[base + 2]}|${this.attributeKey(vi)}`;
  }

  /**
   * Copy the given rows into a new buffer with the same channels.
   *
   * @param positions Replacement positions for the selected rows (3 per row)
   */
  select(indices: ArrayLike<number>, positions?: Float32Array): VertexBuffer {
    const count = indices.length;
    let newPositions: Float32Array;
    if (positions) {
      if (positions.length !== count * 3) {
        throw new MeshlibError(
          `Replacement positions hold ${positions.length / 3} rows, expected ${count}`,
          ERROR_CODES.INVALID_INPUT,
        );
      }
      newPositions = positions;
    } else {
      newPositions = new Float32Array(count * 3);
      for (let i = 0; i < count; i++) {
        newPositions.set(
          this.positions.subarray(indices[i] * 3, indices[i] * 3 + 3),
          i * 3,
        );
      }
    }

    const channels = this.attributes.map((attr) => {
      const data = new Float32Array(count * attr.size);
      for (let i = 0; i < count; i++) {
        const src = indices[i] * attr.size;
        data.set(attr.data.subarray(src, src + attr.size), i * attr.size);
      }
      return { name: attr.name, size: attr.size, data };
    });

    return new VertexBuffer(newPositions, channels);
  }

  /**
   * Copy of this buffer with one channel's data replaced.
   */
  withAttribute(name: string, data: Float32Array): VertexBuffer {
    const channels = this.attributes.map((attr) =>
      attr.name === name ? { name, size: attr.size, data } : attr,
    );
    return new VertexBuffer(this.positions, channels);
  }
}

function channelSegment(attr: VertexAttribute, vi: number): string {
  const base = vi * attr.size;
  let out = "";
  for (let c = 0; c < attr.size; c++) {
    if (c > 0) out += ",";
    // String(-0) is "0", so signed zeros compare equal
    out += String(attr.data[base + c]);
  }
  return out;
}
