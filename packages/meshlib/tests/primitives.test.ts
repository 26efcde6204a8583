/**
 * Tests for the building blocks: union-find, spatial hash, flat vertex ids,
 * unfusion constraints and vertex buffers.
 */

import { describe, it, expect } from "vitest";
import {
  MeshlibError,
  UnfuseConstraints,
  UnionFind,
  VertexBuffer,
  VertexIdSpace,
  VertexSpatialHash,
  collisionKey,
  compareVertexRefs,
  formatVertexRef,
} from "../src/index.js";

// ============================================================================
// UNION-FIND
// ============================================================================

describe("UnionFind", () => {
  it("merges transitively", () => {
    const uf = new UnionFind(5);

    expect(uf.union(0, 3)).toBe(true);
    expect(uf.union(3, 4)).toBe(true);
    expect(uf.union(0, 4)).toBe(false);

    expect(uf.connected(0, 4)).toBe(true);
    expect(uf.connected(1, 2)).toBe(false);
  });

  it("lists groups ordered by lowest member", () => {
    const uf = new UnionFind(6);
    uf.union(5, 1);
    uf.union(4, 0);
    uf.union(2, 4);

    expect(uf.groups()).toEqual([[0, 2, 4], [1, 5], [3]]);
  });
});

// ============================================================================
// SPATIAL HASH
// ============================================================================

describe("VertexSpatialHash", () => {
  it("finds neighbours in adjacent cells with the same attribute key", () => {
    const hash = new VertexSpatialHash(1);
    hash.insert("a", 0.9, 0, 0, 1);
    hash.insert("a", 1.1, 0, 0, 2);
    hash.insert("b", 1.1, 0, 0, 3);
    hash.insert("a", 5, 0, 0, 4);

    const found: number[] = [];
    hash.forEachNear("a", 1.0, 0, 0, (id) => found.push(id));

    expect(found.sort()).toEqual([1, 2]);
    expect(hash.bucketCount).toBe(4);
  });

  it("buckets negative coordinates below zero", () => {
    const hash = new VertexSpatialHash(1);
    hash.insert("", -0.5, 0, 0, 7);
    hash.insert("", 0.5, 0, 0, 8);

    expect(hash.bucketCount).toBe(2);
  });
});

// ============================================================================
// VERTEX REFS
// ============================================================================

describe("vertex refs", () => {
  it("maps refs to dense flat ids and back", () => {
    const space = new VertexIdSpace([3, 0, 2]);

    expect(space.size).toBe(5);
    expect(space.bufferCount).toBe(3);
    expect(space.flat(2, 1)).toBe(4);
    expect(space.ref(2)).toEqual([0, 2]);
    // Buffer 1 is empty, so flat id 3 belongs to buffer 2
    expect(space.ref(3)).toEqual([2, 0]);
  });

  it("sizes buffers from fused groups", () => {
    const space = VertexIdSpace.fromGroups([[[0, 1], [1, 2]], [[0, 0]]]);

    expect(space.counts).toEqual([2, 3]);
  });

  it("orders and formats refs", () => {
    expect(compareVertexRefs([0, 5], [1, 0])).toBeLessThan(0);
    expect(compareVertexRefs([1, 2], [1, 1])).toBeGreaterThan(0);
    expect(formatVertexRef([1, 13])).toBe("1:13");
    expect(collisionKey([2, 3, 4])).toBe("2,3,4");
  });
});

describe("UnfuseConstraints", () => {
  it("records pairs symmetrically", () => {
    const constraints = new UnfuseConstraints(new VertexIdSpace([4, 2]));
    constraints.add([0, 1], [1, 0]);
    constraints.add([0, 1], [0, 3]);
    constraints.add([0, 2], [0, 2]);

    expect(constraints.size).toBe(3);
    expect(constraints.partnersOf([0, 1])).toEqual([[0, 3], [1, 0]]);
    expect(constraints.partnersOf([1, 0])).toEqual([[0, 1]]);
    expect(constraints.partnersOf([0, 2])).toEqual([]);
    expect(constraints.conflicts(1, 4)).toBe(true);
    expect(constraints.conflicts(4, 1)).toBe(true);
    expect(constraints.involves(2)).toBe(false);
    expect(constraints.toRecord()).toEqual({
      "0:1": ["0:3", "1:0"],
      "0:3": ["0:1"],
      "1:0": ["0:1"],
    });
  });
});

// ============================================================================
// VERTEX BUFFER
// ============================================================================

describe("VertexBuffer", () => {
  it("builds from per-vertex arrays", () => {
    const buf = VertexBuffer.fromArrays(
      [[0, 0, 0], [1, 2, 3]],
      { normal: [[0, 0, 1], [0, 1, 0]], uv0: [[0.5, 0.25], [1, 0]] },
    );

    expect(buf.vertexCount).toBe(2);
    expect(buf.channelNames).toEqual(["normal", "uv0"]);
    expect(buf.getAttribute("uv0")?.size).toBe(2);

    const out = [0, 0, 0];
    buf.getPosition(1, out);
    expect(out).toEqual([1, 2, 3]);
  });

  it("keys attributes so that signed zeros match", () => {
    const buf = VertexBuffer.fromArrays(
      [[0, 0, 0], [0, 0, 0]],
      { normal: [[0, -0, 1], [0, 0, 1]], uv0: [[0.5, 0.25], [0.5, 0.25]] },
    );

    expect(buf.attributeKey(0)).toBe("normal=0,0,1|uv0=0.5,0.25");
    expect(buf.attributeKey(0)).toBe(buf.attributeKey(1));
    expect(buf.attributeKey(0, ["uv0", "tangent"])).toBe("0.5,0.25|");
    expect(buf.vertexKey(1)).toBe("0,0,0|normal=0,0,1|uv0=0.5,0.25");
  });

  it("selects rows with optional replacement positions", () => {
    const buf = VertexBuffer.fromArrays(
      [[0, 0, 0], [1, 0, 0], [2, 0, 0]],
      { col0: [[1], [2], [3]] },
    );

    const picked = buf.select([2, 0]);
    expect(Array.from(picked.positions)).toEqual([2, 0, 0, 0, 0, 0]);
    expect(Array.from(picked.getAttribute("col0")?.data ?? [])).toEqual([3, 1]);

    const moved = buf.select([1], Float32Array.from([9, 9, 9]));
    expect(Array.from(moved.positions)).toEqual([9, 9, 9]);
    expect(Array.from(moved.getAttribute("col0")?.data ?? [])).toEqual([2]);
  });

  it("replaces one channel", () => {
    const buf = VertexBuffer.fromArrays([[0, 0, 0]], { col0: [[1]], col1: [[2]] });

    const next = buf.withAttribute("col1", Float32Array.from([5]));

    expect(Array.from(next.getAttribute("col1")?.data ?? [])).toEqual([5]);
    expect(Array.from(next.getAttribute("col0")?.data ?? [])).toEqual([1]);
  });

  it("rejects malformed data", () => {
    expect(() => new VertexBuffer(new Float32Array(4))).toThrow(MeshlibError);
    expect(() =>
      VertexBuffer.fromArrays([[0, 0, 0], [1, 1, 1]], { uv0: [[0, 0], [0]] }),
    ).toThrow('Channel "uv0" row 1 has 1 components, expected 2');
    expect(
      () =>
        new VertexBuffer(new Float32Array(3), [
          { name: "col0", size: 1, data: new Float32Array(1) },
          { name: "col0", size: 1, data: new Float32Array(1) },
        ]),
    ).toThrow('Duplicate vertex channel "col0"');
    expect(
      () =>
        new VertexBuffer(new Float32Array(6), [
          { name: "col0", size: 2, data: new Float32Array(2) },
        ]),
    ).toThrow(MeshlibError);
  });
});
