/**
 * Shared Types for GMD Mesh Conversion
 *
 * Fusion state is kept in flat, index-based structures:
 * - VertexRef: (bufferId, index) pair identifying one raw vertex record
 * - VertexIdSpace: dense flat integer ids over every buffer's vertices
 * - FusionIndex: bidirectional mapping between fused ids and raw vertices
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Maximum per-component position difference for two vertices to fuse */
export const FUSION_EPSILON = 1e-6;

/** Edge length of the spatial hash cells used to find fusion candidates */
export const FUSION_CELL_SIZE = 1e-4;

/** GMD index buffers are 16-bit, so a submesh holds at most this many vertices */
export const MAX_SUBMESH_VERTICES = 65535;

/** Primitive restart marker for reset-style triangle strips */
export const STRIP_RESET_INDEX = 0xffff;

/** A triangle can reference up to 3 vertices x 4 bones */
export const MIN_BONES_PER_SUBMESH = 12;

/** Bone palette size used by most GMD shaders */
export const DEFAULT_MAX_BONES_PER_SUBMESH = 32;

// ============================================================================
// PRIMITIVES
// ============================================================================

export type Vec3 = [number, number, number];

/** Triangle as three indices, in original winding */
export type Triple = [number, number, number];

/**
 * Index buffer: unsigned 16-bit indices grouped in triples.
 * Uint16Array in practice, plain arrays are accepted for convenience.
 */
export type IndexBuffer = ArrayLike<number>;

/** (bufferId, index) identifying one vertex record in one buffer */
export type VertexRef = readonly [bufferId: number, index: number];

/** Members of a fused vertex, ascending by (bufferId, index) */
export type FusedGroup = VertexRef[];

/** (bufferId, original index triple) */
export type TriangleRef = readonly [bufferId: number, indices: Triple];

/**
 * Result of vertex fusion.
 *
 * - fusedIdxToBufIdx: fused id -> members (first member is the representative)
 * - bufIdxToFusedIdx: [bufferId][index] -> fused id
 * - isFused: [bufferId][index] -> true unless the vertex is its group's representative
 */
export interface FusionIndex {
  fusedIdxToBufIdx: FusedGroup[];
  bufIdxToFusedIdx: number[][];
  isFused: boolean[][];
}

/** Triangles (from any buffer) sharing one canonical fused-id triple */
export interface CollisionGroup {
  /** Fused ids, ascending */
  fused: Triple;
  triangles: TriangleRef[];
}

/** Keyed by `collisionKey(fused)` */
export type CollisionMap = Map<string, CollisionGroup>;

/**
 * Canonical key for a fused-id triple.
 */
export function collisionKey(fused: Triple): string {
  return `${fused[0]},${fused[1]},${fused[2]}`;
}

/**
 * Render a vertex reference as "bufferId:index"
 */
export function formatVertexRef(ref: VertexRef): string {
  return `${ref[0]}:${ref[1]}`;
}

/**
 * Lexicographic (bufferId, index) ordering
 */
export function compareVertexRefs(a: VertexRef, b: VertexRef): number {
  return a[0] - b[0] || a[1] - b[1];
}

// ============================================================================
// FLAT ID SPACE
// ============================================================================

/**
 * Dense integer id space over every vertex of every buffer.
 *
 * Buffer b's vertices occupy [offsets[b], offsets[b] + counts[b]). Flat ids
 * preserve (bufferId, index) order, so sorting flat ids sorts vertex refs.
 */
export class VertexIdSpace {
  readonly counts: readonly number[];
  readonly offsets: Uint32Array;
  readonly size: number;

  constructor(counts: readonly number[]) {
    this.counts = counts;
    this.offsets = new Uint32Array(counts.length);
    let total = 0;
    for (let b = 0; b < counts.length; b++) {
      this.offsets[b] = total;
      total += counts[b];
    }
    this.size = total;
  }

  static fromGroups(groups: readonly FusedGroup[]): VertexIdSpace {
    const counts: number[] = [];
    for (const group of groups) {
      for (const [b, i] of group) {
        while (counts.length <= b) counts.push(0);
        if (i + 1 > counts[b]) counts[b] = i + 1;
      }
    }
    return new VertexIdSpace(counts);
  }

  get bufferCount(): number {
    return this.counts.length;
  }

  flat(bufferId: number, index: number): number {
    return this.offsets[bufferId] + index;
  }

  flatOf(ref: VertexRef): number {
    return this.offsets[ref[0]] + ref[1];
  }

  /**
   * Inverse of flat(). Binary search for the last buffer starting at or
   * before the flat id; empty buffers share an offset with their successor.
   */
  ref(flat: number): VertexRef {
    let lo = 0;
    let hi = this.counts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >>> 1;
      if (this.offsets[mid] <= flat) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return [lo, flat - this.offsets[lo]];
  }
}

// ============================================================================
// UNFUSION CONSTRAINTS
// ============================================================================

/**
 * Symmetric "must not share a fused vertex" relation over vertex refs.
 * Built fresh for every resolution round.
 */
export class UnfuseConstraints {
  private readonly partners = new Map<number, Set<number>>();

  constructor(readonly space: VertexIdSpace) {}

  add(a: VertexRef, b: VertexRef): void {
    const fa = this.space.flatOf(a);
    const fb = this.space.flatOf(b);
    if (fa === fb) return;
    this.link(fa, fb);
    this.link(fb, fa);
  }

  private link(from: number, to: number): void {
    let set = this.partners.get(from);
    if (!set) {
      set = new Set();
      this.partners.set(from, set);
    }
    set.add(to);
  }

  /** Flat-id conflict test, used by the solver's colouring loop */
  conflicts(a: number, b: number): boolean {
    return this.partners.get(a)?.has(b) ?? false;
  }

  /** Whether a flat id is constrained against anything */
  involves(flat: number): boolean {
    return this.partners.has(flat);
  }

  partnersOf(ref: VertexRef): VertexRef[] {
    const set = this.partners.get(this.space.flatOf(ref));
    if (!set) return [];
    return [...set].sort((x, y) => x - y).map((f) => this.space.ref(f));
  }

  /** Number of constrained vertices */
  get size(): number {
    return this.partners.size;
  }

  /** Iterate [flat, partner flats] */
  entries(): IterableIterator<[number, Set<number>]> {
    return this.partners.entries();
  }

  /**
   * Plain-object view keyed by "bufferId:index", partners sorted.
   */
  toRecord(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    const keys = [...this.partners.keys()].sort((x, y) => x - y);
    for (const key of keys) {
      const ref = this.space.ref(key);
      out[formatVertexRef(ref)] = this.partnersOf(ref).map(formatVertexRef);
    }
    return out;
  }
}
