/**
 * Spatial hash for fusion candidate lookup.
 *
 * Vertices are bucketed by (attribute key, quantized cell). Because the
 * cell edge is at least the fusion epsilon, any vertex within epsilon of a
 * query point lies in the query's cell or one of its 26 neighbours.
 */
export class VertexSpatialHash {
  private readonly buckets = new Map<string, number[]>();

  constructor(private readonly cellSize: number) {}

  private cell(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private bucketKey(
    attrKey: string,
    cx: number,
    cy: number,
    cz: number,
  ): string {
    return `${attrKey}#${cx}:${cy}:${cz}`;
  }

  insert(attrKey: string, x: number, y: number, z: number, id: number): void {
    const key = this.bucketKey(attrKey, this.cell(x), this.cell(y), this.cell(z));
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      this.buckets.set(key, [id]);
    }
  }

  /**
   * Visit every id inserted with the same attribute key in the 3×3×3 block
   * of cells around (x, y, z).
   */
  forEachNear(
    attrKey: string,
    x: number,
    y: number,
    z: number,
    visit: (id: number) => void,
  ): void {
    const cx = this.cell(x);
    const cy = this.cell(y);
    const cz = this.cell(z);
    for (let dx = -1; dx <= 1; dx++) {
      for (let dy = -1; dy <= 1; dy++) {
        for (let dz = -1; dz <= 1; dz++) {
          const bucket = this.buckets.get(
            this.bucketKey(attrKey, cx + dx, cy + dy, cz + dz),
          );
          if (!bucket) continue;
          for (const id of bucket) visit(id);
        }
      }
    }
  }

  get bucketCount(): number {
    return this.buckets.size;
  }
}
