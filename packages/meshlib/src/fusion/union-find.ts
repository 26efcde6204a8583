/**
 * Disjoint-set forest over dense integer ids, with union by rank and
 * path halving.
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;

  constructor(readonly size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  find(x: number): number {
    let node = x;
    while (this.parent[node] !== node) {
      this.parent[node] = this.parent[this.parent[node]];
      node = this.parent[node];
    }
    return node;
  }

  /**
   * Merge the sets containing a and b.
   * @returns false if they were already in the same set
   */
  union(a: number, b: number): boolean {
    let ra = this.find(a);
    let rb = this.find(b);
    if (ra === rb) return false;

    if (this.rank[ra] < this.rank[rb]) {
      const tmp = ra;
      ra = rb;
      rb = tmp;
    }
    this.parent[rb] = ra;
    if (this.rank[ra] === this.rank[rb]) {
      this.rank[ra]++;
    }
    return true;
  }

  connected(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Collect sets as ascending member lists, ordered by lowest member.
   */
  groups(): number[][] {
    const byRoot = new Map<number, number[]>();
    const out: number[][] = [];
    // Ascending scan: each list is sorted, and lists appear in order of first member
    for (let i = 0; i < this.size; i++) {
      const root = this.find(i);
      let members = byRoot.get(root);
      if (!members) {
        members = [];
        byRoot.set(root, members);
        out.push(members);
      }
      members.push(i);
    }
    return out;
  }
}
