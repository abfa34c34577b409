/** Batch-local identity of a display name. */
export function personKey(displayName: string): string {
  return displayName.replace(/\s+/g, ' ').trim().toLowerCase();
}

export class UnionFind {
  private readonly parent: number[];
  private readonly rank: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, index) => index);
    this.rank = new Array<number>(size).fill(0);
  }

  find(node: number): number {
    let root = node;
    while (this.parent[root] !== root) root = this.parent[root] ?? root;
    let cursor = node;
    while (cursor !== root) {
      const next = this.parent[cursor] ?? root;
      this.parent[cursor] = root;
      cursor = next;
    }
    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;
    const rankA = this.rank[rootA] ?? 0;
    const rankB = this.rank[rootB] ?? 0;
    if (rankA < rankB) {
      this.parent[rootA] = rootB;
    } else if (rankA > rankB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootB] = rootA;
      this.rank[rootA] = rankA + 1;
    }
  }

  /** Components as index lists, ordered by their lowest member. */
  components(): number[][] {
    const byRoot = new Map<number, number[]>();
    for (let index = 0; index < this.parent.length; index += 1) {
      const root = this.find(index);
      const members = byRoot.get(root) ?? [];
      members.push(index);
      byRoot.set(root, members);
    }
    return [...byRoot.values()];
  }
}
