/**
 * Disjoint-set forest over dense integer ids, with path compression and
 * union by size.
 */
export class UnionFind {
  private readonly parent: number[] = []
  private readonly size: number[] = []

  /**
   * Adds a new singleton set and returns its id.
   */
  add(): number {
    const id = this.parent.length
    this.parent.push(id)
    this.size.push(1)
    return id
  }

  find(id: number): number {
    let root = id
    while (this.parent[root] !== root) {
      root = this.parent[root]
    }
    let node = id
    while (this.parent[node] !== root) {
      const next = this.parent[node]
      this.parent[node] = root
      node = next
    }
    return root
  }

  /**
   * Merges the sets holding `a` and `b` and returns the new root.
   */
  union(a: number, b: number): number {
    let rootA = this.find(a)
    let rootB = this.find(b)
    if (rootA === rootB) return rootA
    if (this.size[rootA] < this.size[rootB]) {
      ;[rootA, rootB] = [rootB, rootA]
    }
    this.parent[rootB] = rootA
    this.size[rootA] += this.size[rootB]
    return rootA
  }
}
