import type { Cluster, ClusterMember, ScoredPair } from '../../types/match'
import type { MatchMode, RowKey, TableSide } from '../../types/table'
import { compareRowKeys } from '../../utils/values'
import { UnionFind } from './union-find'

/**
 * Result of clustering one score interval.
 */
export interface ClusterResult {
  /** Connected components found before clique splitting */
  components: number
  /** Final clusters, highest top score first */
  clusters: Cluster[]
}

interface Edge {
  a: number
  b: number
  pair: ScoredPair
}

/**
 * Orders members by side (left first), then by row key.
 */
export function compareMembers(a: ClusterMember, b: ClusterMember): number {
  if (a.side !== b.side) return a.side === 'left' ? -1 : 1
  return compareRowKeys(a.key, b.key)
}

/**
 * Orders pairs by score descending, then by left and right key.
 */
export function comparePairsDescending(a: ScoredPair, b: ScoredPair): number {
  return (
    b.score - a.score ||
    compareRowKeys(a.left, b.left) ||
    compareRowKeys(a.right, b.right)
  )
}

/**
 * Groups scored pairs into clusters whose members are all linked to each other.
 *
 * Pairs are consumed from the highest score down. Connected components are
 * found with a union-find, then each component is split into cliques. Seeds
 * are taken from the endpoints of the component's pairs, highest score first,
 * so the strongest pairs claim their members before weaker ones. A clique
 * grows breadth-first and admits a neighbour only when it is linked to every
 * member already admitted; neighbours are tried by link score, highest first.
 * Equal scores fall back to member order, so the result is deterministic.
 * Cliques of a single member are dropped.
 *
 * In match mode left and right keys are distinct members even when equal;
 * in deduplicate mode both keys name rows of the same table.
 *
 * @param pairs - Pairs of one score interval, sorted ascending by score
 * @param mode - Whether the pairs link two tables or one
 */
export function buildClusters(
  pairs: readonly ScoredPair[],
  mode: MatchMode
): ClusterResult {
  const rightSide: TableSide = mode === 'match' ? 'right' : 'left'
  const ids = new Map<string, number>()
  const members: ClusterMember[] = []
  const forest = new UnionFind()

  const nodeOf = (side: TableSide, key: RowKey): number => {
    const id = JSON.stringify([side, key])
    const existing = ids.get(id)
    if (existing !== undefined) return existing
    const node = forest.add()
    ids.set(id, node)
    members.push({ side, key })
    return node
  }

  const edges: Edge[] = []
  for (let i = pairs.length - 1; i >= 0; i--) {
    const pair = pairs[i]
    const a = nodeOf('left', pair.left)
    const b = nodeOf(rightSide, pair.right)
    if (a === b) continue
    forest.union(a, b)
    edges.push({ a, b, pair })
  }

  // Components in order of their highest edge
  const components = new Map<number, Edge[]>()
  for (const edge of edges) {
    const root = forest.find(edge.a)
    const component = components.get(root)
    if (component) component.push(edge)
    else components.set(root, [edge])
  }

  const clusters: Cluster[] = []
  for (const component of components.values()) {
    clusters.push(...splitIntoCliques(component, members))
  }
  clusters.sort((x, y) => y.topScore - x.topScore)

  return { components: components.size, clusters }
}

function splitIntoCliques(
  edges: readonly Edge[],
  members: readonly ClusterMember[]
): Cluster[] {
  const adjacency = new Map<number, Map<number, ScoredPair>>()
  const link = (from: number, to: number, pair: ScoredPair): void => {
    const neighbours = adjacency.get(from)
    if (neighbours) neighbours.set(to, pair)
    else adjacency.set(from, new Map([[to, pair]]))
  }
  for (const { a, b, pair } of edges) {
    link(a, b, pair)
    link(b, a, pair)
  }

  const byMember = (x: number, y: number): number =>
    compareMembers(members[x], members[y])
  const ends = (edge: Edge): [number, number] =>
    byMember(edge.a, edge.b) <= 0 ? [edge.a, edge.b] : [edge.b, edge.a]

  const seeds: number[] = []
  const seeded = new Set<number>()
  const ordered = [...edges].sort((x, y) => {
    const [xLow, xHigh] = ends(x)
    const [yLow, yHigh] = ends(y)
    return (
      y.pair.score - x.pair.score ||
      byMember(xLow, yLow) ||
      byMember(xHigh, yHigh)
    )
  })
  for (const edge of ordered) {
    for (const node of ends(edge)) {
      if (seeded.has(node)) continue
      seeded.add(node)
      seeds.push(node)
    }
  }

  const visited = new Set<number>()
  const cliques: Cluster[] = []

  for (const start of seeds) {
    if (visited.has(start)) continue
    visited.add(start)
    const clique = [start]
    const queue = [start]

    for (let head = 0; head < queue.length; head++) {
      const neighbours = adjacency.get(queue[head]) ?? new Map<number, ScoredPair>()
      const candidates = Array.from(neighbours.entries())
        .sort(([x, xPair], [y, yPair]) => yPair.score - xPair.score || byMember(x, y))
        .map(([node]) => node)
      for (const candidate of candidates) {
        if (visited.has(candidate)) continue
        const linked = adjacency.get(candidate)
        if (!clique.every((member) => linked?.has(member) === true)) continue
        visited.add(candidate)
        clique.push(candidate)
        queue.push(candidate)
      }
    }

    if (clique.length < 2) continue

    const cliquePairs: ScoredPair[] = []
    for (let i = 0; i < clique.length; i++) {
      for (let j = i + 1; j < clique.length; j++) {
        const pair = adjacency.get(clique[i])?.get(clique[j])
        if (pair) cliquePairs.push(pair)
      }
    }
    cliquePairs.sort(comparePairsDescending)

    cliques.push({
      members: clique.map((node) => members[node]).sort(compareMembers),
      pairs: cliquePairs,
      topScore: cliquePairs[0].score,
    })
  }

  return cliques
}
