export { UnionFind } from './union-find'
export {
  buildClusters,
  compareMembers,
  comparePairsDescending,
} from './cluster-builder'
export type { ClusterResult } from './cluster-builder'
