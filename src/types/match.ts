import type { MatchMode, RowData, RowKey, TableSide } from './table'

/**
 * A scored candidate pair. `left` belongs to the left table and `right` to
 * the right table (the same table when deduplicating).
 */
export interface ScoredPair {
  readonly score: number
  readonly left: RowKey
  readonly right: RowKey
}

/**
 * A member of a cluster. Deduplication clusters only hold `left` members.
 */
export interface ClusterMember {
  readonly side: TableSide
  readonly key: RowKey
}

/**
 * A group of at least two rows in which every two members are linked by a
 * scored pair inside the queried interval.
 */
export interface Cluster {
  /** Members ordered by side, then by row key */
  readonly members: readonly ClusterMember[]
  /** Every pair among the members, highest score first */
  readonly pairs: readonly ScoredPair[]
  /** Score of the best pair in the cluster */
  readonly topScore: number
}

/**
 * Options accepted by every query. Partial objects are merged over
 * {@link DEFAULT_QUERY_OPTIONS}.
 */
export interface QueryOptions {
  /** Lowest score included (inclusive) */
  lowerBound: number
  /** Highest score included (inclusive) */
  upperBound: number
  /** Width of each score range in sample reports */
  step: number
  /** Pairs taken from each score range in sample reports */
  sampleCount: number
  /** Keep pairs and clusters scored exactly 1 */
  includeExactMatches: boolean
}

interface ReportRowBase {
  /** Position of the pair within its cluster, range or report */
  pairIndex: number
  score: number
  side: TableSide
  rowKey: RowKey
  /** The row's full field values */
  values: RowData
}

/**
 * One row of a cluster report. Each pair contributes two rows, one per member.
 */
export interface ClusterReportRow extends ReportRowBase {
  clusterIndex: number
}

/**
 * One row of a flat pair report.
 */
export type PairReportRow = ReportRowBase

/**
 * One row of a sample report, labelled with its score range ("upper-lower").
 */
export interface SampleReportRow extends ReportRowBase {
  scoreRange: string
}

/**
 * How many pairs clear a decision threshold.
 */
export interface MatchDecision {
  threshold: number
  /** Number of pairs scoring at least the threshold */
  matchedPairs: number
  /** matchedPairs as a percentage of the left table's size */
  leftPercentage: number
  /** matchedPairs as a percentage of the right table's size */
  rightPercentage: number
}

/**
 * Counters collected while scoring.
 */
export interface MatchStats {
  mode: MatchMode
  /** Pairs produced by the pair generator */
  candidatePairs: number
  /** Pairs dropped by filters */
  filteredPairs: number
  /** Pairs that were scored */
  scoredPairs: number
  /** Pairs left after one-to-one reduction (equal to scoredPairs when deduplicating) */
  keptPairs: number
}
