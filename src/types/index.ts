export type {
  RowKey,
  RowData,
  Row,
  CandidatePair,
  TableSide,
  MatchMode,
} from './table'

export type {
  ScoredPair,
  ClusterMember,
  Cluster,
  QueryOptions,
  ClusterReportRow,
  PairReportRow,
  SampleReportRow,
  MatchDecision,
  MatchStats,
} from './match'
