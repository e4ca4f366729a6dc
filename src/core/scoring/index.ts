export type {
  ScoreResult,
  Scorer,
  ScoreCallback,
  FieldSimilarityEntry,
  FieldSimilarityMap,
  FieldScore,
} from './types'
export { scored, refused } from './types'
export { BaseScorer } from './base-scorer'
export { WeightedSumScorer } from './weighted-sum-scorer'
export { AbsoluteScorer } from './absolute-scorer'
export type { AbsoluteScorerConfig } from './absolute-scorer'
export { MaxScorer, MinScorer } from './combinator-scorers'
export { OverrideScorer } from './override-scorer'
export type { OverrideScorerConfig, GroupLookup } from './override-scorer'
export { CallbackScorer } from './callback-scorer'
export { toScorer, isScorer } from './to-scorer'
export type { ScorerInput } from './to-scorer'
