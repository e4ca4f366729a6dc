export { Matcher } from './threshold-matcher'
export type { MatcherConfig } from './types'
export { DEFAULT_QUERY_OPTIONS } from './types'
export { PairCollection } from './pair-collection'
export { reduceOneToOne } from './one-to-one'
export {
  MAX_SAMPLE_RANGES,
  resolveQueryOptions,
  sampleBoundaries,
} from './query-options'
