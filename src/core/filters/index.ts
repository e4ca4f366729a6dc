export type { PairFilter, PairPredicate, FilterInput } from './types'
export { applyFilter } from './types'
export { DissimilarFilter } from './dissimilar-filter'
export type { DissimilarFilterConfig } from './dissimilar-filter'
export { NonOverlappingFilter } from './non-overlapping-filter'
export type { NonOverlappingFilterConfig } from './non-overlapping-filter'
