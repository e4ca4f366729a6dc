export type { PairGenerator } from './types'
export { CrossPairGenerator } from './cross-pair-generator'
export { DedupPairGenerator } from './dedup-pair-generator'
export { assertUniqueKeys, assertSameFields } from './validation'
