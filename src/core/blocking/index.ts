export type {
  BucketKeyPart,
  BucketKey,
  Bucket,
  BucketMap,
  BlockingStats,
  BlockingIndex,
} from './types'
export { BaseIndex } from './base-index'
export { IndexedTable } from './indexed-table'
export { encodeBucketKey, toBucketKeyPart } from './bucket-key'
export type { BlockTransform, FirstNOptions } from './transforms'
export {
  applyTransform,
  firstLetter,
  firstN,
  soundexTransform,
  yearTransform,
} from './transforms'
export { NoopIndex } from './strategies/noop-index'
export { FieldIndex } from './strategies/field-index'
export type { FieldIndexConfig, NullStrategy } from './strategies/field-index'
export { CompositeIndex } from './strategies/composite-index'
export type {
  CompositeMode,
  CompositeIndexConfig,
} from './strategies/composite-index'
