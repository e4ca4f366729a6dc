// Main entry point
export { Matcher, DEFAULT_QUERY_OPTIONS } from './core/matching'
export type { MatcherConfig } from './core/matching'
export { MatcherBuilder } from './builder/matcher-builder'
export {
  IndexBuilder,
  CompositeIndexBuilder,
  type FieldOptions,
  type FieldsOptions,
} from './builder/index-builder'

// Tables
export { Table, type TableOptions } from './core/table'

// Blocking
export {
  BaseIndex,
  NoopIndex,
  FieldIndex,
  CompositeIndex,
  IndexedTable,
  encodeBucketKey,
  applyTransform,
  type BlockingIndex,
  type BlockingStats,
  type Bucket,
  type BucketKey,
  type BucketKeyPart,
  type BlockTransform,
  type FirstNOptions,
  type FieldIndexConfig,
  type NullStrategy,
  type CompositeIndexConfig,
  type CompositeMode,
} from './core/blocking'

// Pairing
export {
  CrossPairGenerator,
  DedupPairGenerator,
  type PairGenerator,
} from './core/pairing'

// Scoring
export {
  BaseScorer,
  WeightedSumScorer,
  AbsoluteScorer,
  MaxScorer,
  MinScorer,
  OverrideScorer,
  CallbackScorer,
  toScorer,
  isScorer,
  scored,
  refused,
  type Scorer,
  type ScoreResult,
  type ScoreCallback,
  type ScorerInput,
  type FieldScore,
  type FieldSimilarityEntry,
  type FieldSimilarityMap,
  type AbsoluteScorerConfig,
  type OverrideScorerConfig,
  type GroupLookup,
} from './core/scoring'

// Similarity functions
export {
  StringSimilarity,
  JaroWinklerSimilarity,
  DateSimilarity,
  AbsoluteNumericalSimilarity,
  RelativeNumericalSimilarity,
  PhoneSimilarity,
  computeSimilarity,
  type Similarity,
  type SimilarityFunction,
  type SimilarityCallback,
  type PhoneSimilarityOptions,
} from './core/similarity'

// Comparators
export {
  indelRatio,
  jaroWinkler,
  soundexEncode,
  foldDiacritics,
  type StringComparatorOptions,
  type JaroWinklerOptions,
} from './core/comparators'

// Filters and variators
export {
  DissimilarFilter,
  NonOverlappingFilter,
  applyFilter,
  type PairFilter,
  type PairPredicate,
  type FilterInput,
  type DissimilarFilterConfig,
  type NonOverlappingFilterConfig,
} from './core/filters'
export { IdentityVariator, SwapVariator, type Variator } from './core/variators'

// Clustering
export { buildClusters, type ClusterResult } from './core/clustering'

// Types
export type * from './types'

// Errors
export {
  ThresholdMatchError,
  DuplicateRowKeyError,
  FieldSetMismatchError,
  MissingFieldError,
  UnknownBucketError,
  UnknownRowError,
  InvalidParameterError,
  ConfigurationError,
  BuilderSequenceError,
  isThresholdMatchError,
} from './utils/errors'

// Logging
export {
  consoleLogger,
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  type Logger,
  type LogContext,
  type LogLevel,
  type ConsoleLoggerOptions,
} from './utils/logger'
