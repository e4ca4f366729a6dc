import type { QueryOptions } from '../../types/match'
import type { Logger } from '../../utils/logger'
import type { BlockingIndex } from '../blocking/types'
import type { FilterInput } from '../filters/types'
import type { ScorerInput } from '../scoring/to-scorer'
import type { Table } from '../table'
import type { Variator } from '../variators/types'

/**
 * Everything a {@link Matcher} needs. Leaving out `right` deduplicates `left`.
 */
export interface MatcherConfig {
  /** Decides which rows are compared */
  index: BlockingIndex
  /** A scorer, a field→similarity map or a two-row callback */
  scorer: ScorerInput
  /** The left table, or the only table when deduplicating */
  left: Table
  /** The right table in match mode */
  right?: Table
  /** Expands rows into variants before scoring (default: the row alone) */
  variator?: Variator
  /** Pairs rejected by any filter are never scored */
  filters?: readonly FilterInput[]
  /** Receives scoring and clustering diagnostics (default: silent) */
  logger?: Logger
}

/**
 * Defaults merged under every query's options.
 */
export const DEFAULT_QUERY_OPTIONS: Readonly<QueryOptions> = Object.freeze({
  lowerBound: 0.7,
  upperBound: 1,
  step: 0.05,
  sampleCount: 5,
  includeExactMatches: true,
})
