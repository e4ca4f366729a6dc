import type { CandidatePair, MatchMode } from '../../types/table'
import type { Table } from '../table'

/**
 * Produces the candidate row pairs a matcher scores.
 */
export interface PairGenerator {
  readonly mode: MatchMode
  /** The left set of rows */
  readonly left: Table
  /** The right set of rows (the left table again when deduplicating) */
  readonly right: Table

  /**
   * Yields every pair of rows that share a bucket.
   */
  pairs(): Generator<CandidatePair>
}
