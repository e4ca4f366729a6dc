import type { Row } from '../../types/table'
import type { Similarity } from '../similarity/types'

/**
 * Outcome of scoring one pair: either a similarity score in [0, 1], or a
 * refusal meaning "this scorer cannot judge the pair, ask another one".
 */
export type ScoreResult =
  | { readonly kind: 'score'; readonly value: number }
  | { readonly kind: 'refusal'; readonly reason: string }

export function scored(value: number): ScoreResult {
  return { kind: 'score', value }
}

export function refused(reason: string): ScoreResult {
  return { kind: 'refusal', reason }
}

/**
 * Turns two rows into a single similarity score.
 */
export interface Scorer {
  /** Descriptive name used in logs and errors */
  readonly name: string

  /**
   * Scores a pair of rows.
   *
   * @param a - The left row
   * @param b - The right row
   */
  score(a: Row, b: Row): ScoreResult
}

/**
 * A caller-supplied function that scores two rows directly.
 */
export type ScoreCallback = (a: Row, b: Row) => number

/**
 * A weighted field entry for {@link WeightedSumScorer}.
 */
export interface FieldSimilarityEntry {
  similarity: Similarity
  /** Relative weight of the field (default: 1) */
  weight?: number
}

/**
 * Mapping between field names and the similarity used to compare them.
 */
export type FieldSimilarityMap = Readonly<
  Record<string, Similarity | FieldSimilarityEntry>
>

/**
 * Detailed scoring information for a single field comparison.
 */
export interface FieldScore {
  /** The field name that was compared */
  field: string
  /** Similarity score from the similarity function (0 when either side is null) */
  similarity: number
  /** Weight assigned to this field */
  weight: number
  /** Value from the left row */
  leftValue: unknown
  /** Value from the right row */
  rightValue: unknown
}
