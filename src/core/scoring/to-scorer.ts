import { CallbackScorer } from './callback-scorer'
import type { FieldSimilarityMap, ScoreCallback, Scorer } from './types'
import { WeightedSumScorer } from './weighted-sum-scorer'

/**
 * Everything accepted where a scorer is expected: any {@link Scorer}, a
 * field→similarity map (shorthand for {@link WeightedSumScorer}) or a
 * two-row callback.
 */
export type ScorerInput = Scorer | FieldSimilarityMap | ScoreCallback

/**
 * Whether the input implements {@link Scorer}, whether or not it extends
 * `BaseScorer`. A field map never qualifies: its values are similarities,
 * so it has no string `name`.
 */
export function isScorer(input: ScorerInput): input is Scorer {
  if (typeof input !== 'object' || input === null) {
    return false
  }
  const candidate: { name?: unknown; score?: unknown } = input
  return (
    typeof candidate.name === 'string' && typeof candidate.score === 'function'
  )
}

/**
 * Normalizes any {@link ScorerInput} to a scorer.
 */
export function toScorer(input: ScorerInput): Scorer {
  if (typeof input === 'function') {
    return new CallbackScorer(input)
  }
  if (isScorer(input)) {
    return input
  }
  return new WeightedSumScorer(input)
}
