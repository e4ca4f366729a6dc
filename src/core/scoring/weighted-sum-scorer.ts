import type { Row } from '../../types/table'
import { ConfigurationError, requirePositive } from '../../utils/errors'
import { isMissing } from '../../utils/values'
import type { Similarity } from '../similarity/types'
import { computeSimilarity } from '../similarity/types'
import { BaseScorer } from './base-scorer'
import type {
  FieldScore,
  FieldSimilarityEntry,
  FieldSimilarityMap,
  ScoreResult,
} from './types'
import { scored } from './types'

interface WeightedField {
  field: string
  similarity: Similarity
  weight: number
}

function isEntry(
  value: Similarity | FieldSimilarityEntry
): value is FieldSimilarityEntry {
  return typeof value === 'object' && 'similarity' in value
}

/**
 * Combines per-field similarities into one score by weighted root-mean-square:
 * `sqrt(Σ w·s² / Σ w)`. With every weight at 1 this is the plain RMS.
 *
 * A field whose value is null on either side contributes a similarity of 0.
 *
 * @example
 * ```typescript
 * const scorer = new WeightedSumScorer({
 *   last: new JaroWinklerSimilarity(),
 *   first: { similarity: new JaroWinklerSimilarity(), weight: 2 },
 * })
 * ```
 */
export class WeightedSumScorer extends BaseScorer {
  readonly name: string
  private readonly fields: WeightedField[]
  private readonly totalWeight: number

  constructor(fields: FieldSimilarityMap) {
    super()
    this.fields = Object.entries(fields).map(([field, value]) => {
      if (isEntry(value)) {
        const weight = value.weight ?? 1
        requirePositive(weight, `${field}.weight`)
        return { field, similarity: value.similarity, weight }
      }
      return { field, similarity: value, weight: 1 }
    })

    if (this.fields.length === 0) {
      throw new ConfigurationError(
        'WeightedSumScorer requires at least one field',
        'fields'
      )
    }

    this.totalWeight = this.fields.reduce((sum, f) => sum + f.weight, 0)
    this.name = `weighted-sum:${this.fields.map((f) => f.field).join('+')}`
  }

  score(a: Row, b: Row): ScoreResult {
    let sum = 0
    for (const field of this.explain(a, b)) {
      sum += field.weight * field.similarity * field.similarity
    }
    return scored(Math.sqrt(sum / this.totalWeight))
  }

  /**
   * Returns the per-field breakdown behind {@link score}.
   */
  explain(a: Row, b: Row): FieldScore[] {
    return this.fields.map(({ field, similarity, weight }) => {
      const leftValue = a.data[field]
      const rightValue = b.data[field]
      const value =
        isMissing(leftValue) || isMissing(rightValue)
          ? 0
          : computeSimilarity(similarity, leftValue, rightValue)
      return { field, similarity: value, weight, leftValue, rightValue }
    })
  }
}
