import type { Row } from '../../types/table'
import {
  MissingFieldError,
  requireInRange,
  requireNonEmptyString,
} from '../../utils/errors'
import { hasField, isMissing, valuesEqual } from '../../utils/values'
import { BaseScorer } from './base-scorer'
import type { ScoreResult } from './types'
import { refused, scored } from './types'

export interface AbsoluteScorerConfig {
  /** Field compared for exact equality */
  field: string
  /** Score returned when the values are equal */
  score: number
  /** Refuse instead of failing when a row lacks the field (default: false) */
  ignoreMissing?: boolean
}

/**
 * Returns a fixed score when a field is exactly equal on both rows and refuses
 * otherwise, including when either value is null.
 *
 * It can only veto or force a result, so it must sit inside a
 * {@link MaxScorer} or {@link MinScorer}: with `score: 1` under a max
 * combinator it forces a match, with `score: 0` under a min combinator it
 * forbids one.
 */
export class AbsoluteScorer extends BaseScorer {
  readonly name: string
  private readonly field: string
  private readonly value: number
  private readonly ignoreMissing: boolean

  constructor(config: AbsoluteScorerConfig) {
    super()
    this.field = requireNonEmptyString(config.field, 'field')
    this.value = requireInRange(config.score, 0, 1, 'score')
    this.ignoreMissing = config.ignoreMissing ?? false
    this.name = `absolute:${this.field}`
  }

  score(a: Row, b: Row): ScoreResult {
    for (const row of [a, b]) {
      if (!hasField(row, this.field)) {
        if (this.ignoreMissing) {
          return refused(`field '${this.field}' is absent`)
        }
        throw new MissingFieldError(this.field, {
          scorer: this.name,
          rowKey: row.key,
        })
      }
    }

    const left = a.data[this.field]
    const right = b.data[this.field]
    if (isMissing(left) || isMissing(right)) {
      return refused(`field '${this.field}' is null`)
    }
    if (!valuesEqual(left, right)) {
      return refused(`field '${this.field}' differs`)
    }
    return scored(this.value)
  }
}
