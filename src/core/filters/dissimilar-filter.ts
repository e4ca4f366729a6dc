import type { Row } from '../../types/table'
import { MissingFieldError, requireNonEmptyString } from '../../utils/errors'
import { hasField, isMissing, valuesEqual } from '../../utils/values'
import type { PairFilter } from './types'

export interface DissimilarFilterConfig {
  /** Field whose values must differ for the pair to be kept */
  field: string
  /** Keep the pair instead of failing when a row lacks the field (default: false) */
  ignoreMissing?: boolean
}

/**
 * Drops pairs whose rows hold the same value for a field.
 * Typical use: never match two records from the same source agency.
 * A null on either side keeps the pair.
 */
export class DissimilarFilter implements PairFilter {
  private readonly field: string
  private readonly ignoreMissing: boolean

  constructor(config: DissimilarFilterConfig) {
    this.field = requireNonEmptyString(config.field, 'field')
    this.ignoreMissing = config.ignoreMissing ?? false
  }

  valid(a: Row, b: Row): boolean {
    for (const row of [a, b]) {
      if (!hasField(row, this.field)) {
        if (this.ignoreMissing) return true
        throw new MissingFieldError(this.field, {
          filter: 'dissimilar',
          rowKey: row.key,
        })
      }
    }

    const left = a.data[this.field]
    const right = b.data[this.field]
    if (isMissing(left) || isMissing(right)) {
      return true
    }
    return !valuesEqual(left, right)
  }
}
