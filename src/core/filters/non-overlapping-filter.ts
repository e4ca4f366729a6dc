import type { Row } from '../../types/table'
import { MissingFieldError, requireNonEmptyString } from '../../utils/errors'
import { hasField, toOrderable } from '../../utils/values'
import type { PairFilter } from './types'

export interface NonOverlappingFilterConfig {
  /** Field holding the start of each row's range */
  start: string
  /** Field holding the end of each row's range */
  end: string
  /** Keep the pair instead of failing when a row lacks either field (default: false) */
  ignoreMissing?: boolean
}

/**
 * Keeps a pair only when the two rows' ranges do not overlap, e.g. two
 * employment periods that cannot belong to the same stint.
 *
 * Bounds may be numbers, dates or date strings. A pair where any bound is
 * null or unparseable is kept; a row without the start or end field fails
 * unless `ignoreMissing` is set.
 */
export class NonOverlappingFilter implements PairFilter {
  private readonly start: string
  private readonly end: string
  private readonly ignoreMissing: boolean

  constructor(config: NonOverlappingFilterConfig) {
    this.start = requireNonEmptyString(config.start, 'start')
    this.end = requireNonEmptyString(config.end, 'end')
    this.ignoreMissing = config.ignoreMissing ?? false
  }

  valid(a: Row, b: Row): boolean {
    for (const row of [a, b]) {
      for (const field of [this.start, this.end]) {
        if (hasField(row, field)) continue
        if (this.ignoreMissing) return true
        throw new MissingFieldError(field, {
          filter: 'non-overlapping',
          rowKey: row.key,
        })
      }
    }

    const aStart = toOrderable(a.data[this.start])
    const aEnd = toOrderable(a.data[this.end])
    const bStart = toOrderable(b.data[this.start])
    const bEnd = toOrderable(b.data[this.end])

    if (aStart === null || aEnd === null || bStart === null || bEnd === null) {
      return true
    }
    return aEnd < bStart || aStart > bEnd
  }
}
