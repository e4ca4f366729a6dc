import type { Row } from '../../types/table'
import { requireNonEmptyString } from '../../utils/errors'
import { isMissing, valuesEqual } from '../../utils/values'
import type { Variator } from './types'

/**
 * Yields the row, then a copy with two fields exchanged.
 *
 * Absorbs data entry where first and last name (or day and month) were
 * typed into each other's fields. No copy is made when the values are
 * equal or both null.
 *
 * @example
 * ```typescript
 * new SwapVariator('firstName', 'lastName')
 * ```
 */
export class SwapVariator implements Variator {
  constructor(
    private readonly fieldA: string,
    private readonly fieldB: string
  ) {
    requireNonEmptyString(fieldA, 'fieldA')
    requireNonEmptyString(fieldB, 'fieldB')
  }

  *variants(row: Row): Generator<Row> {
    yield row

    const a = row.data[this.fieldA]
    const b = row.data[this.fieldB]
    if ((isMissing(a) && isMissing(b)) || valuesEqual(a, b)) {
      return
    }

    yield {
      key: row.key,
      data: { ...row.data, [this.fieldA]: b, [this.fieldB]: a },
    }
  }
}
