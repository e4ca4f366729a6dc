import type { CandidatePair } from '../../types/table'
import type { BlockingIndex } from '../blocking/types'
import type { Table } from '../table'
import type { PairGenerator } from './types'
import { assertSameFields, assertUniqueKeys } from './validation'

/**
 * Pairs rows of two tables: every left row with every right row of the same bucket.
 * A pair that shares several buckets is yielded once.
 *
 * Both tables are validated on construction: row keys must be unique within
 * each table and the two field sets must be identical.
 */
export class CrossPairGenerator implements PairGenerator {
  readonly mode = 'match' as const

  constructor(
    readonly left: Table,
    readonly right: Table,
    private readonly index: BlockingIndex
  ) {
    assertUniqueKeys(left)
    assertUniqueKeys(right)
    assertSameFields(left, right)
  }

  *pairs(): Generator<CandidatePair> {
    const indexedLeft = this.index.index(this.left)
    const indexedRight = this.index.index(this.right)
    const seen = new Set<string>()

    for (const key of indexedLeft.keys()) {
      if (!indexedRight.has(key)) continue

      const rightRows = indexedRight.rows(key)
      for (const left of indexedLeft.rows(key)) {
        for (const right of rightRows) {
          const pairId = JSON.stringify([left.key, right.key])
          if (seen.has(pairId)) continue
          seen.add(pairId)
          yield { left, right }
        }
      }
    }
  }
}
