import type { CandidatePair } from '../../types/table'
import type { BlockingIndex } from '../blocking/types'
import type { Table } from '../table'
import type { PairGenerator } from './types'
import { assertUniqueKeys } from './validation'

/**
 * Pairs rows of a single table for deduplication.
 *
 * Within each bucket every 2-combination of rows is yielded once, with the
 * lower row key on the left. Rows sharing several buckets are still paired
 * only once.
 */
export class DedupPairGenerator implements PairGenerator {
  readonly mode = 'deduplicate' as const
  readonly right: Table

  constructor(
    readonly left: Table,
    private readonly index: BlockingIndex
  ) {
    assertUniqueKeys(left)
    this.right = left
  }

  *pairs(): Generator<CandidatePair> {
    const indexed = this.index.index(this.left)
    const seen = new Set<string>()

    for (const key of indexed.keys()) {
      const rows = indexed.rows(key)
      for (let i = 0; i < rows.length; i++) {
        for (let j = i + 1; j < rows.length; j++) {
          const pairId = JSON.stringify([rows[i].key, rows[j].key])
          if (seen.has(pairId)) continue
          seen.add(pairId)
          yield { left: rows[i], right: rows[j] }
        }
      }
    }
  }
}
