import type { Row, RowKey } from '../../types/table'
import { UnknownBucketError } from '../../utils/errors'
import type { Table } from '../table'
import { encodeBucketKey } from './bucket-key'
import type { Bucket, BucketKey, BucketMap, BlockingStats } from './types'

/**
 * Handle returned by {@link BlockingIndex.index}. It ties a table to the
 * buckets computed for it, so bucket lookups never need to find the table again.
 */
export class IndexedTable {
  constructor(
    readonly table: Table,
    readonly indexName: string,
    private readonly buckets: BucketMap
  ) {}

  /**
   * Returns the distinct bucket keys, in order of first appearance.
   */
  keys(): BucketKey[] {
    return Array.from(this.buckets.values(), (bucket) => bucket.key)
  }

  has(key: BucketKey): boolean {
    return this.buckets.has(encodeBucketKey(key))
  }

  entries(): Bucket[] {
    return Array.from(this.buckets.values())
  }

  get size(): number {
    return this.buckets.size
  }

  /**
   * Returns the rows of one bucket, ordered by row key.
   *
   * @param key - One of the keys returned by {@link keys}
   */
  rows(key: BucketKey): Row[] {
    return this.lookup(key).map((rowKey) => this.table.get(rowKey))
  }

  /**
   * Returns one bucket as a table of its own.
   *
   * @param key - One of the keys returned by {@link keys}
   */
  bucket(key: BucketKey): Table {
    return this.table.subset(this.lookup(key))
  }

  /**
   * Calculates statistics about the buckets of this table.
   * Useful for understanding blocking effectiveness and tuning indices.
   */
  stats(): BlockingStats {
    const buckets = this.entries()
    const totalBuckets = buckets.length
    const rowCount = this.table.size
    const comparisonsWithoutBlocking =
      rowCount > 1 ? (rowCount * (rowCount - 1)) / 2 : 0

    if (totalBuckets === 0) {
      return {
        totalRows: 0,
        totalBuckets: 0,
        avgRowsPerBucket: 0,
        minBucketSize: 0,
        maxBucketSize: 0,
        comparisonsWithBlocking: 0,
        comparisonsWithoutBlocking,
        reductionPercentage: comparisonsWithoutBlocking > 0 ? 100 : 0,
      }
    }

    const distinctRows = new Set<RowKey>()
    let totalAppearances = 0
    let minBucketSize = Infinity
    let maxBucketSize = 0
    let comparisonsWithBlocking = 0

    for (const bucket of buckets) {
      const size = bucket.rowKeys.length
      totalAppearances += size
      if (size < minBucketSize) minBucketSize = size
      if (size > maxBucketSize) maxBucketSize = size
      comparisonsWithBlocking += (size * (size - 1)) / 2
      for (const rowKey of bucket.rowKeys) {
        distinctRows.add(rowKey)
      }
    }

    const reductionPercentage =
      comparisonsWithoutBlocking > 0
        ? ((comparisonsWithoutBlocking - comparisonsWithBlocking) /
            comparisonsWithoutBlocking) *
          100
        : 0

    return {
      totalRows: distinctRows.size,
      totalBuckets,
      avgRowsPerBucket: totalAppearances / totalBuckets,
      minBucketSize,
      maxBucketSize,
      comparisonsWithBlocking,
      comparisonsWithoutBlocking,
      reductionPercentage,
    }
  }

  private lookup(key: BucketKey): readonly RowKey[] {
    const encoded = encodeBucketKey(key)
    const bucket = this.buckets.get(encoded)
    if (!bucket) {
      throw new UnknownBucketError(encoded, this.indexName)
    }
    return bucket.rowKeys
  }
}
