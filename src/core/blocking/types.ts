import type { RowKey } from '../../types/table'
import type { Table } from '../table'
import type { IndexedTable } from './indexed-table'

/**
 * One component of a bucket key. Composite indices nest their sub-indices' keys.
 */
export type BucketKeyPart = string | number | boolean | null | readonly BucketKeyPart[]

/**
 * Identifies a bucket. Field indices produce one part per indexed field.
 * Rows with equal bucket keys are compared against each other.
 */
export type BucketKey = readonly BucketKeyPart[]

/**
 * A bucket: its key and the sorted keys of the rows it holds.
 */
export interface Bucket {
  readonly key: BucketKey
  readonly rowKeys: readonly RowKey[]
}

/**
 * Buckets of one table, keyed by the encoded bucket key.
 */
export type BucketMap = Map<string, Bucket>

/**
 * Statistics about the blocking of one table.
 */
export interface BlockingStats {
  /** Number of distinct rows placed in at least one bucket */
  totalRows: number
  /** Number of buckets created */
  totalBuckets: number
  /** Average number of rows per bucket */
  avgRowsPerBucket: number
  /** Minimum rows in any bucket */
  minBucketSize: number
  /** Maximum rows in any bucket */
  maxBucketSize: number
  /** Number of within-table comparisons with blocking */
  comparisonsWithBlocking: number
  /** Number of within-table comparisons without blocking (n*(n-1)/2) */
  comparisonsWithoutBlocking: number
  /** Percentage of comparisons removed by blocking */
  reductionPercentage: number
}

/**
 * Interface that all blocking indices implement.
 * An index decides which rows of a table share a bucket.
 */
export interface BlockingIndex {
  /** Descriptive name of this index */
  readonly name: string

  /**
   * Groups the rows of a table into buckets.
   *
   * @param table - The table to partition
   * @returns Map of encoded bucket keys to buckets
   */
  buildBuckets(table: Table): BucketMap

  /**
   * Indexes a table and returns the handle used to look buckets up.
   *
   * @param table - The table to index
   * @returns Handle bound to this table and its buckets
   */
  index(table: Table): IndexedTable
}
