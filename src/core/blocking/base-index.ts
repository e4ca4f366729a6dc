import type { Table } from '../table'
import { IndexedTable } from './indexed-table'
import type { BlockingIndex, BucketMap } from './types'

/**
 * Base class for indices. Subclasses only decide how rows map to buckets.
 */
export abstract class BaseIndex implements BlockingIndex {
  abstract readonly name: string

  abstract buildBuckets(table: Table): BucketMap

  index(table: Table): IndexedTable {
    return new IndexedTable(table, this.name, this.buildBuckets(table))
  }
}
