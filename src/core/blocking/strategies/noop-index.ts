import type { Table } from '../../table'
import { BaseIndex } from '../base-index'
import { BucketAccumulator } from '../bucket-key'
import type { BucketMap } from '../types'

/**
 * Puts the whole table into a single bucket keyed `[]`.
 *
 * Using this is like using no index at all: every row is compared with every
 * other row. Fine for small tables.
 */
export class NoopIndex extends BaseIndex {
  readonly name = 'noop'

  buildBuckets(table: Table): BucketMap {
    if (table.size === 0) {
      return new Map()
    }
    const accumulator = new BucketAccumulator()
    accumulator.add([], table.keys())
    return accumulator.toBucketMap()
  }
}
