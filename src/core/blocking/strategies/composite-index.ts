import type { RowKey } from '../../../types/table'
import { requireNonEmptyArray, requireOneOf } from '../../../utils/errors'
import type { Table } from '../../table'
import { BaseIndex } from '../base-index'
import { BucketAccumulator } from '../bucket-key'
import type { BlockingIndex, BucketKey, BucketMap } from '../types'

/**
 * Mode for combining multiple indices.
 */
export type CompositeMode = 'union' | 'intersection'

const COMPOSITE_MODES: readonly CompositeMode[] = ['union', 'intersection']

/**
 * Configuration for composite indexing.
 */
export interface CompositeIndexConfig {
  /** Indices to combine */
  indices: BlockingIndex[]
  /** How to combine the indices (default: 'union') */
  mode?: CompositeMode
}

/**
 * Combines the buckets of several indices.
 *
 * In union mode the bucket key sets are concatenated: two rows are compared if
 * they share a bucket in ANY index (higher recall, more comparisons). Buckets
 * that happen to carry the same key in different indices are merged.
 *
 * In intersection mode the key set is the cartesian product of all key sets and
 * each bucket holds the rows present in every component bucket: two rows are
 * compared only if they share a bucket in ALL indices. Empty products are dropped.
 *
 * @example
 * ```typescript
 * // Last name OR year of birth
 * new CompositeIndex({
 *   indices: [
 *     new FieldIndex({ fields: 'lastName', transforms: ['soundex'] }),
 *     new FieldIndex({ fields: 'dateOfBirth', transforms: ['year'] }),
 *   ],
 * })
 *
 * // Last name AND year of birth
 * new CompositeIndex({ indices: [...], mode: 'intersection' })
 * ```
 */
export class CompositeIndex extends BaseIndex {
  readonly name: string
  private readonly indices: BlockingIndex[]
  private readonly mode: CompositeMode

  constructor(config: CompositeIndexConfig) {
    super()
    this.indices = [...requireNonEmptyArray(config.indices, 'indices')]
    this.mode = requireOneOf(config.mode ?? 'union', COMPOSITE_MODES, 'mode')
    this.name = `composite:${this.mode}:[${this.indices.map((index) => index.name).join('+')}]`
  }

  buildBuckets(table: Table): BucketMap {
    const bucketMaps = this.indices.map((index) => index.buildBuckets(table))

    if (this.mode === 'union') {
      return this.generateUnionBuckets(bucketMaps)
    }
    return this.generateIntersectionBuckets(bucketMaps)
  }

  private generateUnionBuckets(bucketMaps: BucketMap[]): BucketMap {
    const accumulator = new BucketAccumulator()
    for (const buckets of bucketMaps) {
      for (const bucket of buckets.values()) {
        accumulator.add(bucket.key, bucket.rowKeys)
      }
    }
    return accumulator.toBucketMap()
  }

  private generateIntersectionBuckets(bucketMaps: BucketMap[]): BucketMap {
    // Partial products; intersections only shrink, so empty ones are pruned early
    let partials: Array<{ key: BucketKey[]; rowKeys: Set<RowKey> | null }> = [
      { key: [], rowKeys: null },
    ]

    for (const buckets of bucketMaps) {
      const next: typeof partials = []
      for (const partial of partials) {
        for (const bucket of buckets.values()) {
          const rowKeys = new Set(
            partial.rowKeys === null
              ? bucket.rowKeys
              : bucket.rowKeys.filter((rowKey) => partial.rowKeys?.has(rowKey))
          )
          if (rowKeys.size === 0) continue
          next.push({ key: [...partial.key, bucket.key], rowKeys })
        }
      }
      partials = next
    }

    const accumulator = new BucketAccumulator()
    for (const partial of partials) {
      accumulator.add(partial.key, partial.rowKeys ?? [])
    }
    return accumulator.toBucketMap()
  }
}
