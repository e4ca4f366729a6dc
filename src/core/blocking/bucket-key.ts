import type { RowKey } from '../../types/table'
import { compareRowKeys, isMissing } from '../../utils/values'
import type { Bucket, BucketKey, BucketKeyPart, BucketMap } from './types'

/**
 * Encodes a bucket key as a string usable as a map key.
 * Numbers and strings stay distinct (`[1]` and `["1"]` never collide).
 */
export function encodeBucketKey(key: BucketKey): string {
  return JSON.stringify(key)
}

/**
 * Converts a field value into a bucket key part.
 * Missing values become null and dates their ISO form.
 */
export function toBucketKeyPart(value: unknown): BucketKeyPart {
  if (isMissing(value)) return null
  if (typeof value === 'string' || typeof value === 'boolean') return value
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value.toISOString()
  }
  return String(value)
}

/**
 * Accumulates row keys per bucket, then emits buckets with sorted, unique row keys.
 */
export class BucketAccumulator {
  private readonly entries = new Map<
    string,
    { key: BucketKey; rowKeys: Set<RowKey> }
  >()

  add(key: BucketKey, rowKeys: Iterable<RowKey>): void {
    const encoded = encodeBucketKey(key)
    let entry = this.entries.get(encoded)
    if (!entry) {
      entry = { key, rowKeys: new Set() }
      this.entries.set(encoded, entry)
    }
    for (const rowKey of rowKeys) {
      entry.rowKeys.add(rowKey)
    }
  }

  toBucketMap(): BucketMap {
    const buckets: BucketMap = new Map()
    for (const [encoded, entry] of this.entries) {
      const bucket: Bucket = {
        key: entry.key,
        rowKeys: Array.from(entry.rowKeys).sort(compareRowKeys),
      }
      buckets.set(encoded, bucket)
    }
    return buckets
  }
}
