import type { Row } from '../../../types/table'
import {
  ConfigurationError,
  MissingFieldError,
  requireNonEmptyArray,
  requireOneOf,
} from '../../../utils/errors'
import { isMissing } from '../../../utils/values'
import type { Table } from '../../table'
import { BaseIndex } from '../base-index'
import { BucketAccumulator, toBucketKeyPart } from '../bucket-key'
import type { BlockTransform, FirstNOptions } from '../transforms'
import { applyTransform } from '../transforms'
import type { BucketKeyPart, BucketMap } from '../types'

/**
 * Strategy for rows whose indexed value is null.
 * - `block`: null is a key part like any other, so null rows share buckets
 * - `skip`: the row (or, with `indexElements`, the null element) is left out
 */
export type NullStrategy = 'block' | 'skip'

const NULL_STRATEGIES: readonly NullStrategy[] = ['block', 'skip']

/**
 * Configuration for field-based blocking.
 */
export interface FieldIndexConfig {
  /** The field or fields whose values form the bucket key */
  fields: string | string[]
  /** Optional transforms to apply to each field (matched by position) */
  transforms?: Array<BlockTransform | undefined>
  /** Options for transforms (matched by position) */
  transformOptions?: Array<FirstNOptions | undefined>
  /**
   * Treat each field value as a collection and place the row into one bucket
   * per element. With several fields, buckets come from the cartesian
   * product of their elements. (default: false)
   */
  indexElements?: boolean
  /** Produce no buckets instead of failing when a field is absent (default: false) */
  ignoreMissing?: boolean
  /** How to handle null values (default: 'block') */
  nullStrategy?: NullStrategy
}

/**
 * Groups rows by exact equality of the values of one or more fields.
 *
 * @example
 * ```typescript
 * // Block on last name
 * new FieldIndex({ fields: 'lastName' })
 *
 * // Block on Soundex of last name and birth year
 * new FieldIndex({
 *   fields: ['lastName', 'dateOfBirth'],
 *   transforms: ['soundex', 'year'],
 * })
 *
 * // Each alias in an array field opens its own bucket
 * new FieldIndex({ fields: 'aliases', indexElements: true })
 * ```
 */
export class FieldIndex extends BaseIndex {
  readonly name: string
  private readonly fields: string[]
  private readonly config: FieldIndexConfig

  constructor(config: FieldIndexConfig) {
    super()
    this.fields = [
      ...requireNonEmptyArray(
        typeof config.fields === 'string' ? [config.fields] : config.fields,
        'fields'
      ),
    ]
    this.config = config
    requireOneOf(config.nullStrategy ?? 'block', NULL_STRATEGIES, 'nullStrategy')

    this.fields.forEach((field, position) => {
      if (
        config.transforms?.[position] === 'firstN' &&
        !config.transformOptions?.[position]
      ) {
        throw new ConfigurationError(
          `firstN transform on field '${field}' requires transformOptions with n`,
          field
        )
      }
    })

    this.name = this.generateIndexName()
  }

  buildBuckets(table: Table): BucketMap {
    for (const field of this.fields) {
      if (!table.fields.includes(field)) {
        if (this.config.ignoreMissing) {
          return new Map()
        }
        throw new MissingFieldError(field, { index: this.name, table: table.name })
      }
    }

    const accumulator = new BucketAccumulator()
    for (const row of table.rows) {
      for (const key of this.generateBucketKeys(row)) {
        accumulator.add(key, [row.key])
      }
    }
    return accumulator.toBucketMap()
  }

  /**
   * Generates every bucket key of a single row.
   *
   * @param row - The row to generate keys for
   * @returns Bucket keys, possibly none
   */
  private generateBucketKeys(row: Row): BucketKeyPart[][] {
    const skipNulls = this.config.nullStrategy === 'skip'

    let keys: BucketKeyPart[][] = [[]]
    for (let position = 0; position < this.fields.length; position++) {
      let parts = this.fieldParts(row, position)
      if (skipNulls) {
        parts = parts.filter((part) => part !== null)
      }
      if (parts.length === 0) {
        return []
      }
      keys = keys.flatMap((prefix) => parts.map((part) => [...prefix, part]))
    }
    return keys
  }

  /**
   * Computes the key parts one field contributes to a row's bucket keys.
   */
  private fieldParts(row: Row, position: number): BucketKeyPart[] {
    const value = row.data[this.fields[position]]
    const elements = this.config.indexElements ? toElements(value) : [value]
    const transform = this.config.transforms?.[position]
    const transformOptions = this.config.transformOptions?.[position]

    return elements.map((element) => {
      if (isMissing(element)) return null
      if (transform) {
        return applyTransform(element, transform, transformOptions)
      }
      return toBucketKeyPart(element)
    })
  }

  /**
   * Generates a descriptive name for this index based on configuration.
   */
  private generateIndexName(): string {
    const parts = this.fields.map((field, position) => {
      const transform = this.config.transforms?.[position]
      if (!transform) return field
      return `${field}:${typeof transform === 'function' ? 'custom' : transform}`
    })
    const suffix = this.config.indexElements ? ':elements' : ''
    return `fields:${parts.join('+')}${suffix}`
  }
}

function toElements(value: unknown): unknown[] {
  if (Array.isArray(value)) return value
  if (value instanceof Set) return Array.from(value)
  return [value]
}
