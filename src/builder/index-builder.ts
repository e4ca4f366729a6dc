import type { BlockTransform, FirstNOptions } from '../core/blocking/transforms'
import type { NullStrategy } from '../core/blocking/strategies/field-index'
import { CompositeIndex, FieldIndex, NoopIndex } from '../core/blocking'
import type { CompositeMode } from '../core/blocking/strategies/composite-index'
import type { BlockingIndex } from '../core/blocking/types'
import { ConfigurationError } from '../utils/errors'

/**
 * Options for indexing on a single field.
 */
export interface FieldOptions {
  transform?: BlockTransform
  transformOptions?: FirstNOptions
  nullStrategy?: NullStrategy
  indexElements?: boolean
  ignoreMissing?: boolean
}

/**
 * Options for indexing on several fields at once.
 */
export interface FieldsOptions {
  transforms?: Array<BlockTransform | undefined>
  transformOptions?: Array<FirstNOptions | undefined>
  nullStrategy?: NullStrategy
  indexElements?: boolean
  ignoreMissing?: boolean
}

/**
 * Builder for the indices combined by `.composite()`.
 */
export class CompositeIndexBuilder {
  protected indices: BlockingIndex[] = []
  protected defaultNullStrategy?: NullStrategy

  /**
   * Adds an index on a single field.
   *
   * @example
   * ```typescript
   * .composite('union', comp => comp
   *   .onField('lastName', { transform: 'soundex' })
   *   .onField('dateOfBirth', { transform: 'year' })
   * )
   * ```
   */
  onField(field: string, options?: FieldOptions): this {
    this.indices.push(
      new FieldIndex({
        fields: field,
        transforms: [options?.transform],
        transformOptions: [options?.transformOptions],
        nullStrategy: options?.nullStrategy ?? this.defaultNullStrategy,
        indexElements: options?.indexElements,
        ignoreMissing: options?.ignoreMissing,
      })
    )
    return this
  }

  /**
   * Adds an index whose bucket key combines several fields.
   *
   * @example
   * ```typescript
   * .onFields(['lastName', 'firstName'], {
   *   transforms: ['soundex', 'firstLetter'],
   * })
   * ```
   */
  onFields(fields: string[], options?: FieldsOptions): this {
    this.indices.push(
      new FieldIndex({
        fields,
        transforms: options?.transforms,
        transformOptions: options?.transformOptions,
        nullStrategy: options?.nullStrategy ?? this.defaultNullStrategy,
        indexElements: options?.indexElements,
        ignoreMissing: options?.ignoreMissing,
      })
    )
    return this
  }

  /**
   * Adds an already constructed index.
   */
  use(index: BlockingIndex): this {
    this.indices.push(index)
    return this
  }

  getIndices(): BlockingIndex[] {
    return this.indices
  }
}

/**
 * Builder for the blocking index of a matcher.
 *
 * One configured index is used as is; several are combined in union mode.
 * With none at all every row is compared with every other row.
 *
 * @example
 * ```typescript
 * Matcher.builder()
 *   .blocking(block => block
 *     .onField('lastName', { transform: 'soundex' })
 *   )
 *   .fields({ lastName: new JaroWinklerSimilarity() })
 *   .deduplicate(people)
 * ```
 */
export class IndexBuilder extends CompositeIndexBuilder {
  /**
   * Combines several indices.
   *
   * In union mode rows are compared if they share a bucket in ANY index
   * (higher recall). In intersection mode they must share a bucket in ALL
   * indices (fewer comparisons).
   *
   * @example
   * ```typescript
   * .blocking(block => block
   *   .composite('intersection', comp => comp
   *     .onField('lastName', { transform: 'firstLetter' })
   *     .onField('dateOfBirth', { transform: 'year' })
   *   )
   * )
   * ```
   */
  composite(
    mode: CompositeMode,
    configurator: (
      builder: CompositeIndexBuilder
    ) => CompositeIndexBuilder | void
  ): this {
    const compositeBuilder = new CompositeIndexBuilder()
    const result = configurator(compositeBuilder)
    const indices = (result ?? compositeBuilder).getIndices()

    if (indices.length === 0) {
      throw new ConfigurationError(
        'Composite index requires at least one index',
        'indices'
      )
    }

    this.indices.push(new CompositeIndex({ indices, mode }))
    return this
  }

  /**
   * Compares every row with every other row.
   */
  none(): this {
    this.indices.push(new NoopIndex())
    return this
  }

  /**
   * Sets the null strategy for field indices added afterwards.
   */
  nullStrategy(strategy: NullStrategy): this {
    this.defaultNullStrategy = strategy
    return this
  }

  build(): BlockingIndex {
    if (this.indices.length === 0) {
      return new NoopIndex()
    }
    if (this.indices.length === 1) {
      return this.indices[0]
    }
    return new CompositeIndex({ indices: this.indices, mode: 'union' })
  }
}
