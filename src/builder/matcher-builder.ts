import type { BlockingIndex } from '../core/blocking/types'
import { NoopIndex } from '../core/blocking'
import type { FilterInput } from '../core/filters/types'
import { Matcher } from '../core/matching/threshold-matcher'
import type { MatcherConfig } from '../core/matching/types'
import type { FieldSimilarityMap } from '../core/scoring/types'
import type { ScorerInput } from '../core/scoring/to-scorer'
import { WeightedSumScorer } from '../core/scoring/weighted-sum-scorer'
import type { Table } from '../core/table'
import type { Variator } from '../core/variators/types'
import { BuilderSequenceError } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { IndexBuilder } from './index-builder'

/**
 * Fluent builder for a {@link Matcher}.
 *
 * @example
 * ```typescript
 * const matcher = Matcher.builder()
 *   .blocking(block => block.onField('lastName', { transform: 'soundex' }))
 *   .fields({
 *     lastName: new JaroWinklerSimilarity(),
 *     firstName: { similarity: new JaroWinklerSimilarity(), weight: 2 },
 *   })
 *   .variator(new SwapVariator('firstName', 'lastName'))
 *   .filter(new DissimilarFilter({ field: 'agency' }))
 *   .deduplicate(people)
 * ```
 */
export class MatcherBuilder {
  private blockingIndex?: BlockingIndex
  private scorerInput?: ScorerInput
  private rowVariator?: Variator
  private filters: FilterInput[] = []
  private log?: Logger

  /**
   * Uses an already constructed index.
   */
  index(index: BlockingIndex): this {
    this.blockingIndex = index
    return this
  }

  /**
   * Configures the index through an {@link IndexBuilder}.
   */
  blocking(
    configurator: (builder: IndexBuilder) => IndexBuilder | void
  ): this {
    const builder = new IndexBuilder()
    const result = configurator(builder)
    this.blockingIndex = (result ?? builder).build()
    return this
  }

  /**
   * Sets the scorer: an instance, a field→similarity map or a callback.
   */
  scorer(scorer: ScorerInput): this {
    this.scorerInput = scorer
    return this
  }

  /**
   * Scores pairs with a weighted root-mean-square over the given fields.
   */
  fields(fields: FieldSimilarityMap): this {
    this.scorerInput = new WeightedSumScorer(fields)
    return this
  }

  variator(variator: Variator): this {
    this.rowVariator = variator
    return this
  }

  /**
   * Adds filters. Pairs rejected by any filter are never scored.
   */
  filter(...filters: FilterInput[]): this {
    this.filters.push(...filters)
    return this
  }

  logger(logger: Logger): this {
    this.log = logger
    return this
  }

  /**
   * Builds a matcher that cross-matches two tables.
   */
  match(left: Table, right: Table): Matcher {
    return new Matcher({ ...this.config('match'), left, right })
  }

  /**
   * Builds a matcher that deduplicates one table.
   */
  deduplicate(table: Table): Matcher {
    return new Matcher({ ...this.config('deduplicate'), left: table })
  }

  private config(method: string): Omit<MatcherConfig, 'left' | 'right'> {
    if (!this.scorerInput) {
      throw new BuilderSequenceError(
        method,
        'a scorer must be configured with scorer() or fields() first'
      )
    }
    return {
      index: this.blockingIndex ?? new NoopIndex(),
      scorer: this.scorerInput,
      variator: this.rowVariator,
      filters: [...this.filters],
      logger: this.log,
    }
  }
}
