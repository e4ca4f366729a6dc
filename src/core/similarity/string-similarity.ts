import type { SimilarityFunction } from './types'
import type { StringComparatorOptions } from '../comparators'
import { indelRatio, jaroWinkler } from '../comparators'

/**
 * Compares two strings by their indel ratio (see {@link indelRatio}),
 * after folding diacritics.
 *
 * @example
 * ```typescript
 * new StringSimilarity().sim('abce', 'abcd') // 0.75
 * ```
 */
export class StringSimilarity implements SimilarityFunction {
  constructor(private readonly options: StringComparatorOptions = {}) {}

  sim(a: unknown, b: unknown): number {
    return indelRatio(a, b, this.options)
  }
}

/**
 * Like {@link StringSimilarity} but gives extra weight to common prefixes.
 *
 * Works well on people's names, where a mistake in the first letters is rare.
 */
export class JaroWinklerSimilarity implements SimilarityFunction {
  private readonly options: StringComparatorOptions

  /**
   * @param prefixWeight - Extra weight given to a common prefix (default: 0.1)
   * @param options - Case and diacritic handling
   */
  constructor(
    private readonly prefixWeight = 0.1,
    options: StringComparatorOptions = {}
  ) {
    this.options = options
  }

  sim(a: unknown, b: unknown): number {
    return jaroWinkler(a, b, { ...this.options, prefixScale: this.prefixWeight })
  }
}
