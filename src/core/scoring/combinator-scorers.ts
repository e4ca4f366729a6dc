import type { Row } from '../../types/table'
import { ConfigurationError } from '../../utils/errors'
import { BaseScorer } from './base-scorer'
import type { ScoreResult, Scorer } from './types'
import { refused, scored } from './types'

/**
 * Runs child scorers in order and folds the scores of those that did not refuse.
 * Refuses only when every child refused.
 */
abstract class CombinatorScorer extends BaseScorer {
  readonly name: string
  protected readonly scorers: readonly Scorer[]

  constructor(kind: string, scorers: readonly Scorer[]) {
    super()
    if (scorers.length === 0) {
      throw new ConfigurationError(
        `${kind} combinator requires at least one scorer`,
        'scorers'
      )
    }
    this.scorers = scorers
    this.name = `${kind}(${scorers.map((s) => s.name).join(', ')})`
  }

  protected abstract combine(current: number, next: number): number

  score(a: Row, b: Row): ScoreResult {
    let result: number | null = null
    const reasons: string[] = []

    for (const scorer of this.scorers) {
      const outcome = scorer.score(a, b)
      if (outcome.kind === 'refusal') {
        reasons.push(outcome.reason)
        continue
      }
      result = result === null ? outcome.value : this.combine(result, outcome.value)
    }

    return result === null
      ? refused(`every scorer refused: ${reasons.join('; ')}`)
      : scored(result)
  }
}

/**
 * Returns the highest score among the child scorers.
 *
 * @example
 * ```typescript
 * // Same external id forces a match, otherwise compare names
 * new MaxScorer([
 *   new AbsoluteScorer({ field: 'attractId', score: 1 }),
 *   new WeightedSumScorer({ firstName: new JaroWinklerSimilarity() }),
 * ])
 * ```
 */
export class MaxScorer extends CombinatorScorer {
  constructor(scorers: readonly Scorer[]) {
    super('max', scorers)
  }

  protected combine(current: number, next: number): number {
    return Math.max(current, next)
  }
}

/**
 * Returns the lowest score among the child scorers.
 */
export class MinScorer extends CombinatorScorer {
  constructor(scorers: readonly Scorer[]) {
    super('min', scorers)
  }

  protected combine(current: number, next: number): number {
    return Math.min(current, next)
  }
}
