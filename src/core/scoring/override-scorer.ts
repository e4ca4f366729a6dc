import type { Row, RowKey } from '../../types/table'
import { isMissing, valuesEqual } from '../../utils/values'
import { BaseScorer } from './base-scorer'
import type { ScoreResult, Scorer } from './types'
import { scored } from './types'

/**
 * Grouping values by row key, as a map or a plain object.
 */
export type GroupLookup =
  | ReadonlyMap<RowKey, unknown>
  | Readonly<Record<string, unknown>>

function isMapLookup(
  groups: GroupLookup
): groups is ReadonlyMap<RowKey, unknown> {
  return groups instanceof Map
}

export interface OverrideScorerConfig {
  /** The scorer whose result is adjusted */
  scorer: Scorer
  /** External grouping value of each row, by row key */
  groups: GroupLookup
  /** Applied to the wrapped score when both rows share a grouping value */
  transform: (score: number) => number
}

/**
 * Adjusts a scorer's result for rows known to share an external grouping
 * value, e.g. records already linked by another system.
 *
 * The transform applies only when both row keys have a non-null grouping
 * value and the two values are equal. Refusals pass through untouched.
 *
 * @example
 * ```typescript
 * new OverrideScorer({
 *   scorer: nameScorer,
 *   groups: new Map([[1, 'household-a'], [7, 'household-a']]),
 *   transform: (score) => Math.min(1, score + 0.2),
 * })
 * ```
 */
export class OverrideScorer extends BaseScorer {
  readonly name: string
  private readonly config: OverrideScorerConfig

  constructor(config: OverrideScorerConfig) {
    super()
    this.config = config
    this.name = `override(${config.scorer.name})`
  }

  score(a: Row, b: Row): ScoreResult {
    const result = this.config.scorer.score(a, b)
    if (result.kind === 'refusal') {
      return result
    }

    const left = this.groupOf(a.key)
    const right = this.groupOf(b.key)
    if (isMissing(left) || isMissing(right) || !valuesEqual(left, right)) {
      return result
    }
    return scored(this.config.transform(result.value))
  }

  private groupOf(key: RowKey): unknown {
    const { groups } = this.config
    if (isMapLookup(groups)) {
      return groups.get(key)
    }
    const id = String(key)
    return Object.prototype.hasOwnProperty.call(groups, id)
      ? groups[id]
      : undefined
  }
}
