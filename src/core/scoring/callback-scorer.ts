import type { Row } from '../../types/table'
import { BaseScorer } from './base-scorer'
import type { ScoreCallback, ScoreResult } from './types'
import { scored } from './types'

/**
 * Delegates scoring to a caller-supplied function of both rows.
 */
export class CallbackScorer extends BaseScorer {
  constructor(
    private readonly callback: ScoreCallback,
    readonly name = 'callback'
  ) {
    super()
  }

  score(a: Row, b: Row): ScoreResult {
    return scored(this.callback(a, b))
  }
}
