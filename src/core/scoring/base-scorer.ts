import type { Row } from '../../types/table'
import type { ScoreResult, Scorer } from './types'

/**
 * Base class for all scorers shipped with the library.
 *
 * Matchers accept any object implementing `Scorer`, so extending this class
 * is optional.
 */
export abstract class BaseScorer implements Scorer {
  abstract readonly name: string

  abstract score(a: Row, b: Row): ScoreResult
}
