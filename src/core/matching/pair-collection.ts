import type { ScoredPair } from '../../types/match'

/**
 * Scored pairs sorted ascending by score, with a parallel score array for
 * binary search. Ties keep their insertion order. Immutable once built.
 */
export class PairCollection {
  readonly pairs: readonly ScoredPair[]
  readonly scores: readonly number[]

  constructor(pairs: readonly ScoredPair[], sorted = false) {
    this.pairs = sorted ? pairs : [...pairs].sort((a, b) => a.score - b.score)
    this.scores = this.pairs.map((pair) => pair.score)
  }

  get size(): number {
    return this.pairs.length
  }

  /**
   * Index of the first score `>= value`.
   */
  bisectLeft(value: number): number {
    let lo = 0
    let hi = this.scores.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (this.scores[mid] < value) lo = mid + 1
      else hi = mid
    }
    return lo
  }

  /**
   * Index of the first score `> value`.
   */
  bisectRight(value: number): number {
    let lo = 0
    let hi = this.scores.length
    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      if (value < this.scores[mid]) hi = mid
      else lo = mid + 1
    }
    return lo
  }

  /**
   * Pairs with `lower <= score <= upper`, ascending.
   */
  between(lower: number, upper: number): ScoredPair[] {
    return this.pairs.slice(this.bisectLeft(lower), this.bisectRight(upper))
  }

  /**
   * Pairs with `lower < score <= upper`, ascending.
   */
  aboveUpTo(lower: number, upper: number): ScoredPair[] {
    return this.pairs.slice(this.bisectRight(lower), this.bisectRight(upper))
  }

  /**
   * Number of pairs scoring at least `threshold`.
   */
  countAtLeast(threshold: number): number {
    return this.scores.length - this.bisectLeft(threshold)
  }
}
