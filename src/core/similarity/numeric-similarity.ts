import type { SimilarityFunction } from './types'
import { requirePositive } from '../../utils/errors'

function toNumber(value: unknown): number | null {
  const num = typeof value === 'number' ? value : Number(value)
  return Number.isFinite(num) ? num : null
}

/**
 * Scores two numbers by their absolute difference:
 * `max(0, 1 - |a - b| / maxDiff)`.
 *
 * @example
 * ```typescript
 * new AbsoluteNumericalSimilarity(10).sim(10, 5) // 0.5
 * ```
 */
export class AbsoluteNumericalSimilarity implements SimilarityFunction {
  private readonly maxDiff: number

  constructor(maxDiff: number) {
    this.maxDiff = requirePositive(maxDiff, 'maxDiff')
  }

  sim(a: unknown, b: unknown): number {
    const numA = toNumber(a)
    const numB = toNumber(b)
    if (numA === null || numB === null) return 0
    return Math.max(0, 1 - Math.abs(numA - numB) / this.maxDiff)
  }
}

/**
 * Scores two numbers by their difference relative to the larger magnitude,
 * in percent: `max(0, 1 - pctDiff / pctMaxDiff)`.
 *
 * @example
 * ```typescript
 * new RelativeNumericalSimilarity(30).sim(10000, 8500) // 0.5 (15% apart)
 * ```
 */
export class RelativeNumericalSimilarity implements SimilarityFunction {
  private readonly pctMaxDiff: number

  constructor(pctMaxDiff: number) {
    this.pctMaxDiff = requirePositive(pctMaxDiff, 'pctMaxDiff')
  }

  sim(a: unknown, b: unknown): number {
    const numA = toNumber(a)
    const numB = toNumber(b)
    if (numA === null || numB === null) return 0
    if (numA === numB) return 1

    const magnitude = Math.max(Math.abs(numA), Math.abs(numB))
    const pctDiff = (Math.abs(numA - numB) / magnitude) * 100
    return Math.max(0, 1 - pctDiff / this.pctMaxDiff)
  }
}
