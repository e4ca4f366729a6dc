import type { SimilarityFunction } from './types'
import { indelRatio } from '../comparators'

const MS_PER_DAY = 24 * 60 * 60 * 1000

/**
 * Computes the similarity of two dates.
 *
 * - Dates less than `daysMaxDiff` days apart score `1 - days / daysMaxDiff`.
 * - Same year with month and day swapped scores 0.5.
 * - Same year and same day (so only the month differs) scores the string
 *   ratio of both dates written as `YYYYMMDD`.
 * - Anything else scores 0.
 *
 * Dates are read in UTC. Strings and timestamps are parsed with `Date`.
 */
export class DateSimilarity implements SimilarityFunction {
  constructor(private readonly daysMaxDiff = 30) {}

  sim(a: unknown, b: unknown): number {
    const dateA = toDate(a)
    const dateB = toDate(b)
    if (!dateA || !dateB) return 0

    const days = Math.floor(Math.abs(dateA.getTime() - dateB.getTime()) / MS_PER_DAY)
    if (days < this.daysMaxDiff) {
      return 1 - days / this.daysMaxDiff
    }

    const sameYear = dateA.getUTCFullYear() === dateB.getUTCFullYear()
    if (
      sameYear &&
      dateA.getUTCMonth() + 1 === dateB.getUTCDate() &&
      dateA.getUTCDate() === dateB.getUTCMonth() + 1
    ) {
      return 0.5
    }
    if (sameYear && dateA.getUTCDate() === dateB.getUTCDate()) {
      return indelRatio(compactDate(dateA), compactDate(dateB))
    }
    return 0
  }
}

function toDate(value: unknown): Date | null {
  let date: Date | null = null
  if (value instanceof Date) {
    date = value
  } else if (typeof value === 'string' || typeof value === 'number') {
    date = new Date(value)
  }
  if (!date || isNaN(date.getTime())) return null
  return date
}

function compactDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0')
  const month = String(date.getUTCMonth() + 1).padStart(2, '0')
  const day = String(date.getUTCDate()).padStart(2, '0')
  return `${year}${month}${day}`
}
