import type { Row } from '../../types/table'

/**
 * Decides whether a candidate pair is worth scoring. `true` keeps the pair.
 */
export interface PairFilter {
  valid(a: Row, b: Row): boolean
}

/**
 * A bare predicate accepted wherever a {@link PairFilter} is.
 */
export type PairPredicate = (a: Row, b: Row) => boolean

export type FilterInput = PairFilter | PairPredicate

/**
 * Runs either form of filter.
 */
export function applyFilter(filter: FilterInput, a: Row, b: Row): boolean {
  return typeof filter === 'function' ? filter(a, b) : filter.valid(a, b)
}
