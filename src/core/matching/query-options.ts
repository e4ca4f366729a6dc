import type { QueryOptions } from '../../types/match'
import {
  InvalidParameterError,
  requireAtMost,
  requireInRange,
  requirePositive,
  requirePositiveInteger,
} from '../../utils/errors'
import { DEFAULT_QUERY_OPTIONS } from './types'

/**
 * Most score ranges a sample report may walk through.
 */
export const MAX_SAMPLE_RANGES = 10_000

/**
 * Merges partial options over the defaults and validates the result.
 * Options left `undefined` take their default.
 */
export function resolveQueryOptions(
  options: Partial<QueryOptions> = {}
): QueryOptions {
  const resolved: QueryOptions = {
    lowerBound: options.lowerBound ?? DEFAULT_QUERY_OPTIONS.lowerBound,
    upperBound: options.upperBound ?? DEFAULT_QUERY_OPTIONS.upperBound,
    step: options.step ?? DEFAULT_QUERY_OPTIONS.step,
    sampleCount: options.sampleCount ?? DEFAULT_QUERY_OPTIONS.sampleCount,
    includeExactMatches:
      options.includeExactMatches ?? DEFAULT_QUERY_OPTIONS.includeExactMatches,
  }

  requireInRange(resolved.lowerBound, 0, 1, 'lowerBound')
  requireInRange(resolved.upperBound, 0, 1, 'upperBound')
  requireAtMost(resolved.lowerBound, resolved.upperBound, 'lowerBound', 'upperBound')
  requirePositive(resolved.step, 'step')
  if ((resolved.upperBound - resolved.lowerBound) / resolved.step > MAX_SAMPLE_RANGES) {
    throw new InvalidParameterError(
      'step',
      resolved.step,
      `must split [lowerBound, upperBound] into at most ${MAX_SAMPLE_RANGES} ranges`
    )
  }
  requirePositiveInteger(resolved.sampleCount, 'sampleCount')
  if (typeof resolved.includeExactMatches !== 'boolean') {
    throw new InvalidParameterError(
      'includeExactMatches',
      resolved.includeExactMatches,
      'must be a boolean'
    )
  }

  return resolved
}

/**
 * Upper/lower boundaries of the sample ranges: from `upper` down by `step`,
 * ending with `lower`.
 */
export function sampleBoundaries(options: QueryOptions): number[] {
  const { lowerBound, upperBound, step } = options
  const boundaries: number[] = []
  for (let i = 0; ; i++) {
    const value = Math.round((upperBound - i * step) * 1e10) / 1e10
    if (value <= lowerBound) break
    boundaries.push(value)
  }
  boundaries.push(lowerBound)
  return boundaries
}
