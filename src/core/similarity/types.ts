/**
 * A similarity function compares two non-null field values and returns a
 * score between 0 (nothing in common) and 1 (identical).
 *
 * Implementations must be pure and total for non-null inputs. Null handling is
 * the scorer's job, so `sim` is never called with a missing value.
 */
export interface SimilarityFunction {
  sim(a: unknown, b: unknown): number
}

/**
 * A bare callback accepted wherever a {@link SimilarityFunction} is.
 */
export type SimilarityCallback = (a: unknown, b: unknown) => number

export type Similarity = SimilarityFunction | SimilarityCallback

/**
 * Invokes either form of similarity.
 */
export function computeSimilarity(
  similarity: Similarity,
  a: unknown,
  b: unknown
): number {
  return typeof similarity === 'function'
    ? similarity(a, b)
    : similarity.sim(a, b)
}
