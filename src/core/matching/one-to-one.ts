import type { ScoredPair } from '../../types/match'
import type { RowKey } from '../../types/table'

/**
 * Keeps at most one pair per left key and per right key, claiming keys
 * greedily from the highest score down.
 *
 * @param pairs - Pairs sorted ascending by score
 * @returns The surviving pairs, still ascending
 */
export function reduceOneToOne(pairs: readonly ScoredPair[]): ScoredPair[] {
  const claimedLeft = new Set<RowKey>()
  const claimedRight = new Set<RowKey>()
  const kept: ScoredPair[] = []

  for (let i = pairs.length - 1; i >= 0; i--) {
    const pair = pairs[i]
    if (claimedLeft.has(pair.left) || claimedRight.has(pair.right)) continue
    claimedLeft.add(pair.left)
    claimedRight.add(pair.right)
    kept.push(pair)
  }

  return kept.reverse()
}
