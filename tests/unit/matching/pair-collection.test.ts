import { describe, it, expect } from 'vitest'
import { PairCollection } from '../../../src/core/matching/pair-collection'
import { reduceOneToOne } from '../../../src/core/matching/one-to-one'
import type { ScoredPair } from '../../../src/types/match'

const pairs: ScoredPair[] = [
  { score: 0.9, left: 'a', right: 'x' },
  { score: 0.5, left: 'b', right: 'y' },
  { score: 0.7, left: 'c', right: 'z' },
  { score: 0.7, left: 'd', right: 'w' },
  { score: 1, left: 'e', right: 'v' },
]

describe('PairCollection', () => {
  const collection = new PairCollection(pairs)

  it('sorts pairs ascending by score, keeping ties in insertion order', () => {
    expect(collection.scores).toEqual([0.5, 0.7, 0.7, 0.9, 1])
    expect(collection.pairs.map((pair) => pair.left)).toEqual(['b', 'c', 'd', 'a', 'e'])
  })

  it('does not reorder its input', () => {
    expect(pairs[0].left).toBe('a')
  })

  it('bisects the score array', () => {
    expect(collection.bisectLeft(0.7)).toBe(1)
    expect(collection.bisectRight(0.7)).toBe(3)
    expect(collection.bisectLeft(2)).toBe(5)
    expect(collection.bisectRight(0)).toBe(0)
  })

  it('selects a closed interval', () => {
    expect(collection.between(0.7, 0.9).map((pair) => pair.left)).toEqual(['c', 'd', 'a'])
  })

  it('handles a degenerate interval', () => {
    expect(collection.between(0.7, 0.7)).toHaveLength(2)
    expect(collection.between(0.8, 0.8)).toHaveLength(0)
  })

  it('selects a half-open interval', () => {
    expect(collection.aboveUpTo(0.7, 1).map((pair) => pair.left)).toEqual(['a', 'e'])
  })

  it('counts pairs at or above a threshold', () => {
    expect(collection.countAtLeast(0.7)).toBe(4)
    expect(collection.countAtLeast(0.95)).toBe(1)
  })
})

describe('reduceOneToOne', () => {
  it('keeps the best pair for each key on either side', () => {
    const sorted = new PairCollection([
      { score: 0.95, left: 1, right: 1 },
      { score: 0.9, left: 1, right: 2 },
      { score: 0.85, left: 2, right: 2 },
      { score: 0.8, left: 2, right: 1 },
      { score: 0.75, left: 3, right: 3 },
    ]).pairs

    expect(reduceOneToOne(sorted)).toEqual([
      { score: 0.75, left: 3, right: 3 },
      { score: 0.85, left: 2, right: 2 },
      { score: 0.95, left: 1, right: 1 },
    ])
  })

  it('never keeps two pairs sharing a key', () => {
    const sorted = new PairCollection([
      { score: 0.9, left: 'a', right: 'x' },
      { score: 0.8, left: 'b', right: 'x' },
      { score: 0.7, left: 'a', right: 'y' },
      { score: 0.6, left: 'b', right: 'y' },
    ]).pairs
    const kept = reduceOneToOne(sorted)

    expect(new Set(kept.map((pair) => pair.left)).size).toBe(kept.length)
    expect(new Set(kept.map((pair) => pair.right)).size).toBe(kept.length)
    expect(kept).toEqual([
      { score: 0.6, left: 'b', right: 'y' },
      { score: 0.9, left: 'a', right: 'x' },
    ])
  })
})
