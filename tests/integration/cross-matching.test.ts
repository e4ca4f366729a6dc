import { describe, it, expect } from 'vitest'
import { Matcher } from '../../src/core/matching/threshold-matcher'
import { StringSimilarity } from '../../src/core/similarity'
import { Table } from '../../src/core/table'

describe('Cross matching', () => {
  const left = Table.fromRecords(
    [
      { id: 'l1', name: 'anna' },
      { id: 'l2', name: 'bob' },
    ],
    { key: 'id', name: 'left' }
  )
  const right = Table.fromRecords(
    [
      { id: 'r1', name: 'anna' },
      { id: 'r2', name: 'ana' },
      { id: 'r3', name: 'bobby' },
    ],
    { key: 'id', name: 'right' }
  )
  const matcher = Matcher.builder()
    .fields({ name: new StringSimilarity() })
    .match(left, right)

  it('keeps the best match of every row', () => {
    expect(matcher.stats).toEqual({
      mode: 'match',
      candidatePairs: 6,
      filteredPairs: 0,
      scoredPairs: 6,
      keptPairs: 2,
    })
    expect(matcher.getPairs({ lowerBound: 0 })).toEqual([
      { score: 0.75, left: 'l2', right: 'r3' },
      { score: 1, left: 'l1', right: 'r1' },
    ])
  })

  it('reports pairs highest first', () => {
    expect(matcher.pairReport()).toEqual([
      { pairIndex: 0, score: 1, side: 'left', rowKey: 'l1', values: { id: 'l1', name: 'anna' } },
      { pairIndex: 0, score: 1, side: 'right', rowKey: 'r1', values: { id: 'r1', name: 'anna' } },
      { pairIndex: 1, score: 0.75, side: 'left', rowKey: 'l2', values: { id: 'l2', name: 'bob' } },
      { pairIndex: 1, score: 0.75, side: 'right', rowKey: 'r3', values: { id: 'r3', name: 'bobby' } },
    ])
  })

  it('places each pair in its score range', () => {
    expect(
      matcher.sampleReport().map((row) => [row.scoreRange, row.side, row.rowKey])
    ).toEqual([
      ['1.00-0.95', 'left', 'l1'],
      ['1.00-0.95', 'right', 'r1'],
      ['0.75-0.70', 'left', 'l2'],
      ['0.75-0.70', 'right', 'r3'],
    ])
  })

  it('clusters each side separately', () => {
    expect(matcher.getClusters().map((cluster) => cluster.members)).toEqual([
      [
        { side: 'left', key: 'l1' },
        { side: 'right', key: 'r1' },
      ],
      [
        { side: 'left', key: 'l2' },
        { side: 'right', key: 'r3' },
      ],
    ])
  })

  it('measures matches against both tables', () => {
    const decision = matcher.decision(0.7)
    expect(decision.matchedPairs).toBe(2)
    expect(decision.leftPercentage).toBe(100)
    expect(decision.rightPercentage).toBeCloseTo(66.667, 3)
  })

  it('leaves exact matches out on request', () => {
    expect(matcher.getPairs({ includeExactMatches: false })).toEqual([
      { score: 0.75, left: 'l2', right: 'r3' },
    ])
  })
})
