import { describe, it, expect } from 'vitest'
import { IndexBuilder } from '../../../src/builder/index-builder'
import { FieldIndex } from '../../../src/core/blocking/strategies/field-index'
import { Table } from '../../../src/core/table'
import { ConfigurationError } from '../../../src/utils/errors'

describe('IndexBuilder', () => {
  it('builds a noop index when nothing is configured', () => {
    expect(new IndexBuilder().build().name).toBe('noop')
    expect(new IndexBuilder().none().build().name).toBe('noop')
  })

  it('returns a single index as is', () => {
    const index = new IndexBuilder().onField('last', { transform: 'soundex' }).build()
    expect(index).toBeInstanceOf(FieldIndex)
    expect(index.name).toBe('fields:last:soundex')
  })

  it('combines several indices in union mode', () => {
    const index = new IndexBuilder()
      .onField('last')
      .onFields(['first', 'dob'], { transforms: ['firstLetter', 'year'] })
      .build()
    expect(index.name).toBe(
      'composite:union:[fields:last+fields:first:firstLetter+dob:year]'
    )
  })

  it('builds composite indices', () => {
    const index = new IndexBuilder()
      .composite('intersection', (comp) => comp.onField('a').onField('b'))
      .build()
    expect(index.name).toBe('composite:intersection:[fields:a+fields:b]')
  })

  it('accepts a configurator that returns nothing', () => {
    const index = new IndexBuilder()
      .composite('union', (comp) => {
        comp.onField('a')
      })
      .build()
    expect(index.name).toBe('composite:union:[fields:a]')
  })

  it('rejects an empty composite', () => {
    expect(() => new IndexBuilder().composite('union', (comp) => comp)).toThrow(
      ConfigurationError
    )
  })

  it('adds prebuilt indices', () => {
    const index = new IndexBuilder().use(new FieldIndex({ fields: 'x' })).build()
    expect(index.name).toBe('fields:x')
  })

  it('applies the default null strategy to later field indices', () => {
    const table = Table.fromRecords([{ g: null }, { g: null }, { g: 'a' }])

    const blocked = new IndexBuilder().onField('g').build()
    expect(blocked.buildBuckets(table).size).toBe(2)

    const skipped = new IndexBuilder().nullStrategy('skip').onField('g').build()
    expect(skipped.buildBuckets(table).size).toBe(1)
  })

  it('lets a field override the default null strategy', () => {
    const table = Table.fromRecords([{ g: null }, { g: 'a' }])
    const index = new IndexBuilder()
      .nullStrategy('skip')
      .onField('g', { nullStrategy: 'block' })
      .build()
    expect(index.buildBuckets(table).size).toBe(2)
  })
})
