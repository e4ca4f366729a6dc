import type { Row, RowData, RowKey } from '../types/table'
import { InvalidParameterError, UnknownRowError } from '../utils/errors'

/**
 * Options for building a table from plain records.
 *
 * @typeParam T - The shape of the user's data object
 */
export interface TableOptions<T extends object> {
  /** Display name used in error messages (default: 'table') */
  name?: string
  /**
   * Where each row's key comes from: a field of the record, or a function.
   * Defaults to the record's position in the input array.
   */
  key?: (keyof T & string) | ((record: T, position: number) => RowKey)
  /** Ordered field names. Defaults to every field seen, in order of first appearance. */
  fields?: string[]
}

/**
 * An ordered, immutable collection of rows with named fields.
 *
 * Duplicate keys are allowed at construction so that pair generation can
 * report them as a structural error; lookups resolve to the first row with a key.
 *
 * @example
 * ```typescript
 * const people = Table.fromRecords(
 *   [
 *     { id: 'p1', last: 'beech', first: 'freddie' },
 *     { id: 'p2', last: 'beech', first: 'freedie' },
 *   ],
 *   { key: 'id' }
 * )
 * ```
 */
export class Table {
  readonly name: string
  readonly fields: readonly string[]
  readonly rows: readonly Row[]
  private readonly byKey: Map<RowKey, Row>

  constructor(rows: readonly Row[], fields?: readonly string[], name = 'table') {
    this.name = name
    this.rows = rows
    this.fields = fields ?? collectFields(rows)
    this.byKey = new Map()
    for (const row of rows) {
      if (!this.byKey.has(row.key)) {
        this.byKey.set(row.key, row)
      }
    }
  }

  /**
   * Builds a table from an array of plain objects.
   *
   * @param records - Source records
   * @param options - Key extraction, field order and table name
   * @returns A new table
   */
  static fromRecords<T extends object>(
    records: readonly T[],
    options: TableOptions<T> = {}
  ): Table {
    const rows = records.map((record, position): Row => {
      const data: RowData = Object.fromEntries(Object.entries(record))
      return { key: extractKey(record, data, position, options), data }
    })
    return new Table(rows, options.fields, options.name)
  }

  get size(): number {
    return this.rows.length
  }

  keys(): RowKey[] {
    return this.rows.map((row) => row.key)
  }

  has(key: RowKey): boolean {
    return this.byKey.has(key)
  }

  get(key: RowKey): Row {
    const row = this.byKey.get(key)
    if (!row) {
      throw new UnknownRowError(key, this.name)
    }
    return row
  }

  /**
   * Returns a table holding only the given rows, in the order of `keys`.
   */
  subset(keys: readonly RowKey[]): Table {
    return new Table(
      keys.map((key) => this.get(key)),
      this.fields,
      this.name
    )
  }

  /**
   * Returns every key that appears more than once, each reported once.
   */
  duplicateKeys(): RowKey[] {
    const seen = new Set<RowKey>()
    const duplicates = new Set<RowKey>()
    for (const row of this.rows) {
      if (seen.has(row.key)) {
        duplicates.add(row.key)
      }
      seen.add(row.key)
    }
    return Array.from(duplicates)
  }
}

function collectFields(rows: readonly Row[]): string[] {
  const fields = new Set<string>()
  for (const row of rows) {
    for (const field of Object.keys(row.data)) {
      fields.add(field)
    }
  }
  return Array.from(fields)
}

function extractKey<T extends object>(
  record: T,
  data: RowData,
  position: number,
  options: TableOptions<T>
): RowKey {
  if (options.key === undefined) {
    return position
  }
  if (typeof options.key === 'function') {
    return options.key(record, position)
  }

  const value = data[options.key]
  if (typeof value !== 'string' && typeof value !== 'number') {
    throw new InvalidParameterError(
      'key',
      value,
      `field '${options.key}' must hold a string or number in every record`,
      { position }
    )
  }
  return value
}
