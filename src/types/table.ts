/**
 * Identifier of a row within a table.
 * Supports both string (UUIDs, slugs) and numeric (positional) keys.
 */
export type RowKey = string | number

/**
 * Field values of a single row, keyed by field name. Values may be null.
 */
export type RowData = Readonly<Record<string, unknown>>

/**
 * A single row of a table: its key plus its field values.
 * This is the structure that flows through indices, filters, variators and scorers.
 */
export interface Row {
  /** Unique key of this row within its table */
  readonly key: RowKey
  /** Field values of the row */
  readonly data: RowData
}

/**
 * A pair of rows produced for comparison.
 * `left` always comes from the left table, `right` from the right table
 * (the same table in deduplication mode).
 */
export interface CandidatePair {
  readonly left: Row
  readonly right: Row
}

/**
 * Which logical table a row belongs to.
 */
export type TableSide = 'left' | 'right'

/**
 * Whether the engine matches two tables or deduplicates one.
 */
export type MatchMode = 'match' | 'deduplicate'
