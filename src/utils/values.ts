import type { Row, RowKey } from '../types/table'

/**
 * Whether a field value counts as null: `null`, `undefined` or `NaN`.
 */
export function isMissing(value: unknown): boolean {
  return (
    value === null ||
    value === undefined ||
    (typeof value === 'number' && Number.isNaN(value))
  )
}

/**
 * Whether a row carries the given field at all (a null value still counts).
 */
export function hasField(row: Row, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(row.data, field)
}

/**
 * Equality of two field values. Dates compare by timestamp, everything else strictly.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }
  return a === b
}

/**
 * Total order over row keys: numbers ascending, then strings in code unit order.
 */
export function compareRowKeys(a: RowKey, b: RowKey): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b
  }
  if (typeof a === 'number') return -1
  if (typeof b === 'number') return 1
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Converts a range bound (number, date or date string) to a number for ordering.
 * Returns null when the value cannot be ordered.
 */
export function toOrderable(value: unknown): number | null {
  if (isMissing(value)) return null
  if (typeof value === 'number') return value
  if (value instanceof Date) {
    const time = value.getTime()
    return isNaN(time) ? null : time
  }
  if (typeof value === 'string') {
    const time = new Date(value).getTime()
    return isNaN(time) ? null : time
  }
  return null
}
