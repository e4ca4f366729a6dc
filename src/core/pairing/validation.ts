import { DuplicateRowKeyError, FieldSetMismatchError } from '../../utils/errors'
import type { Table } from '../table'

/**
 * Throws if any row key appears twice in the table.
 */
export function assertUniqueKeys(table: Table): void {
  const duplicates = table.duplicateKeys()
  if (duplicates.length > 0) {
    throw new DuplicateRowKeyError(table.name, duplicates)
  }
}

/**
 * Throws unless both tables have the same set of fields (order is ignored).
 */
export function assertSameFields(left: Table, right: Table): void {
  const leftFields = new Set(left.fields)
  const rightFields = new Set(right.fields)
  const onlyLeft = left.fields.filter((field) => !rightFields.has(field))
  const onlyRight = right.fields.filter((field) => !leftFields.has(field))
  if (onlyLeft.length > 0 || onlyRight.length > 0) {
    throw new FieldSetMismatchError(onlyLeft, onlyRight)
  }
}
