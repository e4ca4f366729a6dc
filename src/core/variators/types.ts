import type { Row } from '../../types/table'

/**
 * Expands a row into the variants it is scored as. The sequence must include
 * the row itself and be restartable: every call yields a fresh iterable.
 */
export interface Variator {
  variants(row: Row): Iterable<Row>
}
