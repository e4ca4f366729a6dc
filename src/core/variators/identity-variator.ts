import type { Row } from '../../types/table'
import type { Variator } from './types'

/**
 * Yields only the row itself. Used when no variator is configured.
 */
export class IdentityVariator implements Variator {
  variants(row: Row): Row[] {
    return [row]
  }
}
