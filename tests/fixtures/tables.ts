import { Table } from '../../src/core/table'

/**
 * Two people, each entered twice with a typo in the first name.
 */
export function twoPeople(): Table {
  return Table.fromRecords([
    { last: 'beech', first: 'freddie' },
    { last: 'beech', first: 'freedie' },
    { last: 'dupas', first: 'demia' },
    { last: 'dupas', first: 'demeia' },
  ])
}

/**
 * Four people, each entered twice.
 */
export function fourPeople(): Table {
  return Table.fromRecords([
    { last: 'beech', first: 'freddie' },
    { last: 'beech', first: 'freedie' },
    { last: 'dupas', first: 'demia' },
    { last: 'dupas', first: 'demeia' },
    { last: 'brown', first: 'latoya' },
    { last: 'bowen', first: 'latoya' },
    { last: 'rhea', first: 'cherri' },
    { last: 'rhea', first: 'cherrie' },
  ])
}

/**
 * Three people; the second entry of each has first and last name swapped
 * (or a typo on top of the swap).
 */
export function swappedNames(): Table {
  return Table.fromRecords([
    { last: 'blake', first: 'lauri' },
    { last: 'lauri', first: 'blake' },
    { last: 'robinson', first: 'alexis' },
    { last: 'alexis', first: 'robertson' },
    { last: 'haynes', first: 'terry' },
    { last: 'terry', first: 'hayes' },
  ])
}

/**
 * Officers with the agency they served in and their years of service.
 */
export function officers(): Table {
  return Table.fromRecords([
    { first: 'john', agency: 'slidell', start: 0, end: 10 },
    { first: 'john', agency: 'slidell', start: 10, end: 20 },
    { first: 'john', agency: 'slidell', start: 20, end: 30 },
    { first: 'john', agency: 'gretna', start: 11, end: 21 },
    { first: 'john', agency: 'gretna', start: 0, end: 7 },
    { first: 'john', agency: 'gretna', start: 10, end: 18 },
  ])
}
