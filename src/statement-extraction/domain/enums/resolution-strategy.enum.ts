/**
 * How a configured field found its source row.
 * - DIRECT: configured 1-based row index (tr_number) was in range
 * - FUZZY: normalized label matched a row's text
 * - UNRESOLVED: no strategy produced a row; the field is left out of the record
 */
export enum ResolutionStrategy {
  DIRECT = 'direct',
  FUZZY = 'fuzzy',
  UNRESOLVED = 'unresolved',
}
