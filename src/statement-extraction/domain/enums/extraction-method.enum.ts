/**
 * Provenance tag summarizing the strategies behind a record's items.
 * NONE is used when no field could be resolved at all.
 */
export enum ExtractionMethod {
  DIRECT = 'direct',
  FUZZY = 'fuzzy',
  MIXED = 'mixed',
  NONE = 'none',
}
