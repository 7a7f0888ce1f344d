export enum ExtractionFailureReason {
  UNKNOWN_COMPANY = 'unknown_company',
  NO_TABLES = 'no_tables',
  NO_USABLE_TABLE = 'no_usable_table',
}
