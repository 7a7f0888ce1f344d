export type StatementExtractionConfig = {
  companiesPath: string; // Company catalogue JSON
  fuzzyMatching: boolean; // Label fallback when the row index misses
  preferStandalone: boolean; // Skip generic headings on consolidated pages
  scoring: {
    minTableRows: number; // Below this a table is penalised
    maxScoredRows: number; // Row-count contribution cap
  };
};
