export enum TableSelectionMethod {
  SINGLE_TABLE = 'single_table', // Only one candidate, no scoring
  HEURISTIC = 'heuristic', // Best score across candidates
}
