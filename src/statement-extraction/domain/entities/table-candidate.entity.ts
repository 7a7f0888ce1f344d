/**
 * Table Candidate
 *
 * One structured table produced by the upstream OCR / table-structure
 * collaborator for a page or section of the filing. Rows hold the ordered,
 * trimmed cell texts; `text` is the full rendering used for keyword and
 * numeric scanning.
 *
 * Candidates are created per request and never mutated.
 */
export interface TableCandidate {
  readonly rows: ReadonlyArray<ReadonlyArray<string>>;
  readonly text: string;
}

export const createTableCandidate = (
  rows: ReadonlyArray<ReadonlyArray<string>>,
  text?: string,
): TableCandidate => {
  const frozenRows = Object.freeze(
    rows.map((cells) => Object.freeze(cells.map((cell) => cell.trim()))),
  );

  return Object.freeze({
    rows: frozenRows,
    text: text ?? frozenRows.map((cells) => cells.join(' ')).join('\n'),
  });
};

/**
 * Flatten a row the way an HTML text extractor would with a space separator:
 * blank cells are dropped, the rest joined by single spaces.
 */
export const rowText = (cells: ReadonlyArray<string>): string =>
  cells
    .map((cell) => cell.trim())
    .filter((cell) => cell.length > 0)
    .join(' ');
