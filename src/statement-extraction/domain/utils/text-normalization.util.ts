/**
 * Lower-case and strip everything that is neither a word character nor
 * whitespace. Applied to both row text and candidate labels before fuzzy
 * comparison, so "Sale of Goods / Income" and "sale of goods  income" agree
 * up to spacing.
 */
export const normalizeForMatch = (text: string): string =>
  text.toLowerCase().replace(/[^\p{L}\p{N}_\s]/gu, '');

/**
 * Lower-case page text and collapse whitespace runs (line breaks, tabs,
 * repeated spaces from OCR) into single spaces.
 */
export const normalizePageText = (text: string | null | undefined): string =>
  (text ?? '').toLowerCase().replace(/\s+/g, ' ').trim();
