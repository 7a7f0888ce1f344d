import { TableCandidate } from '../entities/table-candidate.entity';

/**
 * One named contribution to a table's score. Rules are independent of each
 * other and of candidate order, so the policy can be tuned rule by rule.
 */
export interface ScoringRule {
  readonly name: string;
  score(table: TableCandidate): number;
}

export interface ScoringPolicyOptions {
  maxScoredRows: number;
  minTableRows: number;
}

export const DEFAULT_SCORING_POLICY_OPTIONS: ScoringPolicyOptions = {
  maxScoredRows: 50,
  minTableRows: 10,
};

export const FINANCIAL_KEYWORDS: readonly string[] = [
  'revenue',
  'income',
  'expense',
  'profit',
  'loss',
  'tax',
  'total',
  'net',
  'eps',
  'earnings per share',
  'comprehensive',
  'depreciation',
  'amortisation',
  'finance cost',
];

const NUMERIC_TOKEN = /\d+[,.]?\d*/;

export const rowCountRule = (maxScoredRows: number): ScoringRule => ({
  name: 'row-count',
  score: (table) => Math.min(table.rows.length, maxScoredRows) * 2,
});

export const financialKeywordRule = (
  keywords: readonly string[] = FINANCIAL_KEYWORDS,
): ScoringRule => ({
  name: 'financial-keywords',
  score: (table) => {
    const text = table.text.toLowerCase();
    return keywords.filter((keyword) => text.includes(keyword)).length * 10;
  },
});

export const numericContentRule: ScoringRule = {
  name: 'numeric-content',
  score: (table) => (NUMERIC_TOKEN.test(table.text) ? 20 : 0),
};

export const smallTablePenaltyRule = (minTableRows: number): ScoringRule => ({
  name: 'small-table-penalty',
  score: (table) => (table.rows.length < minTableRows ? -30 : 0),
});

/**
 * A table big enough to be a full statement and speaking its vocabulary.
 * When any candidate qualifies, only qualifying candidates compete, so a
 * short keyword-dense fragment never beats a real statement.
 */
export const isStatementSized =
  (minTableRows: number, keywords: readonly string[] = FINANCIAL_KEYWORDS) =>
  (table: TableCandidate): boolean => {
    if (table.rows.length < minTableRows) {
      return false;
    }
    const text = table.text.toLowerCase();
    return keywords.some((keyword) => text.includes(keyword));
  };

export const createDefaultScoringRules = (
  options: ScoringPolicyOptions = DEFAULT_SCORING_POLICY_OPTIONS,
): readonly ScoringRule[] =>
  Object.freeze([
    rowCountRule(options.maxScoredRows),
    financialKeywordRule(),
    numericContentRule,
    smallTablePenaltyRule(options.minTableRows),
  ]);
