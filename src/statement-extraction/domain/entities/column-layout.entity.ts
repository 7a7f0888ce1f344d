/**
 * Reserved layout entry naming the ordinal of the caption column.
 * Period labels may not use it.
 */
export const LABEL_COLUMN_KEY = 'label';

export interface PeriodColumn {
  readonly period: string;
  readonly column: number; // 1-based
}

export interface ColumnLayout {
  readonly name: string;
  readonly labelColumn: number; // 1-based
  readonly periods: readonly PeriodColumn[];
}
