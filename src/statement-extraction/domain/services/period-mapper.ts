import {
  ColumnLayout,
  LABEL_COLUMN_KEY,
  PeriodColumn,
} from '../entities/column-layout.entity';
import { CompanyConfig } from '../entities/company-config.entity';
import { StatementConfigError } from '../errors/statement-config.error';

const isOrdinal = (value: number): boolean =>
  Number.isInteger(value) && value > 0;

// Object keys like "2025" are enumerated before all others, which would
// reorder record values away from the layout's period order.
const INTEGER_LIKE = /^\d+$/;

/**
 * Problems that make a layout unusable. An empty list means the layout is
 * valid: a positive label ordinal, at least one period, positive period
 * ordinals, unique period labels, none of them the reserved label key and
 * none of them a plain integer.
 */
export const layoutIssues = (layout: ColumnLayout): string[] => {
  const issues: string[] = [];
  const where = `column layout "${layout.name}"`;

  if (!isOrdinal(layout.labelColumn)) {
    issues.push(`${where}: label column must be a positive integer`);
  }
  if (layout.periods.length === 0) {
    issues.push(`${where}: at least one period column is required`);
  }

  const seen = new Set<string>();
  for (const { period, column } of layout.periods) {
    if (period === LABEL_COLUMN_KEY) {
      issues.push(`${where}: "${LABEL_COLUMN_KEY}" is reserved for the label column`);
    }
    if (seen.has(period)) {
      issues.push(`${where}: period "${period}" is defined twice`);
    }
    seen.add(period);
    if (INTEGER_LIKE.test(period)) {
      issues.push(`${where}: period "${period}" must not be a plain integer`);
    }
    if (!isOrdinal(column)) {
      issues.push(`${where}: period "${period}" must map to a positive integer column`);
    }
  }

  return issues;
};

export const freezeLayout = (layout: ColumnLayout): ColumnLayout =>
  Object.freeze({
    name: layout.name,
    labelColumn: layout.labelColumn,
    periods: Object.freeze(
      layout.periods.map(
        ({ period, column }): PeriodColumn => Object.freeze({ period, column }),
      ),
    ),
  });

/**
 * Column layout lookup. A field's override layout wins over the company
 * default. Layouts are validated when the registry is built, so a miss here
 * means the registry and the company config came from different catalogues.
 */
export class PeriodMapper {
  private readonly layouts: ReadonlyMap<string, ColumnLayout>;

  constructor(layouts: Iterable<ColumnLayout>) {
    const byName = new Map<string, ColumnLayout>();
    for (const layout of layouts) {
      byName.set(layout.name, layout);
    }
    this.layouts = byName;
  }

  has(name: string): boolean {
    return this.layouts.has(name);
  }

  layoutNames(): string[] {
    return [...this.layouts.keys()];
  }

  layoutFor(company: CompanyConfig, override?: string): ColumnLayout {
    const name = override ?? company.defaultColumnLayout;
    const layout = this.layouts.get(name);

    if (!layout) {
      throw new StatementConfigError({
        message: `Column layout "${name}" is not defined`,
        companyKey: company.key,
      });
    }

    return layout;
  }
}
