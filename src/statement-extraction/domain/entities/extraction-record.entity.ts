import { ExtractionMethod } from '../enums/extraction-method.enum';
import { ResolutionStrategy } from '../enums/resolution-strategy.enum';

/**
 * Period label → raw cell text, in layout order.
 * An empty string means the period has no column in this row.
 */
export type PeriodValues = Readonly<Record<string, string>>;

export interface ExtractionItem {
  readonly particular: string;
  readonly key: string;
  readonly values: PeriodValues;
}

/**
 * Normalized output of one resolution pass. Renderers and storage treat it
 * as a value object; every level is frozen on creation.
 */
export interface ExtractionRecord {
  readonly companyName: string;
  readonly items: readonly ExtractionItem[];
  readonly extractionMethod: ExtractionMethod;
}

export interface FieldDiagnostic {
  readonly key: string;
  readonly strategy: ResolutionStrategy;
  readonly rowNumber: number | null; // 1-based, null when unresolved
  readonly columnLayout: string;
}

export interface DiagnosticsSummary {
  readonly total: number;
  readonly direct: number;
  readonly fuzzy: number;
  readonly unresolved: number;
}

export interface RecordRow {
  readonly key: string;
  readonly particular: string;
  readonly period: string;
  readonly value: string;
}

export const createExtractionRecord = (params: {
  companyName: string;
  items: readonly ExtractionItem[];
  extractionMethod: ExtractionMethod;
}): ExtractionRecord =>
  Object.freeze({
    companyName: params.companyName,
    items: Object.freeze(
      params.items.map((item) =>
        Object.freeze({
          particular: item.particular,
          key: item.key,
          values: Object.freeze({ ...item.values }),
        }),
      ),
    ),
    extractionMethod: params.extractionMethod,
  });

/**
 * direct / fuzzy when every resolved field agrees, mixed otherwise.
 * Unresolved fields do not count towards the summary.
 */
export const summarizeExtractionMethod = (
  strategies: readonly ResolutionStrategy[],
): ExtractionMethod => {
  const used = new Set(
    strategies.filter((s) => s !== ResolutionStrategy.UNRESOLVED),
  );

  if (used.size === 0) {
    return ExtractionMethod.NONE;
  }
  if (used.size > 1) {
    return ExtractionMethod.MIXED;
  }
  return used.has(ResolutionStrategy.DIRECT)
    ? ExtractionMethod.DIRECT
    : ExtractionMethod.FUZZY;
};

export const summarizeDiagnostics = (
  diagnostics: readonly FieldDiagnostic[],
): DiagnosticsSummary => {
  const count = (strategy: ResolutionStrategy) =>
    diagnostics.filter((d) => d.strategy === strategy).length;

  return {
    total: diagnostics.length,
    direct: count(ResolutionStrategy.DIRECT),
    fuzzy: count(ResolutionStrategy.FUZZY),
    unresolved: count(ResolutionStrategy.UNRESOLVED),
  };
};

/**
 * Flatten a record item-major, then period in layout order.
 * CSV-style consumers write one line per entry.
 */
export const recordToRows = (record: ExtractionRecord): RecordRow[] =>
  record.items.flatMap((item) =>
    Object.entries(item.values).map(([period, value]) => ({
      key: item.key,
      particular: item.particular,
      period,
      value,
    })),
  );

/**
 * Index item values by canonical key. When two items collapse onto the same
 * canonical key the later one in record order wins.
 */
export const indexValuesByKey = (
  record: ExtractionRecord,
  canonicalKey: (key: string) => string = (key) => key,
): ReadonlyMap<string, PeriodValues> =>
  new Map(
    record.items.map((item): [string, PeriodValues] => [
      canonicalKey(item.key),
      item.values,
    ]),
  );
