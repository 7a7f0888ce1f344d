import { FieldSpec } from '../entities/field-spec.entity';
import { TableCandidate, rowText } from '../entities/table-candidate.entity';
import { ResolutionStrategy } from '../enums/resolution-strategy.enum';
import { normalizeForMatch } from '../utils/text-normalization.util';
import { RowResolutionStrategy } from './row-resolution.strategy';

/**
 * Length of the label prefix a row may start with. Catches captions that
 * OCR truncated or garbled towards the end.
 */
export const LABEL_PREFIX_LENGTH = 15;

/**
 * Fallback that scans rows top to bottom and, for each row, tries the
 * field's labels in configured order. A label matches when its normalized
 * form is contained in the normalized row text, or when the row text starts
 * with the label's first LABEL_PREFIX_LENGTH characters.
 */
export class FuzzyLabelStrategy implements RowResolutionStrategy {
  readonly name = ResolutionStrategy.FUZZY;

  locate(table: TableCandidate, field: FieldSpec): number | null {
    const labels = field.labels
      .map((label) => normalizeForMatch(label))
      .filter((label) => label.trim().length > 0);

    if (labels.length === 0) {
      return null;
    }

    for (const [index, cells] of table.rows.entries()) {
      const text = normalizeForMatch(rowText(cells));
      if (text.length === 0) {
        continue;
      }

      if (labels.some((label) => FuzzyLabelStrategy.matches(text, label))) {
        return index;
      }
    }

    return null;
  }

  static matches(normalizedRow: string, normalizedLabel: string): boolean {
    return (
      normalizedRow.includes(normalizedLabel) ||
      normalizedRow.startsWith(normalizedLabel.slice(0, LABEL_PREFIX_LENGTH))
    );
  }
}
