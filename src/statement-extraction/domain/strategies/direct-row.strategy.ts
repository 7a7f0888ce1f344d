import { FieldSpec } from '../entities/field-spec.entity';
import { TableCandidate } from '../entities/table-candidate.entity';
import { ResolutionStrategy } from '../enums/resolution-strategy.enum';
import { RowResolutionStrategy } from './row-resolution.strategy';

/**
 * Uses the configured 1-based row index when it falls inside the table.
 */
export class DirectRowStrategy implements RowResolutionStrategy {
  readonly name = ResolutionStrategy.DIRECT;

  locate(table: TableCandidate, field: FieldSpec): number | null {
    const { rowIndex } = field;
    if (rowIndex === undefined || !Number.isInteger(rowIndex)) {
      return null;
    }
    if (rowIndex < 1 || rowIndex > table.rows.length) {
      return null;
    }
    return rowIndex - 1;
  }
}
