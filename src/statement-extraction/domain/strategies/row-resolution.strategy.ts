import { FieldSpec } from '../entities/field-spec.entity';
import { TableCandidate } from '../entities/table-candidate.entity';
import { ResolutionStrategy } from '../enums/resolution-strategy.enum';

/**
 * A way of finding the source row of a configured field.
 *
 * `locate` returns the 0-based row position, or null when this strategy
 * cannot place the field. Strategies are tried in order and the first hit
 * wins, so adding one never touches the others.
 */
export interface RowResolutionStrategy {
  readonly name: Exclude<ResolutionStrategy, ResolutionStrategy.UNRESOLVED>;
  locate(table: TableCandidate, field: FieldSpec): number | null;
}
