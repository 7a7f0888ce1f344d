import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { TableCandidate } from '../entities/table-candidate.entity';
import { TableSelectionMethod } from '../enums/table-selection-method.enum';
import {
  DEFAULT_SCORING_POLICY_OPTIONS,
  ScoringRule,
  createDefaultScoringRules,
  isStatementSized,
} from '../scoring/table-scoring-rules';

/**
 * A candidate, or a loader producing one. Loaders let the caller defer
 * reading converted tables until they are scored; one that throws marks
 * its candidate as missing.
 */
export type TableSource = TableCandidate | (() => TableCandidate);

export interface TableScore {
  readonly total: number;
  readonly breakdown: Readonly<Record<string, number>>;
}

export type TableSelection =
  | {
      found: true;
      index: number;
      score: number | null; // null when scoring was skipped
      method: TableSelectionMethod;
      skipped: readonly number[];
    }
  | { found: false; skipped: readonly number[] };

@Injectable()
export class TableScorerDomainService {
  private readonly logger = new Logger(TableScorerDomainService.name);
  private readonly rules: readonly ScoringRule[];
  private readonly isEligible: (table: TableCandidate) => boolean;

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    const minTableRows =
      this.configService.get('statementExtraction.scoring.minTableRows', {
        infer: true,
      }) ?? DEFAULT_SCORING_POLICY_OPTIONS.minTableRows;
    const maxScoredRows =
      this.configService.get('statementExtraction.scoring.maxScoredRows', {
        infer: true,
      }) ?? DEFAULT_SCORING_POLICY_OPTIONS.maxScoredRows;

    this.rules = createDefaultScoringRules({ minTableRows, maxScoredRows });
    this.isEligible = isStatementSized(minTableRows);
  }

  scoreTable(
    table: TableCandidate,
    rules: readonly ScoringRule[] = this.rules,
  ): TableScore {
    const breakdown: Record<string, number> = {};
    let total = 0;

    for (const rule of rules) {
      const points = rule.score(table);
      breakdown[rule.name] = points;
      total += points;
    }

    return { total, breakdown };
  }

  /**
   * Pick the candidate most likely to be the target statement.
   * Highest score wins; on a tie the earlier candidate is kept. Statement-
   * sized candidates (enough rows, at least one financial keyword) are
   * preferred over all others regardless of score.
   */
  selectBest(
    tables: readonly TableSource[],
    rules: readonly ScoringRule[] = this.rules,
  ): TableSelection {
    if (tables.length === 0) {
      return { found: false, skipped: [] };
    }

    if (tables.length === 1) {
      return {
        found: true,
        index: 0,
        score: null,
        method: TableSelectionMethod.SINGLE_TABLE,
        skipped: [],
      };
    }

    const skipped: number[] = [];
    let best: { index: number; score: number } | null = null;
    let bestEligible: { index: number; score: number } | null = null;

    for (const [index, source] of tables.entries()) {
      let table: TableCandidate;
      try {
        table = typeof source === 'function' ? source() : source;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `[TABLE-SCORER] Table ${index + 1} skipped: ${message.substring(0, 200)}`,
        );
        skipped.push(index);
        continue;
      }

      const { total } = this.scoreTable(table, rules);
      this.logger.debug(
        `[TABLE-SCORER] Table ${index + 1} score: ${total} (rows: ${table.rows.length})`,
      );

      if (best === null || total > best.score) {
        best = { index, score: total };
      }
      if (
        this.isEligible(table) &&
        (bestEligible === null || total > bestEligible.score)
      ) {
        bestEligible = { index, score: total };
      }
    }

    const winner = bestEligible ?? best;
    if (winner === null) {
      this.logger.warn(
        `[TABLE-SCORER] None of ${tables.length} table(s) could be read`,
      );
      return { found: false, skipped };
    }

    this.logger.log(
      `[TABLE-SCORER] Selected table ${winner.index + 1} with score ${winner.score}`,
    );
    return {
      found: true,
      index: winner.index,
      score: winner.score,
      method: TableSelectionMethod.HEURISTIC,
      skipped,
    };
  }
}
