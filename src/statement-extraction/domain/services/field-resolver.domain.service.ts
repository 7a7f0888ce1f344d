import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ColumnLayout } from '../entities/column-layout.entity';
import { CompanyConfig } from '../entities/company-config.entity';
import {
  ExtractionItem,
  ExtractionRecord,
  FieldDiagnostic,
  createExtractionRecord,
  summarizeExtractionMethod,
} from '../entities/extraction-record.entity';
import { FieldSpec } from '../entities/field-spec.entity';
import { TableCandidate } from '../entities/table-candidate.entity';
import { ResolutionStrategy } from '../enums/resolution-strategy.enum';
import { DirectRowStrategy } from '../strategies/direct-row.strategy';
import { FuzzyLabelStrategy } from '../strategies/fuzzy-label.strategy';
import { RowResolutionStrategy } from '../strategies/row-resolution.strategy';
import { PeriodMapper } from './period-mapper';

export interface FieldResolution {
  readonly record: ExtractionRecord;
  readonly diagnostics: readonly FieldDiagnostic[];
}

export interface ResolveOptions {
  fuzzyMatching?: boolean;
  companyName?: string;
}

/**
 * Field Resolver
 *
 * Resolves every configured field of a company against the selected table:
 * finds the source row through the ordered strategies (direct row index,
 * then fuzzy label when enabled), then reads the period cells through the
 * field's column layout.
 *
 * A field no strategy can place is left out of the record and reported as
 * unresolved in the diagnostics. Nothing here throws for table content.
 */
@Injectable()
export class FieldResolverDomainService {
  private readonly logger = new Logger(FieldResolverDomainService.name);
  private readonly fuzzyMatching: boolean;
  private readonly directStrategy = new DirectRowStrategy();
  private readonly fuzzyStrategy = new FuzzyLabelStrategy();

  constructor(private readonly configService: ConfigService<AllConfigType>) {
    this.fuzzyMatching =
      this.configService.get('statementExtraction.fuzzyMatching', {
        infer: true,
      }) !== false; // Default true
  }

  resolve(
    table: TableCandidate,
    company: CompanyConfig,
    periodMapper: PeriodMapper,
    options: ResolveOptions = {},
  ): FieldResolution {
    const strategies = this.strategiesFor(
      options.fuzzyMatching ?? this.fuzzyMatching,
    );

    const items: ExtractionItem[] = [];
    const diagnostics: FieldDiagnostic[] = [];

    for (const field of company.fields) {
      const layout = periodMapper.layoutFor(company, field.columnLayout);
      const located = this.locateRow(table, field, strategies);

      if (located === null) {
        this.logger.warn(
          `[FIELD-RESOLVER] Could not find row for key: ${field.key} (row index: ${field.rowIndex ?? 'none'}, labels: ${field.labels.length})`,
        );
        diagnostics.push({
          key: field.key,
          strategy: ResolutionStrategy.UNRESOLVED,
          rowNumber: null,
          columnLayout: layout.name,
        });
        continue;
      }

      if (located.strategy === ResolutionStrategy.FUZZY) {
        this.logger.debug(
          `[FIELD-RESOLVER] Fuzzy matched '${field.key}' at row ${located.rowIndex + 1}`,
        );
      }

      items.push(
        this.extractItem(table.rows[located.rowIndex], field, layout),
      );
      diagnostics.push({
        key: field.key,
        strategy: located.strategy,
        rowNumber: located.rowIndex + 1,
        columnLayout: layout.name,
      });
    }

    const record = createExtractionRecord({
      companyName: options.companyName ?? company.displayName,
      items,
      extractionMethod: summarizeExtractionMethod(
        diagnostics.map((d) => d.strategy),
      ),
    });

    this.logger.log(
      `[FIELD-RESOLVER] Extracted ${items.length}/${company.fields.length} items for ${company.key} (method: ${record.extractionMethod})`,
    );

    return { record, diagnostics: Object.freeze(diagnostics) };
  }

  private strategiesFor(fuzzyMatching: boolean): RowResolutionStrategy[] {
    return fuzzyMatching
      ? [this.directStrategy, this.fuzzyStrategy]
      : [this.directStrategy];
  }

  private locateRow(
    table: TableCandidate,
    field: FieldSpec,
    strategies: readonly RowResolutionStrategy[],
  ): { rowIndex: number; strategy: RowResolutionStrategy['name'] } | null {
    for (const strategy of strategies) {
      const rowIndex = strategy.locate(table, field);
      if (rowIndex !== null) {
        return { rowIndex, strategy: strategy.name };
      }
    }
    return null;
  }

  /**
   * Read the period cells of a resolved row. Periods whose column lies past
   * the end of the row come back as '' (older statements lack them).
   */
  private extractItem(
    cells: ReadonlyArray<string>,
    field: FieldSpec,
    layout: ColumnLayout,
  ): ExtractionItem {
    const cellAt = (column: number): string =>
      column <= cells.length ? cells[column - 1].trim() : '';

    const values: Record<string, string> = {};
    for (const { period, column } of layout.periods) {
      values[period] = cellAt(column);
    }

    const particular = cellAt(layout.labelColumn) || field.labels[0] || field.key;

    return { particular, key: field.key, values };
  }
}
