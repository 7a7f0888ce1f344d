import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DiagnosticsSummary,
  ExtractionRecord,
  FieldDiagnostic,
  summarizeDiagnostics,
} from './domain/entities/extraction-record.entity';
import { TableCandidate } from './domain/entities/table-candidate.entity';
import { ExtractionFailureReason } from './domain/enums/extraction-failure-reason.enum';
import { TableSelectionMethod } from './domain/enums/table-selection-method.enum';
import { CompanyRegistry } from './domain/registry/company-registry';
import { FieldResolverDomainService } from './domain/services/field-resolver.domain.service';
import {
  PAGE_NOT_FOUND,
  PageClassification,
  PageClassifierDomainService,
} from './domain/services/page-classifier.domain.service';
import {
  TableScorerDomainService,
  TableSource,
} from './domain/services/table-scorer.domain.service';

export const COMPANY_REGISTRY = 'CompanyRegistry';

export interface ExtractionRequest {
  companyName: string;
  tables: readonly TableSource[];
  pages?: ReadonlyArray<string | null | undefined>;
  fuzzyMatching?: boolean;
}

export interface TableInfo {
  readonly totalTables: number;
  readonly selectedTable: number; // 1-based
  readonly selectionMethod: TableSelectionMethod;
  readonly score: number | null;
  readonly skippedTables: readonly number[]; // 1-based
}

export interface ExtractionSuccess {
  readonly success: true;
  readonly message: string;
  readonly record: ExtractionRecord;
  readonly diagnostics: readonly FieldDiagnostic[];
  readonly summary: DiagnosticsSummary;
  readonly tableInfo: TableInfo;
  readonly targetPage: PageClassification;
}

export interface ExtractionFailure {
  readonly success: false;
  readonly reason: ExtractionFailureReason;
  readonly message: string;
}

export type ExtractionOutcome = ExtractionSuccess | ExtractionFailure;

/**
 * Statement Extraction Service
 *
 * Entry point for one converted filing: page triage, table selection and
 * field resolution against the company's configuration. Input problems
 * (unknown company, no tables) come back as ExtractionFailure results;
 * partial resolutions are successes with unresolved fields in the
 * diagnostics.
 */
@Injectable()
export class StatementExtractionService {
  private readonly logger = new Logger(StatementExtractionService.name);

  constructor(
    @Inject(COMPANY_REGISTRY)
    private readonly registry: CompanyRegistry,
    private readonly pageClassifier: PageClassifierDomainService,
    private readonly tableScorer: TableScorerDomainService,
    private readonly fieldResolver: FieldResolverDomainService,
  ) {}

  supportedCompanies(): string[] {
    return this.registry.supportedCompanies();
  }

  /**
   * Page to hand to the table-structure collaborator, or not-found when the
   * whole document should be converted instead.
   */
  locateStatementPage(
    pages: ReadonlyArray<string | null | undefined>,
  ): PageClassification {
    return this.pageClassifier.classify(pages, this.registry.headingRules);
  }

  extract(request: ExtractionRequest): ExtractionOutcome {
    const company = this.registry.resolveCompany(request.companyName);
    if (!company) {
      this.logger.error(`Unknown company name: ${request.companyName}`);
      return this.failure(
        ExtractionFailureReason.UNKNOWN_COMPANY,
        `Unknown company: ${request.companyName}. Supported: ${this.supportedCompanies().join(', ')}`,
      );
    }

    const targetPage = request.pages
      ? this.locateStatementPage(request.pages)
      : PAGE_NOT_FOUND;

    if (request.tables.length === 0) {
      return this.failure(
        ExtractionFailureReason.NO_TABLES,
        'No tables were extracted from the document',
      );
    }

    const tables = request.tables.map((source) => this.memoize(source));
    const selection = this.tableScorer.selectBest(tables);

    let table: TableCandidate | null = null;
    if (selection.found) {
      try {
        table = tables[selection.index]();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Selected table ${selection.index + 1} could not be read: ${message.substring(0, 200)}`,
        );
      }
    }

    if (!selection.found || table === null) {
      return this.failure(
        ExtractionFailureReason.NO_USABLE_TABLE,
        `None of the ${request.tables.length} extracted table(s) could be read`,
      );
    }

    const { record, diagnostics } = this.fieldResolver.resolve(
      table,
      company,
      this.registry.periodMapper,
      { fuzzyMatching: request.fuzzyMatching },
    );
    const summary = summarizeDiagnostics(diagnostics);

    const tableInfo: TableInfo = {
      totalTables: request.tables.length,
      selectedTable: selection.index + 1,
      selectionMethod: selection.method,
      score: selection.score,
      skippedTables: selection.skipped.map((index) => index + 1),
    };

    return {
      success: true,
      message:
        `Successfully processed document. Found ${tableInfo.totalTables} table(s), selected table ${tableInfo.selectedTable}. ` +
        `Resolved ${summary.direct + summary.fuzzy}/${summary.total} field(s): ${summary.direct} direct, ${summary.fuzzy} fuzzy, ${summary.unresolved} unresolved.`,
      record,
      diagnostics,
      summary,
      tableInfo,
      targetPage,
    };
  }

  private memoize(source: TableSource): () => TableCandidate {
    if (typeof source !== 'function') {
      const candidate = source;
      return () => candidate;
    }

    const load = source;
    let loaded: TableCandidate | null = null;
    return () => {
      if (loaded === null) {
        loaded = load();
      }
      return loaded;
    };
  }

  private failure(
    reason: ExtractionFailureReason,
    message: string,
  ): ExtractionFailure {
    return { success: false, reason, message };
  }
}
