export * from './statement-extraction/statement-extraction.module';
export * from './statement-extraction/statement-extraction.service';
export * from './statement-extraction/domain/entities/column-layout.entity';
export * from './statement-extraction/domain/entities/company-config.entity';
export * from './statement-extraction/domain/entities/extraction-record.entity';
export * from './statement-extraction/domain/entities/field-spec.entity';
export * from './statement-extraction/domain/entities/page-heading-rules.entity';
export * from './statement-extraction/domain/entities/table-candidate.entity';
export * from './statement-extraction/domain/enums/extraction-failure-reason.enum';
export * from './statement-extraction/domain/enums/extraction-method.enum';
export * from './statement-extraction/domain/enums/page-match-rule.enum';
export * from './statement-extraction/domain/enums/resolution-strategy.enum';
export * from './statement-extraction/domain/enums/table-selection-method.enum';
export * from './statement-extraction/domain/errors/statement-config.error';
export * from './statement-extraction/domain/errors/table-parse.error';
export * from './statement-extraction/domain/registry/company-registry';
export * from './statement-extraction/domain/scoring/table-scoring-rules';
export * from './statement-extraction/domain/services/field-resolver.domain.service';
export * from './statement-extraction/domain/services/page-classifier.domain.service';
export * from './statement-extraction/domain/services/period-mapper';
export * from './statement-extraction/domain/services/table-scorer.domain.service';
export * from './statement-extraction/domain/strategies/direct-row.strategy';
export * from './statement-extraction/domain/strategies/fuzzy-label.strategy';
export * from './statement-extraction/domain/strategies/row-resolution.strategy';
export * from './statement-extraction/domain/utils/amount.util';
export * from './statement-extraction/infrastructure/catalogue/company-catalogue.loader';
export * from './statement-extraction/infrastructure/table-parsing/html-table.parser';
