import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import statementExtractionConfig from './config/statement-extraction.config';
import { FieldResolverDomainService } from './domain/services/field-resolver.domain.service';
import { PageClassifierDomainService } from './domain/services/page-classifier.domain.service';
import { TableScorerDomainService } from './domain/services/table-scorer.domain.service';
import { CompanyCatalogueLoader } from './infrastructure/catalogue/company-catalogue.loader';
import { HtmlTableParser } from './infrastructure/table-parsing/html-table.parser';
import {
  COMPANY_REGISTRY,
  StatementExtractionService,
} from './statement-extraction.service';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(statementExtractionConfig),
  ],
  providers: [
    // Application layer
    StatementExtractionService,

    // Domain layer
    PageClassifierDomainService,
    TableScorerDomainService,
    FieldResolverDomainService,

    // Company catalogue, loaded once; a broken catalogue stops startup
    CompanyCatalogueLoader,
    {
      provide: COMPANY_REGISTRY,
      inject: [CompanyCatalogueLoader, ConfigService],
      useFactory: (
        loader: CompanyCatalogueLoader,
        configService: ConfigService<AllConfigType>,
      ) =>
        loader.loadFromFile(
          configService.getOrThrow('statementExtraction.companiesPath', {
            infer: true,
          }),
        ),
    },

    // Infrastructure adapters
    HtmlTableParser,
  ],
  exports: [StatementExtractionService, HtmlTableParser, COMPANY_REGISTRY],
})
export class StatementExtractionModule {}
