import { AppConfig } from './app-config.type';
import { StatementExtractionConfig } from '../statement-extraction/config/statement-extraction-config.type';

export type AllConfigType = {
  app: AppConfig;
  statementExtraction: StatementExtractionConfig;
};
