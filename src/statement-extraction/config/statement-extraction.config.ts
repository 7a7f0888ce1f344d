import * as path from 'path';
import { registerAs } from '@nestjs/config';
import { IsBoolean, IsInt, IsString, Min, validateSync } from 'class-validator';
import { plainToClass } from 'class-transformer';
import { StatementExtractionConfig } from './statement-extraction-config.type';

// Resolves to <project root>/config from both src/ and dist/
export const DEFAULT_COMPANIES_PATH = path.join(
  __dirname,
  '..',
  '..',
  '..',
  'config',
  'companies.json',
);

class EnvironmentVariablesValidator {
  @IsString()
  STATEMENT_EXTRACTION_COMPANIES_PATH: string = DEFAULT_COMPANIES_PATH;

  @IsBoolean()
  STATEMENT_EXTRACTION_FUZZY_MATCHING: boolean = true;

  @IsBoolean()
  STATEMENT_EXTRACTION_PREFER_STANDALONE: boolean = true;

  @IsInt()
  @Min(1)
  STATEMENT_EXTRACTION_MIN_TABLE_ROWS: number = 10;

  @IsInt()
  @Min(1)
  STATEMENT_EXTRACTION_MAX_SCORED_ROWS: number = 50;
}

export default registerAs<StatementExtractionConfig>(
  'statementExtraction',
  () => {
    const validatedConfig = plainToClass(
      EnvironmentVariablesValidator,
      {
        STATEMENT_EXTRACTION_COMPANIES_PATH:
          process.env.STATEMENT_EXTRACTION_COMPANIES_PATH ||
          DEFAULT_COMPANIES_PATH,
        STATEMENT_EXTRACTION_FUZZY_MATCHING:
          process.env.STATEMENT_EXTRACTION_FUZZY_MATCHING !== 'false',
        STATEMENT_EXTRACTION_PREFER_STANDALONE:
          process.env.STATEMENT_EXTRACTION_PREFER_STANDALONE !== 'false',
        STATEMENT_EXTRACTION_MIN_TABLE_ROWS: process.env
          .STATEMENT_EXTRACTION_MIN_TABLE_ROWS
          ? parseInt(process.env.STATEMENT_EXTRACTION_MIN_TABLE_ROWS, 10)
          : 10,
        STATEMENT_EXTRACTION_MAX_SCORED_ROWS: process.env
          .STATEMENT_EXTRACTION_MAX_SCORED_ROWS
          ? parseInt(process.env.STATEMENT_EXTRACTION_MAX_SCORED_ROWS, 10)
          : 50,
      },
      { enableImplicitConversion: true },
    );

    const errors = validateSync(validatedConfig, {
      skipMissingProperties: false,
    });

    if (errors.length > 0) {
      throw new Error(
        `Statement Extraction config validation error: ${errors.toString()}`,
      );
    }

    return {
      companiesPath: path.resolve(
        validatedConfig.STATEMENT_EXTRACTION_COMPANIES_PATH,
      ),
      fuzzyMatching: validatedConfig.STATEMENT_EXTRACTION_FUZZY_MATCHING,
      preferStandalone: validatedConfig.STATEMENT_EXTRACTION_PREFER_STANDALONE,
      scoring: {
        minTableRows: validatedConfig.STATEMENT_EXTRACTION_MIN_TABLE_ROWS,
        maxScoredRows: validatedConfig.STATEMENT_EXTRACTION_MAX_SCORED_ROWS,
      },
    };
  },
);
