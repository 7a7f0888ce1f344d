import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { StatementConfigError } from '../../domain/errors/statement-config.error';
import {
  CatalogueDefinition,
  CompanyRegistry,
} from '../../domain/registry/company-registry';
import { CompanyCatalogueSchema } from './company-catalogue.schema';

function flattenErrors(errors: ValidationError[], parent = ''): string[] {
  return errors.flatMap((error) => {
    const path = parent ? `${parent}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map(
      (constraint) => `${path}: ${constraint}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], path)];
  });
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Company Catalogue Loader
 *
 * Reads the company catalogue once at startup, validates its schema and
 * builds the immutable CompanyRegistry. Any problem is fatal: the loader
 * throws StatementConfigError and the application does not start.
 */
@Injectable()
export class CompanyCatalogueLoader {
  private readonly logger = new Logger(CompanyCatalogueLoader.name);

  loadFromFile(filePath: string): CompanyRegistry {
    let raw: string;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StatementConfigError({
        message: `Company catalogue could not be read: ${reason}`,
        source: filePath,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new StatementConfigError({
        message: `Company catalogue is not valid JSON: ${reason}`,
        source: filePath,
      });
    }

    return this.load(parsed, filePath);
  }

  load(plain: unknown, source = 'inline'): CompanyRegistry {
    if (!isPlainObject(plain)) {
      throw StatementConfigError.fromIssues(
        ['catalogue must be a JSON object'],
        source,
      );
    }

    const catalogue = plainToClass(CompanyCatalogueSchema, plain);
    const issues = flattenErrors(validateSync(catalogue));

    for (const [key, value] of Object.entries(catalogue.key_aliases ?? {})) {
      if (typeof value !== 'string') {
        issues.push(`key_aliases.${key}: alias target must be a string`);
      }
    }

    if (issues.length > 0) {
      throw StatementConfigError.fromIssues(issues, source);
    }

    const registry = CompanyRegistry.fromCatalogue(
      this.toDefinition(catalogue),
      source,
    );

    this.logger.log(
      `[CATALOGUE] Loaded ${registry.supportedCompanies().length} companies and ${registry.periodMapper.layoutNames().length} column layouts from ${source}`,
    );

    return registry;
  }

  private toDefinition(catalogue: CompanyCatalogueSchema): CatalogueDefinition {
    return {
      columnLayouts: catalogue.column_layouts.map((layout) => ({
        name: layout.name,
        labelColumn: layout.label,
        periods: layout.periods.map(({ period, column }) => ({
          period,
          column,
        })),
      })),
      companies: catalogue.companies.map((company) => ({
        key: company.key,
        displayName: company.display_name,
        aliases: company.aliases ?? [],
        columnLayout: company.column_layout,
        fields: company.financial_data.map((field) => ({
          key: field.key,
          labels: field.labels ?? [],
          // tr_number 0 is the catalogue's "no direct row" value
          rowIndex: field.tr_number === 0 ? undefined : field.tr_number,
          columnLayout: field.column_layout,
        })),
      })),
      keyAliases: { ...(catalogue.key_aliases ?? {}) },
      pageHeadings: {
        standalone: catalogue.page_headings.standalone,
        generic: catalogue.page_headings.generic,
        consolidatedMarker: catalogue.page_headings.consolidated_marker,
      },
    };
  }
}
