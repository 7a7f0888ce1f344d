import { ColumnLayout } from '../entities/column-layout.entity';
import { CompanyConfig } from '../entities/company-config.entity';
import { FieldSpec } from '../entities/field-spec.entity';
import { PageHeadingRules } from '../entities/page-heading-rules.entity';
import { StatementConfigError } from '../errors/statement-config.error';
import {
  PeriodMapper,
  freezeLayout,
  layoutIssues,
} from '../services/period-mapper';

/**
 * Plain catalogue shape the registry is built from. The infrastructure
 * loader maps the on-disk JSON onto it after schema validation.
 */
export interface CatalogueDefinition {
  columnLayouts: ColumnLayout[];
  companies: Array<{
    key: string;
    displayName: string;
    aliases?: string[];
    columnLayout: string;
    fields: Array<{
      key: string;
      labels?: string[];
      rowIndex?: number;
      columnLayout?: string;
    }>;
  }>;
  keyAliases?: Record<string, string>;
  pageHeadings: {
    standalone: string[];
    generic: string[];
    consolidatedMarker: string;
  };
}

const aliasKey = (name: string): string => name.trim().toLowerCase();

/**
 * Company Registry
 *
 * Immutable catalogue of company configurations, column layouts, key
 * aliases and page heading rules. Built once at startup and handed to the
 * extraction entry points; nothing in it changes afterwards, so concurrent
 * requests share it without coordination.
 */
export class CompanyRegistry {
  readonly periodMapper: PeriodMapper;
  readonly headingRules: PageHeadingRules;

  private constructor(
    private readonly companies: ReadonlyMap<string, CompanyConfig>,
    private readonly aliases: ReadonlyMap<string, string>,
    private readonly keyAliases: ReadonlyMap<string, string>,
    layouts: readonly ColumnLayout[],
    headingRules: PageHeadingRules,
  ) {
    this.periodMapper = new PeriodMapper(layouts);
    this.headingRules = headingRules;
    Object.freeze(this);
  }

  /**
   * Validate a catalogue and build the registry.
   * Every problem found is reported in one StatementConfigError.
   */
  static fromCatalogue(
    catalogue: CatalogueDefinition,
    source = 'inline',
  ): CompanyRegistry {
    const issues: string[] = [];

    const layouts = new Map<string, ColumnLayout>();
    for (const layout of catalogue.columnLayouts) {
      if (layouts.has(layout.name)) {
        issues.push(`column layout "${layout.name}" is defined twice`);
        continue;
      }
      issues.push(...layoutIssues(layout));
      layouts.set(layout.name, freezeLayout(layout));
    }

    const companies = new Map<string, CompanyConfig>();
    const aliases = new Map<string, string>();

    const claimAlias = (name: string, companyKey: string) => {
      const alias = aliasKey(name);
      const owner = aliases.get(alias);
      if (owner && owner !== companyKey) {
        issues.push(
          `company alias "${name}" is used by both "${owner}" and "${companyKey}"`,
        );
        return;
      }
      aliases.set(alias, companyKey);
    };

    for (const company of catalogue.companies) {
      const where = `company "${company.key}"`;

      if (companies.has(company.key)) {
        issues.push(`${where} is defined twice`);
        continue;
      }
      if (!layouts.has(company.columnLayout)) {
        issues.push(
          `${where}: default column layout "${company.columnLayout}" is not defined`,
        );
      }

      const fieldKeys = new Set<string>();
      const fields: FieldSpec[] = [];

      for (const field of company.fields) {
        const fieldWhere = `${where}, field "${field.key}"`;
        const labels = (field.labels ?? []).filter(
          (label) => label.trim().length > 0,
        );

        if (fieldKeys.has(field.key)) {
          issues.push(`${fieldWhere}: key is defined twice`);
        }
        fieldKeys.add(field.key);

        if (field.rowIndex === undefined && labels.length === 0) {
          issues.push(`${fieldWhere}: needs a row index or at least one label`);
        }
        if (
          field.rowIndex !== undefined &&
          !(Number.isInteger(field.rowIndex) && field.rowIndex > 0)
        ) {
          issues.push(`${fieldWhere}: row index must be a positive integer`);
        }
        if (
          field.columnLayout !== undefined &&
          !layouts.has(field.columnLayout)
        ) {
          issues.push(
            `${fieldWhere}: column layout override "${field.columnLayout}" is not defined`,
          );
        }

        fields.push(
          Object.freeze({
            key: field.key,
            labels: Object.freeze(labels),
            ...(field.rowIndex !== undefined && { rowIndex: field.rowIndex }),
            ...(field.columnLayout !== undefined && {
              columnLayout: field.columnLayout,
            }),
          }),
        );
      }

      const companyAliases = company.aliases ?? [];
      claimAlias(company.key, company.key);
      claimAlias(company.displayName, company.key);
      companyAliases.forEach((alias) => claimAlias(alias, company.key));

      companies.set(
        company.key,
        Object.freeze({
          key: company.key,
          displayName: company.displayName,
          aliases: Object.freeze([...companyAliases]),
          defaultColumnLayout: company.columnLayout,
          fields: Object.freeze(fields),
        }),
      );
    }

    const headingRules = CompanyRegistry.compileHeadingRules(
      catalogue.pageHeadings,
      issues,
    );

    if (issues.length > 0) {
      throw StatementConfigError.fromIssues(issues, source);
    }

    return new CompanyRegistry(
      companies,
      aliases,
      new Map(Object.entries(catalogue.keyAliases ?? {})),
      [...layouts.values()],
      headingRules,
    );
  }

  private static compileHeadingRules(
    headings: CatalogueDefinition['pageHeadings'],
    issues: string[],
  ): PageHeadingRules {
    const compile = (group: string, patterns: string[]): RegExp[] =>
      patterns.flatMap((pattern) => {
        try {
          return [new RegExp(pattern, 'is')];
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          issues.push(`${group} heading pattern "${pattern}" is invalid: ${reason}`);
          return [];
        }
      });

    const consolidatedMarker = headings.consolidatedMarker.trim().toLowerCase();
    if (consolidatedMarker.length === 0) {
      issues.push('consolidated marker must not be empty');
    }

    return Object.freeze({
      standalone: Object.freeze(compile('standalone', headings.standalone)),
      generic: Object.freeze(compile('generic', headings.generic)),
      consolidatedMarker,
    });
  }

  /**
   * Look a company up by config key, display name or alias, ignoring case.
   */
  resolveCompany(nameOrKey: string): CompanyConfig | undefined {
    const key = this.aliases.get(aliasKey(nameOrKey));
    return key === undefined ? undefined : this.companies.get(key);
  }

  supportedCompanies(): string[] {
    return [...this.companies.values()].map((company) => company.displayName);
  }

  /**
   * Map a field key onto the name downstream consumers expect.
   */
  canonicalKey(key: string): string {
    return this.keyAliases.get(key) ?? key;
  }
}
