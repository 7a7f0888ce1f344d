import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Test, TestingModule } from '@nestjs/testing';
import { DEFAULT_COMPANIES_PATH } from '../../config/statement-extraction.config';
import { StatementConfigError } from '../../domain/errors/statement-config.error';
import { CompanyCatalogueLoader } from './company-catalogue.loader';

const minimalCatalogue = () => ({
  column_layouts: [
    {
      name: 'standard',
      label: 2,
      periods: [{ period: '30.06.2025', column: 3 }],
    },
  ],
  companies: [
    {
      key: 'acme',
      display_name: 'ACME',
      aliases: ['Acme Foods'],
      column_layout: 'standard',
      financial_data: [
        { key: 'sale_of_goods', labels: ['Sale of goods'], tr_number: 4 },
        { key: 'other_income', labels: ['Other income'], tr_number: 0 },
      ],
    },
  ],
  key_aliases: { sales: 'sale_of_goods' },
  page_headings: {
    standalone: ['standalone.*financial.*result'],
    generic: ['financial.*result'],
    consolidated_marker: 'Consolidated',
  },
});

const issuesOf = (load: () => unknown): readonly string[] => {
  try {
    load();
  } catch (error) {
    if (error instanceof StatementConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected the catalogue to be rejected');
};

describe('CompanyCatalogueLoader', () => {
  let loader: CompanyCatalogueLoader;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CompanyCatalogueLoader],
    }).compile();

    loader = module.get<CompanyCatalogueLoader>(CompanyCatalogueLoader);
  });

  describe('load', () => {
    it('should map the catalogue onto the registry', () => {
      const registry = loader.load(minimalCatalogue());
      const company = registry.resolveCompany('acme foods');

      expect(company).toEqual({
        key: 'acme',
        displayName: 'ACME',
        aliases: ['Acme Foods'],
        defaultColumnLayout: 'standard',
        fields: [
          { key: 'sale_of_goods', labels: ['Sale of goods'], rowIndex: 4 },
          { key: 'other_income', labels: ['Other income'] },
        ],
      });
      expect(registry.canonicalKey('sales')).toBe('sale_of_goods');
      expect(registry.headingRules.consolidatedMarker).toBe('consolidated');
      expect(registry.headingRules.standalone[0].flags).toBe('is');
    });

    it('should reject a catalogue that is not an object', () => {
      expect(issuesOf(() => loader.load(['standard']))).toEqual([
        'catalogue must be a JSON object',
      ]);
    });

    it('should report schema problems with their path', () => {
      const catalogue = minimalCatalogue();
      const broken = {
        ...catalogue,
        companies: [
          {
            ...catalogue.companies[0],
            financial_data: [{ key: 'sale_of_goods', tr_number: 'four' }],
          },
        ],
        page_headings: undefined,
      };

      expect(issuesOf(() => loader.load(broken))).toEqual(
        expect.arrayContaining([
          'companies.0.financial_data.0.tr_number: tr_number must be an integer number',
          'page_headings: page_headings must be an object',
        ]),
      );
    });

    it('should reject alias targets that are not strings', () => {
      const catalogue = { ...minimalCatalogue(), key_aliases: { sales: 4 } };

      expect(issuesOf(() => loader.load(catalogue))).toEqual([
        'key_aliases.sales: alias target must be a string',
      ]);
    });

    it('should surface cross-reference problems from the registry', () => {
      const catalogue = minimalCatalogue();
      const broken = {
        ...catalogue,
        companies: [{ ...catalogue.companies[0], column_layout: 'annual' }],
      };

      expect(issuesOf(() => loader.load(broken, 'companies.json'))).toEqual([
        'company "acme": default column layout "annual" is not defined',
      ]);
    });
  });

  describe('loadFromFile', () => {
    let tempDir: string;

    beforeAll(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalogue-'));
    });

    afterAll(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load the bundled catalogue', () => {
      const registry = loader.loadFromFile(DEFAULT_COMPANIES_PATH);

      expect(registry.supportedCompanies()).toEqual([
        'BRITANNIA',
        'COLGATE',
        'DABUR',
        'HUL',
        'ITC',
        'NESTLE',
        'P&G',
      ]);
      expect(registry.resolveCompany('Procter & Gamble')?.key).toBe('pg');
      expect(registry.periodMapper.layoutNames()).toEqual([
        'standard',
        'label_first',
        'quarter_only',
      ]);
      expect(registry.headingRules.generic).toHaveLength(4);
    });

    it('should fail when the file is missing', () => {
      const missing = path.join(tempDir, 'missing.json');

      expect(() => loader.loadFromFile(missing)).toThrow(
        /^Company catalogue could not be read: /,
      );
    });

    it('should fail on malformed JSON', () => {
      const malformed = path.join(tempDir, 'malformed.json');
      fs.writeFileSync(malformed, '{ "column_layouts": [');

      let caught: unknown;
      try {
        loader.loadFromFile(malformed);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(StatementConfigError);
      expect(caught).toMatchObject({ source: malformed });
      expect(caught).toHaveProperty(
        'message',
        expect.stringMatching(/^Company catalogue is not valid JSON: /),
      );
    });
  });
});
