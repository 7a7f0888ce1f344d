import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  TableCandidate,
  createTableCandidate,
} from '../entities/table-candidate.entity';
import { TableSelectionMethod } from '../enums/table-selection-method.enum';
import { TableParseError } from '../errors/table-parse.error';
import { TableScorerDomainService } from './table-scorer.domain.service';

// Five rows, no financial vocabulary, no digits: 10 - 30 = -20
const signatureBlock = createTableCandidate([
  ['Director'],
  ['Address'],
  ['Signature'],
  ['Place'],
  ['Date'],
]);

// 40 rows, six keywords (revenue, income, expense, profit, tax, total),
// numeric cells: 80 + 60 + 20 = 160
const statement = createTableCandidate([
  ['Revenue from operations', '4,357.64'],
  ['Other income', '12.10'],
  ['Employee benefits expense', '(310.00)'],
  ['Profit before tax', '980.55'],
  ['Total', '5,000.00'],
  ...Array.from({ length: 35 }, (_, i) => [`Line ${i + 6}`, `${i + 1}.00`]),
]);

const keywordDenseFragment = createTableCandidate(
  Array.from({ length: 9 }, (_, i) => [`Row ${i + 1}`, '1.00']),
  'revenue income expense profit loss tax total net eps earnings per share comprehensive depreciation amortisation finance cost 1.00',
);

const thinStatement = createTableCandidate(
  Array.from({ length: 10 }, () => ['Total']),
);

describe('TableScorerDomainService', () => {
  let service: TableScorerDomainService;
  let mockConfig: { get: jest.Mock };

  beforeEach(async () => {
    mockConfig = { get: jest.fn(() => undefined) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TableScorerDomainService,
        { provide: ConfigService, useValue: mockConfig },
      ],
    }).compile();

    service = module.get<TableScorerDomainService>(TableScorerDomainService);
  });

  describe('scoreTable', () => {
    it('should break the score down by rule', () => {
      expect(service.scoreTable(signatureBlock)).toEqual({
        total: -20,
        breakdown: {
          'row-count': 10,
          'financial-keywords': 0,
          'numeric-content': 0,
          'small-table-penalty': -30,
        },
      });
    });

    it('should score a full statement', () => {
      expect(service.scoreTable(statement).total).toBe(160);
    });

    it('should accept a custom rule list', () => {
      const rules = [{ name: 'flat', score: () => 7 }];

      expect(service.scoreTable(statement, rules)).toEqual({
        total: 7,
        breakdown: { flat: 7 },
      });
    });
  });

  describe('selectBest', () => {
    it('should pick the full statement over a small unrelated table', () => {
      expect(service.selectBest([signatureBlock, statement])).toEqual({
        found: true,
        index: 1,
        score: 160,
        method: TableSelectionMethod.HEURISTIC,
        skipped: [],
      });
    });

    it('should keep the earliest candidate on a tie', () => {
      const selection = service.selectBest([statement, statement, signatureBlock]);

      expect(selection).toMatchObject({ found: true, index: 0 });
    });

    it('should short-circuit a single candidate without scoring it', () => {
      const loader = jest.fn((): TableCandidate => statement);

      expect(service.selectBest([loader])).toEqual({
        found: true,
        index: 0,
        score: null,
        method: TableSelectionMethod.SINGLE_TABLE,
        skipped: [],
      });
      expect(loader).not.toHaveBeenCalled();
    });

    it('should report nothing for an empty list', () => {
      expect(service.selectBest([])).toEqual({ found: false, skipped: [] });
    });

    it('should skip candidates that fail to load', () => {
      const broken = () => {
        throw new TableParseError('No table found in HTML', 'table-1.html');
      };

      expect(service.selectBest([broken, signatureBlock])).toEqual({
        found: true,
        index: 1,
        score: -20,
        method: TableSelectionMethod.HEURISTIC,
        skipped: [0],
      });
    });

    it('should report nothing when every candidate fails to load', () => {
      const broken = () => {
        throw new Error('unreadable');
      };

      expect(service.selectBest([broken, broken])).toEqual({
        found: false,
        skipped: [0, 1],
      });
    });

    it('should never prefer a short table over a statement-sized one', () => {
      // 18 + 140 + 20 - 30 = 148 against 20 + 10 + 0 = 30
      expect(service.scoreTable(keywordDenseFragment).total).toBe(148);
      expect(service.scoreTable(thinStatement).total).toBe(30);

      expect(
        service.selectBest([keywordDenseFragment, thinStatement]),
      ).toMatchObject({ found: true, index: 1, score: 30 });
    });

    it('should fall back to the best score when no table is statement-sized', () => {
      expect(
        service.selectBest([signatureBlock, keywordDenseFragment]),
      ).toMatchObject({ found: true, index: 1, score: 148 });
    });

    it('should honour configured thresholds', async () => {
      mockConfig.get.mockImplementation((key: string) => {
        if (key === 'statementExtraction.scoring.minTableRows') return 3;
        if (key === 'statementExtraction.scoring.maxScoredRows') return 4;
        return undefined;
      });
      const module = await Test.createTestingModule({
        providers: [
          TableScorerDomainService,
          { provide: ConfigService, useValue: mockConfig },
        ],
      }).compile();

      const tuned = module.get(TableScorerDomainService);

      // 5 rows capped at 4 → 8, no penalty above 3 rows
      expect(tuned.scoreTable(signatureBlock).total).toBe(8);
    });
  });
});
