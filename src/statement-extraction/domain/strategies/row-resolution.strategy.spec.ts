import { createTableCandidate } from '../entities/table-candidate.entity';
import { ResolutionStrategy } from '../enums/resolution-strategy.enum';
import { DirectRowStrategy } from './direct-row.strategy';
import { FuzzyLabelStrategy } from './fuzzy-label.strategy';

const table = createTableCandidate([
  ['', 'Particulars', 'Quarter ended'],
  ['1', 'Revenue from operations', '5,100.00'],
  ['', 'Sale of Goods / Income from operations', '4,357.64'],
  ['', '', ''],
  ['2', 'Other Income', '45.10'],
  ['', 'Depreciation and amortisation exp', '(80.20)'],
]);

describe('DirectRowStrategy', () => {
  const strategy = new DirectRowStrategy();

  it('should map a 1-based row index to its position', () => {
    expect(strategy.name).toBe(ResolutionStrategy.DIRECT);
    expect(strategy.locate(table, { key: 'k', labels: [], rowIndex: 1 })).toBe(0);
    expect(strategy.locate(table, { key: 'k', labels: [], rowIndex: 6 })).toBe(5);
  });

  it('should decline indexes outside the table', () => {
    expect(strategy.locate(table, { key: 'k', labels: [], rowIndex: 0 })).toBeNull();
    expect(strategy.locate(table, { key: 'k', labels: [], rowIndex: 7 })).toBeNull();
    expect(strategy.locate(table, { key: 'k', labels: [], rowIndex: 99 })).toBeNull();
  });

  it('should decline fields without a row index', () => {
    expect(strategy.locate(table, { key: 'k', labels: ['Other income'] })).toBeNull();
  });
});

describe('FuzzyLabelStrategy', () => {
  const strategy = new FuzzyLabelStrategy();

  it('should match a label contained in the row text ignoring case and punctuation', () => {
    expect(strategy.name).toBe(ResolutionStrategy.FUZZY);
    expect(
      strategy.locate(table, { key: 'sale_of_goods', labels: ['Sale of goods'] }),
    ).toBe(2);
  });

  it('should take the first row in document order', () => {
    // "operations" appears in the second and third rows
    expect(strategy.locate(table, { key: 'k', labels: ['Operations'] })).toBe(1);
    expect(
      strategy.locate(table, { key: 'k', labels: ['Income from operations'] }),
    ).toBe(2);
  });

  it('should try every label against a row before moving on', () => {
    expect(
      strategy.locate(table, {
        key: 'k',
        labels: ['Other income', 'Revenue from operations'],
      }),
    ).toBe(1);
  });

  it('should accept rows that start with the first 15 label characters', () => {
    // Row text is "depreciation and amortisation exp"; label is longer
    expect(
      strategy.locate(table, {
        key: 'k',
        labels: ['Depreciation and amortisation expense'],
      }),
    ).toBe(5);
  });

  it('should return null when no label matches', () => {
    expect(
      strategy.locate(table, { key: 'k', labels: ['Exceptional items'] }),
    ).toBeNull();
  });

  it('should return null for fields without usable labels', () => {
    expect(strategy.locate(table, { key: 'k', labels: [] })).toBeNull();
    expect(strategy.locate(table, { key: 'k', labels: ['  ', '/'] })).toBeNull();
  });

  it('should compare normalized text', () => {
    expect(FuzzyLabelStrategy.matches('net profit for the period', 'net profit')).toBe(true);
    expect(FuzzyLabelStrategy.matches('1 revenue', 'revenue')).toBe(true);
    expect(FuzzyLabelStrategy.matches('total income', 'revenue')).toBe(false);
  });
});
