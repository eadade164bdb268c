import { ManualParser, mapColumns, toNumber } from '../../src/parserAdapters/manual.adapter';

const fixedClock = () => new Date('2025-03-15T10:00:00.000Z');

describe('ManualParser Unit Tests', () => {
  it('should derive weights from market value when no weight column exists', async () => {
    // Arrange
    const parser = new ManualParser(fixedClock);
    const rows = [
      ['Test Equity Fund', null, null],
      ['Monthly portfolio statement', null, null],
      ['Name of Instrument', 'ISIN', 'Market Value'],
      ['Alpha Ltd', 'INE000A01010', 300],
      ['Beta Ltd', 'INE000B01012', '100'],
      [null, null, null],
    ];

    // Act
    const portfolio = await parser.parse({ sheetName: 'Sheet1', rows });

    // Assert
    expect(portfolio).toEqual({
      mutualFundName: 'Test Equity Fund',
      portfolioDate: 'March 2025',
      totalHoldings: 2,
      holdings: [
        { nameOfInstrument: 'Alpha Ltd', isinCode: 'INE000A01010', percentageToNav: '75.0000%', marketValue: 300 },
        { nameOfInstrument: 'Beta Ltd', isinCode: 'INE000B01012', percentageToNav: '25.0000%', marketValue: 100 },
      ],
    });
  });

  it('should read an explicit weight column and name the fund after the sheet when untitled', async () => {
    // Arrange
    const parser = new ManualParser(fixedClock);
    const rows = [
      ['Company', 'ISIN Code', 'Quantity', '% to NAV'],
      ['Alpha Ltd', 'INE000A01010', '1,200', '12.5%'],
      ['Beta Ltd', null, 40, 7],
    ];

    // Act
    const portfolio = await parser.parse({ sheetName: 'Large_Cap_Fund.xlsx', rows });

    // Assert
    expect(portfolio.mutualFundName).toBe('Portfolio Large Cap Fund');
    expect(portfolio.holdings).toEqual([
      { nameOfInstrument: 'Alpha Ltd', isinCode: 'INE000A01010', percentageToNav: '12.5000%', quantity: 1200 },
      { nameOfInstrument: 'Beta Ltd', isinCode: 'Unknown', percentageToNav: '7.0000%', quantity: 40 },
    ]);
  });

  it('should reject a sheet without a recognisable header row', async () => {
    // Arrange
    const parser = new ManualParser(fixedClock);

    // Act & Assert
    await expect(parser.parse({ sheetName: 'Notes', rows: [['Disclaimer'], ['Past performance']] })).rejects.toThrow(
      'No holdings header row found in sheet Notes'
    );
  });

  it('should not treat a name-only row as a header', () => {
    expect(mapColumns(['Instrument', 'Rating'])).toEqual({ name: 0 });
  });

  describe('toNumber', () => {
    it('should strip thousands separators, percent signs and spaces', () => {
      expect(toNumber(' 1,234.5 ')).toBe(1234.5);
      expect(toNumber('2.45%')).toBe(2.45);
      expect(toNumber(42)).toBe(42);
    });

    it('should return null for blanks and text', () => {
      expect(toNumber(null)).toBeNull();
      expect(toNumber('')).toBeNull();
      expect(toNumber('n/a')).toBeNull();
    });
  });
});
