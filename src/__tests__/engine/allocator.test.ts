import { allocate, roundShares } from '../../engine/allocator';
import { selectByCoverage } from '../../engine/selector';
import { InvalidRangeError } from '../../models/CalculatorError';
import { Security } from '../../models/Security';
import {
  oddPricedSecurities,
  partialIndex,
  tenEqualWeights,
  twoSecurities,
  withUnpricedSecurity,
} from '../fixtures/securities';

describe('allocate', () => {
  it('should put the whole amount into the only selected security', () => {
    const result = allocate(twoSecurities, 50, 1000);

    expect(result.selectedSymbols).toEqual(['A']);
    expect(result.lines).toEqual([
      {
        symbol: 'A',
        weightPercent: 60,
        adjustedWeightPercent: 100,
        price: 10,
        shares: 100,
        investedAmount: 1000,
      },
    ]);
    expect(result.summary).toEqual({
      totalInvestmentAmount: 1000,
      totalInvested: 1000,
      remainingCash: 0,
      investmentEfficiencyPercent: 100,
      companiesSelected: 1,
      companiesInvested: 1,
      targetCoveragePercent: 50,
      actualCoveragePercent: 60,
    });
  });

  it('should split by adjusted weight at full coverage', () => {
    const result = allocate(twoSecurities, 100, 1000);

    expect(result.lines.map((l) => l.adjustedWeightPercent)).toEqual([60, 40]);
    expect(result.lines.map((l) => l.shares)).toEqual([60, 20]);
    expect(result.summary.totalInvested).toBe(1000);
    expect(result.summary.remainingCash).toBe(0);
    expect(result.summary.actualCoveragePercent).toBe(100);
  });

  it('should keep fractional-share leftovers as remaining cash', () => {
    const result = allocate(oddPricedSecurities, 100, 1000);

    expect(result.lines.map((l) => l.shares)).toEqual([85, 13]);
    expect(result.lines.map((l) => l.investedAmount)).toEqual([595, 390]);
    expect(result.summary.totalInvested).toBe(985);
    expect(result.summary.remainingCash).toBe(15);
    expect(result.summary.investmentEfficiencyPercent).toBe(98.5);
    expect(result.summary.companiesInvested).toBe(2);
  });

  it('should skip a security without a price but still count it as selected', () => {
    const securities: Security[] = [
      { symbol: 'A', weight: 0.5, price: 11 },
      { symbol: 'B', weight: 0.3 },
      { symbol: 'C', weight: 0.2, price: 6 },
    ];
    const result = allocate(securities, 100, 1000);

    expect(result.lines.map((l) => l.symbol)).toEqual(['A', 'C']);
    expect(result.lines.map((l) => l.shares)).toEqual([45, 33]);
    expect(result.skippedSymbols).toEqual(['B']);
    expect(result.summary.companiesSelected).toBe(3);
    expect(result.summary.companiesInvested).toBe(2);
    expect(result.summary.totalInvested).toBe(693);
    expect(result.summary.remainingCash).toBe(307);
  });

  it('should skip zero and negative prices', () => {
    const securities: Security[] = [
      { symbol: 'A', weight: 0.5, price: 0 },
      { symbol: 'B', weight: 0.5, price: -3 },
    ];
    const result = allocate(securities, 100, 1000);

    expect(result.lines).toEqual([]);
    expect(result.skippedSymbols).toEqual(['A', 'B']);
    expect(result.summary.remainingCash).toBe(1000);
  });

  it('should keep a line with zero shares when the price exceeds its allocation', () => {
    const securities: Security[] = [
      { symbol: 'A', weight: 0.9, price: 7 },
      { symbol: 'B', weight: 0.1, price: 500 },
    ];
    const result = allocate(securities, 100, 1000);

    expect(result.lines).toHaveLength(2);
    expect(result.lines[1]).toMatchObject({ symbol: 'B', shares: 0, investedAmount: 0 });
    expect(result.lines[0].shares).toBe(128);
    expect(result.summary.companiesInvested).toBe(1);
    expect(result.summary.totalInvested).toBe(896);
  });

  it('should report zero invested for an empty list', () => {
    const result = allocate([], 50, 1000);

    expect(result.lines).toEqual([]);
    expect(result.summary.totalInvested).toBe(0);
    expect(result.summary.remainingCash).toBe(1000);
    expect(result.summary.companiesSelected).toBe(0);
    expect(result.summary.actualCoveragePercent).toBe(0);
  });

  it('should spend leftover cash only when redistribution is requested', () => {
    const result = allocate(oddPricedSecurities, 100, 1000, { redistributeLeftover: true });

    expect(result.lines.map((l) => l.shares)).toEqual([87, 13]);
    expect(result.summary.totalInvested).toBe(999);
    expect(result.summary.remainingCash).toBe(1);
  });

  it('should reject coverage outside (0, 100]', () => {
    expect(() => allocate(twoSecurities, 0, 1000)).toThrow(InvalidRangeError);
    expect(() => allocate(twoSecurities, 100.5, 1000)).toThrow(InvalidRangeError);
  });

  it('should reject a non-positive or non-numeric investment amount', () => {
    expect(() => allocate(twoSecurities, 50, 0)).toThrow(InvalidRangeError);
    expect(() => allocate(twoSecurities, 50, -100)).toThrow(InvalidRangeError);
    expect(() => allocate(twoSecurities, 50, Number.NaN)).toThrow(InvalidRangeError);
  });

  it('should never overspend a security allocation and always balance the totals', () => {
    const amounts = [1000, 12345.67, 250000];
    for (const securities of [tenEqualWeights, partialIndex]) {
      for (const coverage of [5, 25, 50, 75, 100]) {
        for (const amount of amounts) {
          const selection = selectByCoverage(securities, coverage);
          const result = allocate(securities, coverage, amount);

          for (const line of result.lines) {
            const selected = selection.find((s) => s.symbol === line.symbol);
            expect(selected).toBeDefined();
            expect(line.shares).toBeGreaterThanOrEqual(0);
            expect(Number.isInteger(line.shares)).toBe(true);
            expect(line.shares * line.price).toBeLessThanOrEqual(
              (selected?.adjustedWeight ?? 0) * amount + 1e-9
            );
          }
          expect(
            Math.abs(result.summary.totalInvested + result.summary.remainingCash - amount)
          ).toBeLessThanOrEqual(0.01);
        }
      }
    }
  });
});

describe('roundShares', () => {
  it('should compute remaining cash from exact totals', () => {
    const selection = selectByCoverage(oddPricedSecurities, 100);
    const rounding = roundShares(selection, 1000);

    expect(rounding.positions.map((p) => p.shares)).toEqual([85, 13]);
    expect(rounding.totalInvested).toBe(985);
    expect(rounding.remainingCash).toBe(15);
    expect(rounding.skippedSymbols).toEqual([]);
  });

  it('should list skipped securities in selection order', () => {
    const selection = selectByCoverage(withUnpricedSecurity, 100);
    const rounding = roundShares(selection, 1000);

    expect(rounding.skippedSymbols).toEqual(['B']);
    expect(rounding.positions.map((p) => p.security.symbol)).toEqual(['A', 'C']);
  });

  it('should not redistribute into skipped securities', () => {
    const selection = selectByCoverage(withUnpricedSecurity, 100);
    const rounding = roundShares(selection, 1000, { redistributeLeftover: true });

    expect(rounding.positions.map((p) => p.security.symbol)).toEqual(['A', 'C']);
    expect(rounding.remainingCash).toBeLessThan(5);
    expect(rounding.remainingCash).toBeGreaterThanOrEqual(0);
  });

  it('should match share-by-share walks when buying in bulk', () => {
    const securities: Security[] = [
      { symbol: 'U', weight: 0.5 },
      { symbol: 'A', weight: 0.25, price: 3 },
      { symbol: 'B', weight: 0.25, price: 4 },
    ];
    const rounding = roundShares(selectByCoverage(securities, 100), 1000, { redistributeLeftover: true });

    expect(rounding.positions.map((p) => p.shares)).toEqual([156, 133]);
    expect(rounding.totalInvested).toBe(1000);
    expect(rounding.remainingCash).toBe(0);
  });

  it('should spend a large leftover on a cheap security without walking share by share', () => {
    const securities: Security[] = [
      { symbol: 'U', weight: 0.5 },
      { symbol: 'C', weight: 0.5, price: 0.5 },
    ];
    const started = Date.now();
    const rounding = roundShares(selectByCoverage(securities, 100), 1e9, { redistributeLeftover: true });

    expect(Date.now() - started).toBeLessThan(1000);
    expect(rounding.skippedSymbols).toEqual(['U']);
    expect(rounding.positions.map((p) => p.shares)).toEqual([2e9]);
    expect(rounding.remainingCash).toBe(0);
  });
});
