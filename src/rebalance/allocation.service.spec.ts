import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { AllocationService } from './allocation.service';
import {
  AllocationFractions,
  CategoryMembers,
  CategoryTotals,
  SymbolBalances,
  TargetAllocation,
} from './entities/allocation.entity';
import { ConfigMissingKeyError, MalformedNumberError } from '../common/errors/rebalance.errors';

const decimals = (entries: Record<string, string | number>): Map<string, Decimal> =>
  new Map(Object.entries(entries).map(([key, value]) => [key, new Decimal(value)]));

const plain = (map: CategoryTotals | AllocationFractions): Record<string, string | null> =>
  Object.fromEntries(
    Array.from(map.entries()).map(([key, value]) => [key, value === null ? null : value.toString()]),
  );

describe('AllocationService', () => {
  let service: AllocationService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [AllocationService],
    }).compile();

    service = module.get<AllocationService>(AllocationService);
  });

  describe('aggregate', () => {
    const balances: SymbolBalances = decimals({ VTI: '6000', VXUS: '2000', BND: '2000' });

    it('should sum member balances per category', () => {
      const categories: CategoryMembers = new Map([
        ['Stocks', ['VTI', 'VXUS']],
        ['Bonds', ['BND']],
      ]);

      expect(plain(service.aggregate(balances, categories))).toEqual({
        Stocks: '8000',
        Bonds: '2000',
      });
    });

    it('should keep categories without matching symbols at zero', () => {
      const categories: CategoryMembers = new Map([
        ['Stocks', ['VTI']],
        ['Real Estate', ['VNQ']],
        ['Cash', []],
      ]);

      const totals = service.aggregate(balances, categories);

      expect(Array.from(totals.keys())).toEqual(['Stocks', 'Real Estate', 'Cash']);
      expect(plain(totals)).toEqual({ Stocks: '6000', 'Real Estate': '0', Cash: '0' });
    });

    it('should treat symbols missing from the balances as zero', () => {
      const categories: CategoryMembers = new Map([['Stocks', ['VTI', 'XYZ']]]);

      expect(plain(service.aggregate(balances, categories))).toEqual({ Stocks: '6000' });
    });

    it('should count a symbol once per category it belongs to', () => {
      const categories: CategoryMembers = new Map([
        ['US', ['VTI']],
        ['Equity', ['VTI', 'VXUS']],
      ]);

      expect(plain(service.aggregate(balances, categories))).toEqual({ US: '6000', Equity: '8000' });
    });

    it('should not depend on the order of symbols within a category', () => {
      const forward = service.aggregate(balances, new Map([['All', ['VTI', 'VXUS', 'BND']]]));
      const reversed = service.aggregate(balances, new Map([['All', ['BND', 'VXUS', 'VTI']]]));

      expect(plain(reversed)).toEqual(plain(forward));
    });

    it('should conserve the total balance when each symbol has one category', () => {
      const categories: CategoryMembers = new Map([
        ['Stocks', ['VTI', 'VXUS']],
        ['Bonds', ['BND']],
      ]);
      const totals = service.aggregate(balances, categories);

      const categorySum = Array.from(totals.values()).reduce((a, b) => a.plus(b), new Decimal(0));
      const balanceSum = Array.from(balances.values()).reduce((a, b) => a.plus(b), new Decimal(0));
      expect(categorySum.equals(balanceSum)).toBe(true);
    });
  });

  describe('analyze', () => {
    it('should return each category share of the grand total', () => {
      const fractions = service.analyze(decimals({ Stocks: '6000', Bonds: '4000' }));

      expect(plain(fractions)).toEqual({ Stocks: '0.6', Bonds: '0.4' });
    });

    it('should report undefined shares as null when the total is zero', () => {
      const fractions = service.analyze(decimals({ Stocks: 0, Bonds: 0 }));

      expect(plain(fractions)).toEqual({ Stocks: null, Bonds: null });
    });

    it('should return identical fractions on repeated calls', () => {
      const totals = decimals({ A: '1000', B: '2000', C: '3000' });

      expect(plain(service.analyze(totals))).toEqual(plain(service.analyze(totals)));
    });
  });

  describe('distribute', () => {
    const halfAndHalf: TargetAllocation = decimals({ Stocks: '0.5', Bonds: '0.5' });

    it('should fill the underweight category when funds exactly cover the need', () => {
      const result = service.distribute(
        new Decimal(2000),
        decimals({ Stocks: '6000', Bonds: '4000' }),
        halfAndHalf,
      );

      expect(plain(result.needed)).toEqual({ Stocks: '0', Bonds: '2000' });
      expect(result.totalNeeded.toString()).toBe('2000');
      expect(result.capped).toBe(false);
      expect(result.unallocated.toString()).toBe('0');
      expect(plain(result.resultingTotals)).toEqual({ Stocks: '6000', Bonds: '6000' });
      expect(plain(result.resultingAllocations)).toEqual({ Stocks: '0.5', Bonds: '0.5' });
    });

    it('should scale needs down proportionally when they exceed the investment', () => {
      const result = service.distribute(
        new Decimal(100),
        decimals({ A: '0', B: '900' }),
        decimals({ A: '0.5', B: '0.5' }),
      );

      expect(result.totalNeeded.toString()).toBe('500');
      expect(result.capped).toBe(true);
      expect(plain(result.needed)).toEqual({ A: '100', B: '0' });
      expect(plain(result.resultingTotals)).toEqual({ A: '100', B: '900' });
      expect(plain(result.resultingAllocations)).toEqual({ A: '0.1', B: '0.9' });
    });

    it('should make scaled needs add up to the investment', () => {
      const result = service.distribute(
        new Decimal(300),
        decimals({ A: '0', B: '0', C: '3000' }),
        decimals({ A: '0.3333333333', B: '0.3333333333', C: '0.3333333334' }),
      );

      expect(result.capped).toBe(true);
      const distributed = Array.from(result.needed.values()).reduce((a, b) => a.plus(b), new Decimal(0));
      expect(distributed.minus(300).abs().lessThan('1e-9')).toBe(true);
      expect(result.needed.get('C')?.toString()).toBe('0');
    });

    it('should leave needs unscaled when the investment covers them', () => {
      const result = service.distribute(
        new Decimal(5000),
        decimals({ A: '1000', B: '3000' }),
        decimals({ A: '0.5', B: '0.5' }),
      );

      expect(result.capped).toBe(false);
      expect(plain(result.needed)).toEqual({ A: '3500', B: '1500' });
    });

    it('should leave the excess unallocated when targets sum to less than one', () => {
      const result = service.distribute(
        new Decimal(1000),
        decimals({ A: '0', B: '0' }),
        decimals({ A: '0.5', B: '0.3' }),
      );

      expect(plain(result.needed)).toEqual({ A: '500', B: '300' });
      expect(result.capped).toBe(false);
      expect(result.unallocated.toString()).toBe('200');
      expect(plain(result.resultingAllocations)).toEqual({ A: '0.625', B: '0.375' });
    });

    it('should allocate nothing for a zero investment', () => {
      const current = decimals({ Stocks: '7000', Bonds: '3000' });

      const result = service.distribute(new Decimal(0), current, halfAndHalf);

      expect(plain(result.needed)).toEqual({ Stocks: '0', Bonds: '0' });
      expect(plain(result.resultingTotals)).toEqual(plain(current));
      expect(plain(result.resultingAllocations)).toEqual({ Stocks: '0.7', Bonds: '0.3' });
    });

    it('should report null allocations for an empty portfolio and no investment', () => {
      const result = service.distribute(new Decimal(0), decimals({ Stocks: 0, Bonds: 0 }), halfAndHalf);

      expect(plain(result.needed)).toEqual({ Stocks: '0', Bonds: '0' });
      expect(plain(result.resultingAllocations)).toEqual({ Stocks: null, Bonds: null });
    });

    it('should split a first investment into an empty portfolio by target', () => {
      const result = service.distribute(
        new Decimal(1000),
        decimals({ Stocks: 0, Bonds: 0 }),
        decimals({ Stocks: '0.6', Bonds: '0.4' }),
      );

      expect(plain(result.needed)).toEqual({ Stocks: '600', Bonds: '400' });
      expect(plain(result.resultingAllocations)).toEqual({ Stocks: '0.6', Bonds: '0.4' });
    });

    it('should throw when a category has no target fraction', () => {
      expect(() =>
        service.distribute(new Decimal(100), decimals({ Stocks: 1, Bonds: 1 }), decimals({ Stocks: 1 })),
      ).toThrow(new ConfigMissingKeyError('target_allocation.Bonds'));
    });

    it('should reject a negative investment', () => {
      expect(() =>
        service.distribute(new Decimal(-1), decimals({ Stocks: 1 }), decimals({ Stocks: 1 })),
      ).toThrow(MalformedNumberError);
    });
  });
});
