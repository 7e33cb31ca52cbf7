import Decimal from 'decimal.js';
import { formatAnalysis, formatRecommendation } from './report-formatter';
import { RebalanceService } from '../rebalance/rebalance.service';
import { AllocationService } from '../rebalance/allocation.service';
import { AllocationConfigService } from '../allocation-config/allocation-config.service';
import { AllocationConfig } from '../allocation-config/entities/allocation-config.entity';

describe('report-formatter', () => {
  const service = new RebalanceService(new AllocationService(), new AllocationConfigService());

  const config: AllocationConfig = {
    categories: new Map([
      ['Stocks', ['VTI']],
      ['Bonds', ['BND']],
    ]),
    targetAllocation: new Map([
      ['Stocks', new Decimal('0.5')],
      ['Bonds', new Decimal('0.5')],
    ]),
  };

  const analysis = service.analyzePortfolio({
    symbolBalances: new Map([
      ['VTI', new Decimal('6000')],
      ['BND', new Decimal('4000')],
    ]),
    config,
  });

  describe('formatAnalysis', () => {
    it('should print balances and target vs. current allocation', () => {
      expect(formatAnalysis(analysis)).toEqual([
        'Balances by Security:',
        'VTI: $6,000.00',
        'BND: $4,000.00',
        'Total Balance from Securities: $10,000.00',
        '',
        'Balances by Category:',
        'Stocks: $6,000.00',
        'Bonds: $4,000.00',
        '',
        'Target Allocation vs. Current Allocation:',
        'Stocks: Target = 50.00%, Current = 60.00%',
        'Bonds: Target = 50.00%, Current = 40.00%',
        'Total Balance: $10,000.00',
      ]);
    });

    it('should print N/A for an empty portfolio', () => {
      const empty = service.analyzePortfolio({ symbolBalances: new Map(), config });

      expect(formatAnalysis(empty).slice(-3)).toEqual([
        'Stocks: Target = 50.00%, Current = N/A',
        'Bonds: Target = 50.00%, Current = N/A',
        'Total Balance: $0.00',
      ]);
    });
  });

  describe('formatRecommendation', () => {
    it('should print amounts to invest and the resulting allocation', () => {
      const report = service.recommend(analysis, new Decimal(2000));

      expect(formatRecommendation(report)).toEqual([
        'Recommended Investment Allocation:',
        'Stocks: $0.00',
        'Bonds: $2,000.00',
        '',
        'Resulting Allocation After Investment:',
        'Stocks: 50.00%',
        'Bonds: 50.00%',
      ]);
    });

    it('should print fractional amounts rounded to cents', () => {
      const report = service.recommend(analysis, new Decimal('1000.555'));

      // Bonds falls 1500.2775 short, scaled down to the whole 1000.555
      expect(formatRecommendation(report).slice(0, 3)).toEqual([
        'Recommended Investment Allocation:',
        'Stocks: $0.00',
        'Bonds: $1,000.56',
      ]);
    });
  });
});
