import Decimal from 'decimal.js';
import { RebalanceReport } from '../entities/rebalance-report.entity';
import { ZERO, toNumber } from '../../common/utils/decimal.util';

// Market value of one security
export interface SecurityBalanceDto {
  symbol: string;
  balance: number;
}

// Before/after view of one category
export interface CategoryAllocationDto {
  category: string;
  currentTotal: number;
  targetAllocation: number;            // fraction, 0.6 = 60%
  currentAllocation: number | null;    // null when the portfolio is empty
  neededInvestment: number;            // amount to put into this category
  resultingTotal: number;
  resultingAllocation: number | null;
}

// Complete recommendation, in category order from the configuration
export interface RebalanceResponseDto {
  id: string;
  generatedAt: string;                 // ISO timestamp
  securities: SecurityBalanceDto[];
  securitiesTotal: number;
  totalBalance: number;                // sum of category totals
  investmentAmount: number;
  capped: boolean;                     // needs exceeded the investment and were scaled down
  unallocatedAmount: number;           // investment not needed by any category
  categories: CategoryAllocationDto[];
}

const fraction = (value: Decimal | null | undefined): number | null =>
  value === null || value === undefined ? null : toNumber(value);

export function toRebalanceResponse(report: RebalanceReport): RebalanceResponseDto {
  const { analysis, distribution } = report;

  return {
    id: report.id,
    generatedAt: report.generatedAt.toISOString(),
    securities: Array.from(analysis.symbolBalances.entries()).map(([symbol, balance]) => ({
      symbol,
      balance: toNumber(balance),
    })),
    securitiesTotal: toNumber(analysis.securitiesTotal),
    totalBalance: toNumber(analysis.totalBalance),
    investmentAmount: toNumber(report.investmentAmount),
    capped: distribution.capped,
    unallocatedAmount: toNumber(distribution.unallocated),
    categories: Array.from(analysis.categoryTotals.entries()).map(([category, total]) => ({
      category,
      currentTotal: toNumber(total),
      targetAllocation: toNumber(analysis.targetAllocation.get(category) ?? ZERO),
      currentAllocation: fraction(analysis.currentAllocation.get(category)),
      neededInvestment: toNumber(distribution.needed.get(category) ?? ZERO),
      resultingTotal: toNumber(distribution.resultingTotals.get(category) ?? total),
      resultingAllocation: fraction(distribution.resultingAllocations.get(category)),
    })),
  };
}
