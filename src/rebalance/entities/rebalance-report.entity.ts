import Decimal from 'decimal.js';
import {
  AllocationFractions,
  CategoryTotals,
  Distribution,
  SymbolBalances,
  TargetAllocation,
} from './allocation.entity';
import { AllocationConfig } from '../../allocation-config/entities/allocation-config.entity';

// Inputs for one rebalancing run, already loaded and validated.
export interface PortfolioSnapshot {
  symbolBalances: SymbolBalances;
  config: AllocationConfig;
}

// Where the portfolio stands before any new money goes in.
export interface PortfolioAnalysis {
  symbolBalances: SymbolBalances;
  securitiesTotal: Decimal;          // sum over all loaded securities
  categoryTotals: CategoryTotals;
  totalBalance: Decimal;             // sum over categories
  targetAllocation: TargetAllocation;
  currentAllocation: AllocationFractions;
}

// Recommendation for a specific investment amount.
export interface RebalanceReport {
  id: string;
  generatedAt: Date;
  analysis: PortfolioAnalysis;
  investmentAmount: Decimal;
  distribution: Distribution;
}
