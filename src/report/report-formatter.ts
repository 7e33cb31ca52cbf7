import { PortfolioAnalysis, RebalanceReport } from '../rebalance/entities/rebalance-report.entity';
import { ZERO, formatCurrency, formatPercent } from '../common/utils/decimal.util';

// Console tables for the CLI. Each function returns lines without trailing newlines.

/** Security balances, category balances and target vs. current allocation */
export function formatAnalysis(analysis: PortfolioAnalysis): string[] {
  const lines = ['Balances by Security:'];
  for (const [symbol, balance] of analysis.symbolBalances) {
    lines.push(`${symbol}: ${formatCurrency(balance)}`);
  }
  lines.push(`Total Balance from Securities: ${formatCurrency(analysis.securitiesTotal)}`);

  lines.push('', 'Balances by Category:');
  for (const [category, total] of analysis.categoryTotals) {
    lines.push(`${category}: ${formatCurrency(total)}`);
  }

  lines.push('', 'Target Allocation vs. Current Allocation:');
  for (const [category, target] of analysis.targetAllocation) {
    const current = analysis.currentAllocation.get(category) ?? null;
    lines.push(`${category}: Target = ${formatPercent(target)}, Current = ${formatPercent(current)}`);
  }
  lines.push(`Total Balance: ${formatCurrency(analysis.totalBalance)}`);

  return lines;
}

/** Recommended amounts per category and the allocation they lead to */
export function formatRecommendation(report: RebalanceReport): string[] {
  const { needed, resultingAllocations } = report.distribution;

  const lines = ['Recommended Investment Allocation:'];
  for (const category of report.analysis.categoryTotals.keys()) {
    lines.push(`${category}: ${formatCurrency(needed.get(category) ?? ZERO)}`);
  }

  lines.push('', 'Resulting Allocation After Investment:');
  for (const category of report.analysis.categoryTotals.keys()) {
    lines.push(`${category}: ${formatPercent(resultingAllocations.get(category) ?? null)}`);
  }

  return lines;
}
