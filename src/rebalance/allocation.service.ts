import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import {
  AllocationFractions,
  CategoryMembers,
  CategoryTotals,
  Distribution,
  SymbolBalances,
  TargetAllocation,
} from './entities/allocation.entity';
import { ZERO, safeDivide, sum } from '../common/utils/decimal.util';
import { ConfigMissingKeyError, MalformedNumberError } from '../common/errors/rebalance.errors';

// Pure allocation math: balances -> category totals -> fractions -> distribution.
// No I/O and no state; every call is independent.
@Injectable()
export class AllocationService {
  /**
   * Sums security balances into category totals.
   * Every category gets an entry, even with no matching symbols.
   * A symbol listed under several categories counts once per category.
   */
  aggregate(balances: SymbolBalances, categories: CategoryMembers): CategoryTotals {
    const totals: CategoryTotals = new Map();
    for (const [category, symbols] of categories) {
      totals.set(category, sum(symbols.map((symbol) => balances.get(symbol) ?? ZERO)));
    }
    return totals;
  }

  /** Share of the grand total per category; all null when the total is zero */
  analyze(totals: CategoryTotals): AllocationFractions {
    const grandTotal = sum(totals.values());
    const fractions: AllocationFractions = new Map();
    for (const [category, total] of totals) {
      fractions.set(category, safeDivide(total, grandTotal));
    }
    return fractions;
  }

  /**
   * Splits a new investment across categories toward their target fractions.
   *
   * Each category needs max(0, (current total + investment) * target - current).
   * When those needs add up to more than the investment they are scaled down
   * proportionally so they sum to the investment. When they add up to less,
   * they are left as-is and the rest of the investment stays unallocated.
   *
   * @throws ConfigMissingKeyError when a category has no target fraction
   * @throws MalformedNumberError when the investment is negative
   */
  distribute(
    investmentAmount: Decimal,
    currentTotals: CategoryTotals,
    targetFractions: TargetAllocation,
  ): Distribution {
    if (investmentAmount.isNegative() && !investmentAmount.isZero()) {
      throw new MalformedNumberError(
        investmentAmount.toString(),
        'Investment amount',
        'must not be negative',
      );
    }

    const currentTotalBalance = sum(currentTotals.values());
    const newTotalBalance = currentTotalBalance.plus(investmentAmount);

    const needed: CategoryTotals = new Map();
    for (const [category, current] of currentTotals) {
      const target = targetFractions.get(category);
      if (target === undefined) {
        throw new ConfigMissingKeyError(`target_allocation.${category}`);
      }
      const desired = newTotalBalance.times(target);
      needed.set(category, Decimal.max(desired.minus(current), ZERO));
    }

    const totalNeeded = sum(needed.values());
    const capped = totalNeeded.greaterThan(investmentAmount);
    if (capped) {
      for (const [category, amount] of needed) {
        needed.set(category, investmentAmount.times(amount.dividedBy(totalNeeded)));
      }
    }

    const resultingTotals: CategoryTotals = new Map();
    for (const [category, current] of currentTotals) {
      resultingTotals.set(category, current.plus(needed.get(category) ?? ZERO));
    }

    const resultingTotalBalance = sum(resultingTotals.values());
    const resultingAllocations: AllocationFractions = new Map();
    for (const [category, total] of resultingTotals) {
      resultingAllocations.set(category, safeDivide(total, resultingTotalBalance));
    }

    return {
      needed,
      totalNeeded,
      capped,
      unallocated: investmentAmount.minus(sum(needed.values())),
      resultingTotals,
      resultingAllocations,
    };
  }
}
