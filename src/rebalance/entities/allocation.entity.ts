import Decimal from 'decimal.js';

// All maps keep insertion order: categories follow the configuration file,
// symbols follow the balance file.

/** symbol -> market value, cash-equivalent symbol already excluded */
export type SymbolBalances = Map<string, Decimal>;

/** category -> member symbols */
export type CategoryMembers = Map<string, string[]>;

/** category -> target fraction in [0, 1] */
export type TargetAllocation = Map<string, Decimal>;

/** category -> summed balance of its members */
export type CategoryTotals = Map<string, Decimal>;

// category -> share of the grand total.
// null when the grand total is zero and the share is undefined.
export type AllocationFractions = Map<string, Decimal | null>;

// Result of spreading a new investment across categories.
export interface Distribution {
  needed: CategoryTotals;          // amount to invest per category
  totalNeeded: Decimal;            // unscaled sum of shortfalls
  capped: boolean;                 // shortfalls exceeded the investment and were scaled down
  unallocated: Decimal;            // investment left over when shortfalls were smaller
  resultingTotals: CategoryTotals;
  resultingAllocations: AllocationFractions;
}
