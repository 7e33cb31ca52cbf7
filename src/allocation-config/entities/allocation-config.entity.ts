import { CategoryMembers, TargetAllocation } from '../../rebalance/entities/allocation.entity';

// Validated allocation configuration.
// Every category has a target fraction and every target names a category.
export interface AllocationConfig {
  categories: CategoryMembers;
  targetAllocation: TargetAllocation;
  cashSymbol?: string;             // overrides the default cash-equivalent symbol
}
