import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { AllocationService } from './allocation.service';
import { AllocationConfigService } from '../allocation-config/allocation-config.service';
import { RebalanceRequestDto } from './dto/rebalance-request.dto';
import { SymbolBalances } from './entities/allocation.entity';
import {
  PortfolioAnalysis,
  PortfolioSnapshot,
  RebalanceReport,
} from './entities/rebalance-report.entity';
import { formatCurrency, parseAmount, parseNonNegative, sum } from '../common/utils/decimal.util';

// Runs the allocation pipeline for one set of inputs.
// Used by the CLI (files + prompt) and the HTTP controller (request body).
@Injectable()
export class RebalanceService {
  private readonly logger = new Logger(RebalanceService.name);

  constructor(
    private readonly allocationService: AllocationService,
    private readonly configService: AllocationConfigService,
  ) {}

  /** Current category totals and allocation, before new money goes in */
  analyzePortfolio(snapshot: PortfolioSnapshot): PortfolioAnalysis {
    const { symbolBalances, config } = snapshot;
    const categoryTotals = this.allocationService.aggregate(symbolBalances, config.categories);

    return {
      symbolBalances,
      securitiesTotal: sum(symbolBalances.values()),
      categoryTotals,
      totalBalance: sum(categoryTotals.values()),
      targetAllocation: config.targetAllocation,
      currentAllocation: this.allocationService.analyze(categoryTotals),
    };
  }

  recommend(analysis: PortfolioAnalysis, investmentAmount: Decimal): RebalanceReport {
    const distribution = this.allocationService.distribute(
      investmentAmount,
      analysis.categoryTotals,
      analysis.targetAllocation,
    );

    if (distribution.capped) {
      this.logger.debug(
        `Shortfall of ${formatCurrency(distribution.totalNeeded)} scaled down to ${formatCurrency(investmentAmount)}`,
      );
    } else if (distribution.unallocated.greaterThan(0)) {
      this.logger.log(
        `${formatCurrency(distribution.unallocated)} of the investment is not needed to reach the target allocation`,
      );
    }

    return {
      id: uuidv4(),
      generatedAt: new Date(),
      analysis,
      investmentAmount,
      distribution,
    };
  }

  /**
   * Builds a recommendation from a request body.
   * Validated with the same rules as the configuration file.
   */
  fromRequest(request: RebalanceRequestDto): RebalanceReport {
    const config = this.configService.fromObject(
      {
        categories: request.categories,
        target_allocation: request.targetAllocation,
        cash_symbol: request.cashSymbol,
      },
      'request',
    );

    const symbolBalances: SymbolBalances = new Map();
    for (const [symbol, value] of Object.entries(request.balances)) {
      if (symbol === config.cashSymbol) {
        continue;
      }
      symbolBalances.set(symbol, parseNonNegative(String(value), `balances.${symbol}`));
    }

    const analysis = this.analyzePortfolio({ symbolBalances, config });
    return this.recommend(analysis, parseAmount(request.investmentAmount));
  }
}
