import { Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { CommandIo } from './command-io';
import { AllocationConfigService } from '../allocation-config/allocation-config.service';
import { BalanceLoaderService } from '../balances/balance-loader.service';
import { RebalanceService } from '../rebalance/rebalance.service';
import { RebalanceReport } from '../rebalance/entities/rebalance-report.entity';
import { toRebalanceResponse } from '../rebalance/dto/rebalance-response.dto';
import { formatAnalysis, formatRecommendation } from '../report/report-formatter';
import { parseAmount } from '../common/utils/decimal.util';
import { MalformedNumberError } from '../common/errors/rebalance.errors';

export const INVESTMENT_PROMPT = '\nEnter the amount you want to invest: $';

export interface RebalanceCommandOptions {
  config: string;
  balances?: string;               // explicit file, no fallback
  balancesDir: string;
  amount?: string;                 // prompt when absent
  cashSymbol?: string;             // wins over the configuration file
  defaultCashSymbol: string;       // used when neither flag nor file names one
  json?: boolean;
}

// One CLI run: load files, print the current picture, get the amount,
// print the recommendation.
@Injectable()
export class RebalanceCommand {
  private readonly logger = new Logger(RebalanceCommand.name);

  constructor(
    private readonly configService: AllocationConfigService,
    private readonly balanceLoader: BalanceLoaderService,
    private readonly rebalanceService: RebalanceService,
  ) {}

  async run(options: RebalanceCommandOptions, io: CommandIo): Promise<RebalanceReport> {
    const config = this.configService.load(options.config);
    const balanceFile = this.balanceLoader.resolveBalanceFile({
      explicitPath: options.balances,
      directory: options.balancesDir,
    });
    const cashSymbol = options.cashSymbol ?? config.cashSymbol ?? options.defaultCashSymbol;
    const symbolBalances = this.balanceLoader.load(balanceFile, cashSymbol);

    const analysis = this.rebalanceService.analyzePortfolio({ symbolBalances, config });
    if (!options.json) {
      io.write(formatAnalysis(analysis).join('\n'));
    }

    const investmentAmount = await this.resolveInvestmentAmount(options.amount, io);
    const report = this.rebalanceService.recommend(analysis, investmentAmount);

    if (options.json) {
      io.write(JSON.stringify(toRebalanceResponse(report), null, 2));
    } else {
      io.write(['', ...formatRecommendation(report)].join('\n'));
    }
    return report;
  }

  // A malformed --amount is fatal; a malformed answer at the prompt asks again.
  private async resolveInvestmentAmount(flag: string | undefined, io: CommandIo): Promise<Decimal> {
    if (flag !== undefined) {
      return parseAmount(flag);
    }

    for (;;) {
      const answer = await io.ask(INVESTMENT_PROMPT);
      try {
        return parseAmount(answer);
      } catch (err) {
        if (!(err instanceof MalformedNumberError)) {
          throw err;
        }
        this.logger.debug(`Rejected investment amount "${answer}"`);
        io.notify(`${err.message}. Please try again.`);
      }
    }
  }
}
